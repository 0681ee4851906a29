/**
 * Autolinker - turns rule matches inside plain text into link nodes.
 *
 * Only `text` nodes are scanned. Text under a link (markdown or raw `<a>` HTML)
 * is left alone, as are code spans, math and raw HTML themselves. The input
 * tree is never mutated: changed paths are copied, untouched subtrees shared.
 */

import {
    BlockNode,
    DocumentNode,
    InlineNode,
    LinkNode,
    ListItemNode,
    TableRowNode,
    TaskListItemNode
} from '../markdown/types';
import { RuleSet } from './RuleSet';
import { substituteTemplate } from './templates';
import { logger } from '../utils/logger';

export type AutolinkMatch = {
    priority: number;
    start: number;
    end: number;
    /** `captures[0]` is the whole match; groups that did not participate are undefined. */
    captures: Array<string | undefined>;
};

export type AutolinkOptions = {
    /** Give synthesized links the matched text as their title. */
    setTitle?: boolean;
};

type WalkState = {
    ruleSet: RuleSet;
    setTitle: boolean;
    /** Inside a raw `<a …>` … `</a>` pair, tracked in document order. */
    inRawLink: boolean;
    linksCreated: number;
};

const rawLinkOpenRe = /^<a[\s>]/i;
const rawLinkCloseRe = /^<\/a\s*>/i;

/**
 * Every rule's leftmost, non-overlapping matches over `text`, in rule order.
 * Zero-length matches are dropped.
 */
export function findRuleMatches(text: string, ruleSet: RuleSet): AutolinkMatch[] {
    const matches: AutolinkMatch[] = [];

    for (const rule of ruleSet.rules) {
        for (const match of text.matchAll(rule.pattern)) {
            const start = match.index ?? 0;
            const end = start + match[0].length;
            if (end === start) {
                continue;
            }
            matches.push({ priority: rule.priority, start, end, captures: Array.from(match) });
        }
    }

    return matches;
}

/**
 * Greedy overlap resolution: earliest start first, then the lower priority,
 * then the longer match. A candidate is accepted when it starts at or after
 * the end of the previously accepted one. The result is sorted and disjoint.
 */
export function resolveMatches(candidates: readonly AutolinkMatch[]): AutolinkMatch[] {
    const ordered = [...candidates].sort((a, b) =>
        a.start - b.start ||
        a.priority - b.priority ||
        (b.end - b.start) - (a.end - a.start));

    const accepted: AutolinkMatch[] = [];
    let lastEnd = 0;

    for (const candidate of ordered) {
        if (candidate.start >= lastEnd) {
            accepted.push(candidate);
            lastEnd = candidate.end;
        }
    }

    return accepted;
}

function createLink(text: string, match: AutolinkMatch, ruleSet: RuleSet, setTitle: boolean): LinkNode {
    const matched = text.slice(match.start, match.end);
    const rule = ruleSet.rules[match.priority];

    return {
        type: 'link',
        href: substituteTemplate(rule.template, match.captures),
        title: setTitle ? matched : '',
        children: [{ type: 'text', literal: matched }]
    };
}

/**
 * Splits `text` around accepted matches into text segments and links.
 * Empty segments are not emitted.
 */
export function splitTextByMatches(
    text: string,
    accepted: readonly AutolinkMatch[],
    ruleSet: RuleSet,
    options: AutolinkOptions = {}
): InlineNode[] {
    const nodes: InlineNode[] = [];
    let position = 0;

    for (const match of accepted) {
        if (match.start > position) {
            nodes.push({ type: 'text', literal: text.slice(position, match.start) });
        }
        nodes.push(createLink(text, match, ruleSet, options.setTitle ?? false));
        position = match.end;
    }

    if (position < text.length) {
        nodes.push({ type: 'text', literal: text.slice(position) });
    }

    return nodes;
}

function linkText(text: string, state: WalkState): InlineNode[] | null {
    const accepted = resolveMatches(findRuleMatches(text, state.ruleSet));
    if (accepted.length === 0) {
        return null;
    }

    state.linksCreated += accepted.length;
    return splitTextByMatches(text, accepted, state.ruleSet, { setTitle: state.setTitle });
}

function mapInlines(nodes: InlineNode[], state: WalkState): InlineNode[] {
    let result: InlineNode[] | null = null;

    for (let index = 0; index < nodes.length; index += 1) {
        const node = nodes[index];
        let replacement: InlineNode[] | null = null;

        switch (node.type) {
            case 'text':
                if (!state.inRawLink) {
                    replacement = linkText(node.literal, state);
                }
                break;
            case 'html_inline':
                if (rawLinkOpenRe.test(node.literal)) {
                    state.inRawLink = true;
                } else if (rawLinkCloseRe.test(node.literal)) {
                    state.inRawLink = false;
                }
                break;
            case 'emphasis':
            case 'strong':
            case 'strikethrough':
            case 'highlight':
            case 'underline': {
                const children = mapInlines(node.children, state);
                if (children !== node.children) {
                    replacement = [{ ...node, children }];
                }
                break;
            }
            case 'link':
            case 'image':
            case 'code':
            case 'math':
            case 'line_break':
            case 'soft_break':
                break;
        }

        if (replacement) {
            result = result ?? nodes.slice(0, index);
            result.push(...replacement);
        } else if (result) {
            result.push(node);
        }
    }

    return result ?? nodes;
}

function mapList<T>(items: T[], map: (item: T) => T): T[] {
    let mapped: T[] | null = null;

    for (let index = 0; index < items.length; index += 1) {
        const next = map(items[index]);
        if (next !== items[index]) {
            mapped = mapped ?? items.slice(0, index);
        }
        mapped?.push(next);
    }

    return mapped ?? items;
}

function mapListItem(item: ListItemNode | TaskListItemNode, state: WalkState): ListItemNode | TaskListItemNode {
    const children = mapList(item.children, child => mapBlock(child, state));
    return children === item.children ? item : { ...item, children };
}

function mapTableRow(row: TableRowNode, state: WalkState): TableRowNode {
    const children = mapList(row.children, cell => {
        const cellChildren = mapInlines(cell.children, state);
        return cellChildren === cell.children ? cell : { ...cell, children: cellChildren };
    });
    return children === row.children ? row : { ...row, children };
}

function mapBlock(node: BlockNode, state: WalkState): BlockNode {
    switch (node.type) {
        case 'paragraph':
        case 'heading': {
            const children = mapInlines(node.children, state);
            return children === node.children ? node : { ...node, children };
        }
        case 'blockquote':
        case 'alert': {
            const children = mapList(node.children, child => mapBlock(child, state));
            return children === node.children ? node : { ...node, children };
        }
        case 'list': {
            const children = mapList(node.children, item => mapListItem(item, state));
            return children === node.children ? node : { ...node, children };
        }
        case 'table': {
            const children = mapList(node.children, row => mapTableRow(row, state));
            return children === node.children ? node : { ...node, children };
        }
        case 'code_block':
        case 'thematic_break':
        case 'html_block':
            return node;
    }
}

/**
 * Returns a tree in which every accepted rule match inside eligible text is a link.
 * With an empty rule set the input document itself is returned.
 */
export function applyAutolinks(doc: DocumentNode, ruleSet: RuleSet, options: AutolinkOptions = {}): DocumentNode {
    if (ruleSet.isEmpty) {
        return doc;
    }

    const state: WalkState = {
        ruleSet,
        setTitle: options.setTitle ?? false,
        inRawLink: false,
        linksCreated: 0
    };

    const children = mapList(doc.children, child => mapBlock(child, state));

    logger.debug(`autolinking created ${state.linksCreated} link(s)`);

    return children === doc.children ? doc : { ...doc, children };
}
