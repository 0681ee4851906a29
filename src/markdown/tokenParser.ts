import {
    AlertKind,
    BlockNode,
    ColumnAlignment,
    DocumentNode,
    FormattingNode,
    HeadingLevel,
    InlineNode,
    ListItemNode,
    ListNode,
    MarkdownItToken,
    TableCellNode,
    TableNode,
    TableRowNode
} from './types';
import { ALERT_KINDS } from '../constants/MarkdownConstants';
import { inlineNodesToText } from './utils';

type ParseResult<T> = { nodes: T[]; nextIndex: number };

const formattingTokens = new Map<string, FormattingNode['type']>([
    ['em_open', 'emphasis'],
    ['strong_open', 'strong'],
    ['s_open', 'strikethrough'],
    ['mark_open', 'highlight'],
    ['underline_open', 'underline']
]);

const transparentTableTokens = new Set(['thead_open', 'thead_close', 'tbody_open', 'tbody_close']);

function getTokenAttr(token: MarkdownItToken, name: string): string | undefined {
    if (!token.attrs) {
        return undefined;
    }

    const match = token.attrs.find(attr => attr[0] === name);
    return match ? match[1] : undefined;
}

function parseNumber(value: string | undefined, fallback: number): number {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function parseHeadingLevel(token: MarkdownItToken): HeadingLevel {
    const match = token.tag?.match(/^h([1-6])$/i);
    switch (match?.[1]) {
        case '2': return 2;
        case '3': return 3;
        case '4': return 4;
        case '5': return 5;
        case '6': return 6;
        default: return 1;
    }
}

function parseCellAlign(token: MarkdownItToken): ColumnAlignment {
    const value = getTokenAttr(token, 'align') ?? getTokenAttr(token, 'style')?.match(/text-align\s*:\s*(left|right|center)/i)?.[1];

    switch (value?.toLowerCase()) {
        case 'left': return 'left';
        case 'center': return 'center';
        case 'right': return 'right';
        default: return null;
    }
}

function parseAlertKind(token: MarkdownItToken): AlertKind | null {
    const value = token.meta?.alert;
    if (typeof value !== 'string') {
        return null;
    }
    return ALERT_KINDS.find(kind => kind === value) ?? null;
}

function closeTypeFor(openType: string): string {
    return openType.replace(/_open$/, '_close');
}

function appendText(nodes: InlineNode[], literal: string): void {
    if (!literal) {
        return;
    }

    const last = nodes[nodes.length - 1];
    if (last && last.type === 'text') {
        last.literal += literal;
        return;
    }
    nodes.push({ type: 'text', literal });
}

/**
 * Parses inline tokens from `start` up to (not including) a token of `closeType`,
 * or to the end of the list when no close type is given.
 */
function parseInlineRange(tokens: MarkdownItToken[], start: number, closeType?: string): ParseResult<InlineNode> {
    const nodes: InlineNode[] = [];

    for (let i = start; i < tokens.length; i += 1) {
        const token = tokens[i];

        if (closeType && token.type === closeType) {
            return { nodes, nextIndex: i };
        }

        const formatting = formattingTokens.get(token.type);
        if (formatting) {
            const inner = parseInlineRange(tokens, i + 1, closeTypeFor(token.type));
            nodes.push({ type: formatting, children: inner.nodes });
            i = inner.nextIndex;
            continue;
        }

        switch (token.type) {
            case 'text':
            case 'text_special':
                appendText(nodes, token.content ?? '');
                break;
            case 'code_inline':
                nodes.push({ type: 'code', literal: token.content ?? '' });
                break;
            case 'math_inline':
                nodes.push({ type: 'math', literal: token.content ?? '', display: token.meta?.display === true });
                break;
            case 'softbreak':
                nodes.push({ type: 'soft_break' });
                break;
            case 'hardbreak':
                nodes.push({ type: 'line_break' });
                break;
            case 'html_inline':
                nodes.push({ type: 'html_inline', literal: token.content ?? '' });
                break;
            case 'image': {
                const alt = parseInlineRange(token.children ?? [], 0).nodes;
                nodes.push({
                    type: 'image',
                    src: getTokenAttr(token, 'src') ?? '',
                    alt: inlineNodesToText(alt),
                    title: getTokenAttr(token, 'title') ?? ''
                });
                break;
            }
            case 'link_open': {
                const inner = parseInlineRange(tokens, i + 1, 'link_close');
                nodes.push({
                    type: 'link',
                    href: getTokenAttr(token, 'href') ?? '',
                    title: getTokenAttr(token, 'title') ?? '',
                    children: inner.nodes
                });
                i = inner.nextIndex;
                break;
            }
            default:
                // Unknown tokens from plugins degrade to their text content
                appendText(nodes, token.content ?? '');
        }
    }

    return { nodes, nextIndex: tokens.length };
}

/**
 * Collects the inline content between a block's open token and its close token.
 */
function parseInlineContent(tokens: MarkdownItToken[], start: number, closeType: string): ParseResult<InlineNode> {
    const nodes: InlineNode[] = [];
    let i = start;

    for (; i < tokens.length && tokens[i].type !== closeType; i += 1) {
        const token = tokens[i];
        if (token.type === 'inline') {
            nodes.push(...parseInlineRange(token.children ?? [], 0).nodes);
        }
    }

    return { nodes, nextIndex: i };
}

function parseTable(tokens: MarkdownItToken[], start: number): { node: TableNode; nextIndex: number } {
    const rows: TableRowNode[] = [];
    let alignments: ColumnAlignment[] = [];
    let inHeader = false;
    let i = start;

    for (; i < tokens.length && tokens[i].type !== 'table_close'; i += 1) {
        const token = tokens[i];

        if (transparentTableTokens.has(token.type)) {
            inHeader = token.type === 'thead_open';
            continue;
        }

        if (token.type !== 'tr_open') {
            continue;
        }

        const cells: TableCellNode[] = [];
        const rowAlignments: ColumnAlignment[] = [];
        i += 1;

        for (; i < tokens.length && tokens[i].type !== 'tr_close'; i += 1) {
            const cellToken = tokens[i];
            if (cellToken.type !== 'th_open' && cellToken.type !== 'td_open') {
                continue;
            }

            const content = parseInlineContent(tokens, i + 1, closeTypeFor(cellToken.type));
            cells.push({ type: 'table_cell', children: content.nodes });
            rowAlignments.push(parseCellAlign(cellToken));
            i = content.nextIndex;
        }

        if (rows.length === 0) {
            alignments = rowAlignments;
        }
        rows.push({ type: 'table_row', header: inHeader, children: cells });
    }

    return { node: { type: 'table', alignments, children: rows }, nextIndex: i };
}

function parseList(tokens: MarkdownItToken[], start: number): { node: ListNode; nextIndex: number } {
    const open = tokens[start];
    const ordered = open.type === 'ordered_list_open';
    const closeType = closeTypeFor(open.type);
    const items: ListItemNode[] = [];
    let tight = false;
    let i = start + 1;

    for (; i < tokens.length && tokens[i].type !== closeType; i += 1) {
        if (tokens[i].type !== 'list_item_open') {
            continue;
        }

        const item = parseBlockRange(tokens, i + 1, 'list_item_close');
        items.push({ type: 'list_item', children: item.nodes });
        tight = tight || item.hiddenParagraphs;
        i = item.nextIndex;
    }

    const markup = open.markup ?? '';
    const node: ListNode = {
        type: 'list',
        ordered,
        start: ordered ? parseNumber(getTokenAttr(open, 'start'), 1) : 1,
        delimiter: markup || (ordered ? '.' : '-'),
        tight,
        children: items
    };

    return { node, nextIndex: i };
}

/**
 * Parses block tokens from `start` up to a token of `closeType` (or the end).
 * `hiddenParagraphs` reports whether a paragraph at this level was marked hidden,
 * which markdown-it does for every paragraph of a tight list.
 */
function parseBlockRange(
    tokens: MarkdownItToken[],
    start: number,
    closeType?: string
): ParseResult<BlockNode> & { hiddenParagraphs: boolean } {
    const nodes: BlockNode[] = [];
    let hiddenParagraphs = false;

    for (let i = start; i < tokens.length; i += 1) {
        const token = tokens[i];

        if (closeType && token.type === closeType) {
            return { nodes, nextIndex: i, hiddenParagraphs };
        }

        switch (token.type) {
            case 'paragraph_open': {
                hiddenParagraphs = hiddenParagraphs || token.hidden === true;
                const content = parseInlineContent(tokens, i + 1, 'paragraph_close');
                nodes.push({ type: 'paragraph', children: content.nodes });
                i = content.nextIndex;
                break;
            }
            case 'heading_open': {
                const content = parseInlineContent(tokens, i + 1, 'heading_close');
                nodes.push({ type: 'heading', level: parseHeadingLevel(token), children: content.nodes });
                i = content.nextIndex;
                break;
            }
            case 'blockquote_open': {
                const inner = parseBlockRange(tokens, i + 1, 'blockquote_close');
                const kind = parseAlertKind(token);
                nodes.push(kind
                    ? { type: 'alert', kind, children: inner.nodes }
                    : { type: 'blockquote', children: inner.nodes });
                i = inner.nextIndex;
                break;
            }
            case 'bullet_list_open':
            case 'ordered_list_open': {
                const list = parseList(tokens, i);
                nodes.push(list.node);
                i = list.nextIndex;
                break;
            }
            case 'table_open': {
                const table = parseTable(tokens, i + 1);
                nodes.push(table.node);
                i = table.nextIndex;
                break;
            }
            case 'fence':
            case 'code_block':
                nodes.push({
                    type: 'code_block',
                    info: token.info ? token.info.trim() : '',
                    literal: token.content ?? '',
                    fenced: token.type === 'fence'
                });
                break;
            case 'hr':
                nodes.push({ type: 'thematic_break' });
                break;
            case 'html_block':
                nodes.push({ type: 'html_block', literal: token.content ?? '' });
                break;
            default:
                break;
        }
    }

    return { nodes, nextIndex: tokens.length, hiddenParagraphs };
}

export function parseMarkdownItTokens(tokens: MarkdownItToken[]): DocumentNode {
    return { type: 'document', children: parseBlockRange(tokens, 0).nodes };
}
