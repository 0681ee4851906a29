import type MarkdownIt from 'markdown-it';
import { getIndicoMarkdownIt, MarkdownFlavor } from './markdownItFactory';
import { parseMarkdownItTokens } from './tokenParser';
import { BlockNode, DocumentNode, InlineNode, ListItemNode, TaskListItemNode } from './types';
import { matchTaskMarker } from './utils';
import { logger } from '../utils/logger';

export type ParseOptions = {
    /** Parser to use instead of the process-wide instance for the flavor. */
    markdownIt?: MarkdownIt;
};

/**
 * Parses markdown into the document tree. This is the single boundary with the
 * external CommonMark parser; it never fails on any input.
 */
export function parse(source: string, flavor: MarkdownFlavor = 'styled', options: ParseOptions = {}): DocumentNode {
    const md = options.markdownIt ?? getIndicoMarkdownIt(flavor);
    const tokens = md.parse(source ?? '', {});
    const doc = parseMarkdownItTokens(tokens);

    logger.debug(`parsed ${tokens.length} tokens into ${doc.children.length} blocks (${flavor})`);

    return applyTaskListItems(doc);
}

export function applyTaskListItems(doc: DocumentNode): DocumentNode {
    doc.children.forEach(node => applyTaskListItemsToBlock(node));
    return doc;
}

function applyTaskListItemsToBlock(node: BlockNode): void {
    switch (node.type) {
        case 'list':
            node.children = node.children.map(item => {
                item.children.forEach(child => applyTaskListItemsToBlock(child));
                return item.type === 'list_item' ? toTaskListItem(item) : item;
            });
            break;
        case 'blockquote':
        case 'alert':
            node.children.forEach(child => applyTaskListItemsToBlock(child));
            break;
        default:
            break;
    }
}

function toTaskListItem(item: ListItemNode): ListItemNode | TaskListItemNode {
    const paragraph = item.children[0];
    if (!paragraph || paragraph.type !== 'paragraph') {
        return item;
    }

    const first = paragraph.children[0];
    if (!first || first.type !== 'text') {
        return item;
    }

    const marker = matchTaskMarker(first.literal);
    if (!marker) {
        return item;
    }

    const rest: InlineNode[] = marker.rest ? [{ type: 'text', literal: marker.rest }] : [];
    paragraph.children = [...rest, ...paragraph.children.slice(1)];

    return { type: 'task_list_item', checked: marker.checked, children: item.children };
}
