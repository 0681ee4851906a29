// Shared helpers over the document tree

import { InlineNode } from './types';

/**
 * Plain text of inline nodes, the way an image's alt attribute sees it:
 * formatting dropped, breaks as newlines, raw HTML kept verbatim.
 */
export function inlineNodesToText(nodes: readonly InlineNode[]): string {
    return nodes.map(inlineNodeToText).join('');
}

function inlineNodeToText(node: InlineNode): string {
    switch (node.type) {
        case 'text':
        case 'code':
        case 'math':
        case 'html_inline':
            return node.literal;
        case 'image':
            return node.alt;
        case 'line_break':
        case 'soft_break':
            return '\n';
        case 'link':
        case 'emphasis':
        case 'strong':
        case 'strikethrough':
        case 'highlight':
        case 'underline':
            return inlineNodesToText(node.children);
    }
}

/**
 * Text a heading anchor is built from: only text and code content, so raw
 * HTML tags, math and images leave no trace in the slug.
 */
export function inlineNodesToAnchorText(nodes: readonly InlineNode[]): string {
    return nodes.map(inlineNodeToAnchorText).join('');
}

function inlineNodeToAnchorText(node: InlineNode): string {
    switch (node.type) {
        case 'text':
        case 'code':
            return node.literal;
        case 'link':
        case 'emphasis':
        case 'strong':
        case 'strikethrough':
        case 'highlight':
        case 'underline':
            return inlineNodesToAnchorText(node.children);
        case 'math':
        case 'html_inline':
        case 'image':
        case 'line_break':
        case 'soft_break':
            return '';
    }
}

const taskMarkerRe = /^\[( |x|X)\]\s+/;

/**
 * Detects a GFM task marker at the start of a list item's text.
 */
export function matchTaskMarker(text: string): { checked: boolean; rest: string } | null {
    const match = text.match(taskMarkerRe);
    if (!match) {
        return null;
    }
    return {
        checked: match[1].toLowerCase() === 'x',
        rest: text.slice(match[0].length)
    };
}
