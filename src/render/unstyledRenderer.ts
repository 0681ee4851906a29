import {
    BlockNode,
    DocumentNode,
    InlineNode,
    ListItemNode,
    ListNode,
    ParagraphNode,
    TaskListItemNode
} from '../markdown/types';
import { UnstyledRenderOptions, resolveUnstyledRenderOptions } from '../config/RenderConfiguration';
import { escapeHtml } from '../utils/stringUtils';
import { HtmlWriter } from './HtmlWriter';

// Paragraphs and line breaks are the only markup the unstyled output keeps;
// everything else is reduced to its escaped text.

type UnstyledContext = {
    out: HtmlWriter;
    options: UnstyledRenderOptions;
    tight: boolean;
    depth: number;
};

function renderInlines(nodes: readonly InlineNode[], ctx: UnstyledContext): void {
    nodes.forEach(node => renderInline(node, ctx));
}

function renderInline(node: InlineNode, ctx: UnstyledContext): void {
    switch (node.type) {
        case 'text':
        case 'code':
        case 'math':
            ctx.out.write(escapeHtml(node.literal));
            break;
        case 'image':
            ctx.out.write(escapeHtml(node.alt));
            break;
        case 'line_break':
            ctx.out.write('<br />\n');
            break;
        case 'soft_break':
            ctx.out.write(ctx.options.hardbreaks ? '<br />\n' : '\n');
            break;
        case 'html_inline':
            break;
        case 'link':
        case 'emphasis':
        case 'strong':
        case 'strikethrough':
        case 'highlight':
        case 'underline':
            renderInlines(node.children, ctx);
            break;
    }
}

function renderParagraph(node: ParagraphNode, ctx: UnstyledContext): void {
    if (ctx.tight) {
        renderInlines(node.children, ctx);
        return;
    }
    ctx.out.cr();
    ctx.out.write('<p>');
    renderInlines(node.children, ctx);
    ctx.out.write('</p>\n');
}

function listMarker(list: ListNode, index: number): string {
    return list.ordered ? `${list.start + index}${list.delimiter}` : list.delimiter;
}

function renderListItem(list: ListNode, item: ListItemNode | TaskListItemNode, index: number, ctx: UnstyledContext): void {
    const task = item.type === 'task_list_item' ? (item.checked ? '[x] ' : '[ ] ') : '';

    ctx.out.cr();
    ctx.out.write(`${'  '.repeat(ctx.depth)}${listMarker(list, index)} ${task}`);
    renderBlocks(item.children, ctx);
    ctx.out.cr();
}

function renderBlocks(nodes: readonly BlockNode[], ctx: UnstyledContext): void {
    nodes.forEach(node => renderBlock(node, ctx));
}

function renderBlock(node: BlockNode, ctx: UnstyledContext): void {
    const { out } = ctx;

    switch (node.type) {
        case 'paragraph':
            renderParagraph(node, ctx);
            break;
        case 'heading':
            out.cr();
            renderInlines(node.children, ctx);
            out.write('\n');
            break;
        case 'list': {
            const itemCtx: UnstyledContext = { ...ctx, tight: node.tight, depth: ctx.depth + 1 };
            out.cr();
            node.children.forEach((item, index) => renderListItem(node, item, index, itemCtx));
            break;
        }
        case 'code_block':
            out.cr();
            out.write(escapeHtml(node.literal));
            out.cr();
            break;
        case 'blockquote':
        case 'alert':
            renderBlocks(node.children, { ...ctx, tight: false });
            break;
        case 'table':
            node.children.forEach(row => {
                out.cr();
                row.children.forEach((cell, column) => {
                    if (column > 0) {
                        out.write(' | ');
                    }
                    renderInlines(cell.children, ctx);
                });
                out.write('\n');
            });
            break;
        case 'thematic_break':
        case 'html_block':
            break;
    }
}

/**
 * Renders a document as text wrapped in paragraphs, for places that show
 * markdown without its styling (previews, notification bodies).
 */
export function renderUnstyledDocumentHtml(doc: DocumentNode, options: Partial<UnstyledRenderOptions> = {}): string {
    const ctx: UnstyledContext = {
        out: new HtmlWriter(),
        options: resolveUnstyledRenderOptions(options),
        tight: false,
        depth: 0
    };

    renderBlocks(doc.children, ctx);
    return ctx.out.toString();
}
