import {
    AlertNode,
    BlockNode,
    ColumnAlignment,
    DocumentNode,
    FormattingNode,
    HeadingNode,
    InlineNode,
    ListItemNode,
    ListNode,
    ParagraphNode,
    TableNode,
    TaskListItemNode
} from '../markdown/types';
import { inlineNodesToAnchorText } from '../markdown/utils';
import { ALERT_TITLES } from '../constants/MarkdownConstants';
import { RenderOptions, resolveRenderOptions } from '../config/RenderConfiguration';
import { escapeHtml } from '../utils/stringUtils';
import { HtmlWriter } from './HtmlWriter';
import { HeadingSlugger } from './slugger';
import { filterRawHtml } from './tagFilter';

type RenderContext = {
    out: HtmlWriter;
    options: RenderOptions;
    slugger: HeadingSlugger;
    /** Paragraphs of tight list items render without `<p>`. */
    tight: boolean;
};

const formattingTags: Record<FormattingNode['type'], string> = {
    emphasis: 'em',
    strong: 'strong',
    strikethrough: 'del',
    highlight: 'mark',
    underline: 'u'
};

function renderInlines(nodes: readonly InlineNode[], ctx: RenderContext): void {
    nodes.forEach(node => renderInline(node, ctx));
}

function renderInline(node: InlineNode, ctx: RenderContext): void {
    const { out, options } = ctx;

    switch (node.type) {
        case 'text':
            out.write(escapeHtml(node.literal));
            break;
        case 'code':
            out.write(`<code>${escapeHtml(node.literal)}</code>`);
            break;
        case 'math':
            out.write(`<span data-math-style="${node.display ? 'display' : 'inline'}">${escapeHtml(node.literal)}</span>`);
            break;
        case 'html_inline':
            out.write(options.tagFilter ? filterRawHtml(node.literal) : node.literal);
            break;
        case 'line_break':
            out.write('<br />\n');
            break;
        case 'soft_break':
            out.write(options.hardbreaks ? '<br />\n' : '\n');
            break;
        case 'image': {
            const title = node.title ? ` title="${escapeHtml(node.title)}"` : '';
            out.write(`<img src="${escapeHtml(node.src)}" alt="${escapeHtml(node.alt)}"${title} />`);
            break;
        }
        case 'link': {
            const title = node.title ? ` title="${escapeHtml(node.title)}"` : '';
            const target = options.linkTarget ? ` target="${escapeHtml(options.linkTarget)}"` : '';
            out.write(`<a href="${escapeHtml(node.href)}"${title}${target}>`);
            renderInlines(node.children, ctx);
            out.write('</a>');
            break;
        }
        case 'emphasis':
        case 'strong':
        case 'strikethrough':
        case 'highlight':
        case 'underline': {
            const tag = formattingTags[node.type];
            out.write(`<${tag}>`);
            renderInlines(node.children, ctx);
            out.write(`</${tag}>`);
            break;
        }
    }
}

function renderParagraph(node: ParagraphNode, ctx: RenderContext, prefix = ''): void {
    if (ctx.tight) {
        ctx.out.write(prefix);
        renderInlines(node.children, ctx);
        return;
    }

    ctx.out.cr();
    ctx.out.write(`<p>${prefix}`);
    renderInlines(node.children, ctx);
    ctx.out.write('</p>\n');
}

function renderHeading(node: HeadingNode, ctx: RenderContext): void {
    const tag = `h${node.level}`;
    ctx.out.cr();
    ctx.out.write(`<${tag}>`);

    if (ctx.options.headerIdPrefix !== null) {
        const slug = ctx.slugger.slug(inlineNodesToAnchorText(node.children));
        const id = `${ctx.options.headerIdPrefix}${slug}`;
        ctx.out.write(`<a href="#${escapeHtml(slug)}" aria-hidden="true" class="anchor" id="${escapeHtml(id)}"></a>`);
    }

    renderInlines(node.children, ctx);
    ctx.out.write(`</${tag}>\n`);
}

function renderListItem(item: ListItemNode | TaskListItemNode, ctx: RenderContext): void {
    ctx.out.cr();
    ctx.out.write('<li>');

    let checkbox = '';
    if (item.type === 'task_list_item') {
        checkbox = `<input type="checkbox"${item.checked ? ' checked=""' : ''} disabled="" /> `;
    }

    item.children.forEach((child, index) => {
        if (index === 0 && child.type === 'paragraph') {
            renderParagraph(child, ctx, checkbox);
            checkbox = '';
            return;
        }
        ctx.out.write(checkbox);
        checkbox = '';
        renderBlock(child, ctx);
    });
    ctx.out.write(checkbox);

    ctx.out.write('</li>\n');
}

function renderList(node: ListNode, ctx: RenderContext): void {
    const tag = node.ordered ? 'ol' : 'ul';
    const start = node.ordered && node.start !== 1 ? ` start="${node.start}"` : '';

    ctx.out.cr();
    ctx.out.write(`<${tag}${start}>\n`);

    const itemCtx: RenderContext = { ...ctx, tight: node.tight };
    node.children.forEach(item => renderListItem(item, itemCtx));

    ctx.out.cr();
    ctx.out.write(`</${tag}>\n`);
}

function alignAttr(alignment: ColumnAlignment | undefined): string {
    return alignment ? ` align="${alignment}"` : '';
}

function renderTable(node: TableNode, ctx: RenderContext): void {
    const { out } = ctx;
    const header = node.children.filter(row => row.header);
    const body = node.children.filter(row => !row.header);

    const renderRows = (rows: TableNode['children'], cellTag: string): void => {
        rows.forEach(row => {
            out.write('<tr>\n');
            row.children.forEach((cell, column) => {
                out.write(`<${cellTag}${alignAttr(node.alignments[column])}>`);
                renderInlines(cell.children, ctx);
                out.write(`</${cellTag}>\n`);
            });
            out.write('</tr>\n');
        });
    };

    out.cr();
    out.write('<table>\n');
    if (header.length > 0) {
        out.write('<thead>\n');
        renderRows(header, 'th');
        out.write('</thead>\n');
    }
    if (body.length > 0) {
        out.write('<tbody>\n');
        renderRows(body, 'td');
        out.write('</tbody>\n');
    }
    out.write('</table>\n');
}

function renderAlert(node: AlertNode, ctx: RenderContext): void {
    ctx.out.cr();
    ctx.out.write(`<div class="markdown-alert markdown-alert-${node.kind}">\n`);
    ctx.out.write(`<p class="markdown-alert-title">${ALERT_TITLES[node.kind]}</p>\n`);
    renderBlocks(node.children, { ...ctx, tight: false });
    ctx.out.cr();
    ctx.out.write('</div>\n');
}

function renderBlocks(nodes: readonly BlockNode[], ctx: RenderContext): void {
    nodes.forEach(node => renderBlock(node, ctx));
}

function renderBlock(node: BlockNode, ctx: RenderContext): void {
    const { out } = ctx;

    switch (node.type) {
        case 'paragraph':
            renderParagraph(node, ctx);
            break;
        case 'heading':
            renderHeading(node, ctx);
            break;
        case 'list':
            renderList(node, ctx);
            break;
        case 'code_block': {
            const lang = node.info.split(/\s+/)[0];
            const className = lang ? ` class="language-${escapeHtml(lang)}"` : '';
            out.cr();
            out.write(`<pre><code${className}>${escapeHtml(node.literal)}</code></pre>\n`);
            break;
        }
        case 'blockquote':
            out.cr();
            out.write('<blockquote>\n');
            renderBlocks(node.children, { ...ctx, tight: false });
            out.cr();
            out.write('</blockquote>\n');
            break;
        case 'alert':
            renderAlert(node, ctx);
            break;
        case 'table':
            renderTable(node, ctx);
            break;
        case 'thematic_break':
            out.cr();
            out.write('<hr />\n');
            break;
        case 'html_block':
            out.cr();
            out.write(ctx.options.tagFilter ? filterRawHtml(node.literal) : node.literal);
            out.cr();
            break;
    }
}

/**
 * Serializes a document tree to HTML. Rendering is total over any tree the
 * parser and autolinker produce; an empty document renders as `''`.
 */
export function renderDocumentHtml(doc: DocumentNode, options: Partial<RenderOptions> = {}): string {
    const ctx: RenderContext = {
        out: new HtmlWriter(),
        options: resolveRenderOptions(options),
        slugger: new HeadingSlugger(),
        tight: false
    };

    renderBlocks(doc.children, ctx);
    return ctx.out.toString();
}
