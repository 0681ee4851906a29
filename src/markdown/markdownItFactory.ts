/// <reference path="../types/markdown-it-mark.d.ts" />
import MarkdownIt from 'markdown-it';
import markdownItMark from 'markdown-it-mark';

import { alertPlugin, mathPlugin, underlinePlugin } from './markdownItPlugins';

export type MarkdownFlavor = 'styled' | 'unstyled';

export type IndicoMarkdownItOptions = {
    /** Linkify bare URLs and e-mail addresses. */
    autolink?: boolean;
    /** `$…$`, `$$…$$` and `` $`…`$ `` math spans. */
    math?: boolean;
};

const flavorOptions: Record<MarkdownFlavor, Required<IndicoMarkdownItOptions>> = {
    styled: { autolink: true, math: true },
    unstyled: { autolink: false, math: false }
};

/**
 * Builds a markdown-it instance with the fixed extension set: tables and
 * strikethrough (markdown-it core), highlight, underline and alerts, plus
 * autolinks and math spans where enabled. Tasklists are recognised on the
 * document tree by the pipeline.
 */
export function createIndicoMarkdownIt(options: IndicoMarkdownItOptions = {}): MarkdownIt {
    const md = new MarkdownIt({
        html: true,
        linkify: options.autolink ?? true,
        typographer: false,
        breaks: false
    });

    md.linkify.set({ fuzzyLink: false });

    md.use(markdownItMark)
        .use(underlinePlugin)
        .use(alertPlugin);

    if (options.math ?? true) {
        md.use(mathPlugin);
    }

    return md;
}

const instances = new Map<MarkdownFlavor, MarkdownIt>();

/**
 * Returns the process-wide parser for a flavor, creating it on first use.
 * Instances are never reconfigured after creation.
 */
export function getIndicoMarkdownIt(flavor: MarkdownFlavor): MarkdownIt {
    let md = instances.get(flavor);
    if (!md) {
        md = createIndicoMarkdownIt(flavorOptions[flavor]);
        instances.set(flavor, md);
    }
    return md;
}
