/**
 * Type definitions for markdown-it-mark
 *
 * The package ships no typings; it exports a single markdown-it plugin.
 */

declare module 'markdown-it-mark' {
    import type MarkdownIt from 'markdown-it';

    function markdownItMark(md: MarkdownIt): void;

    export = markdownItMark;
}
