import type MarkdownIt from 'markdown-it';
import { ALERT_KINDS } from '../constants/MarkdownConstants';
import type { AlertKind } from './types';

type InlineRule = Parameters<MarkdownIt['inline']['ruler']['before']>[2];
type CoreRule = Parameters<MarkdownIt['core']['ruler']['push']>[1];
type InlineState = Parameters<InlineRule>[0];
type CoreState = Parameters<CoreRule>[0];
type Token = CoreState['tokens'][number];

function isWhitespace(code: number): boolean {
    return code === 0x20 /* space */ || code === 0x09 /* tab */ || code === 0x0A /* newline */;
}

function isDigit(code: number): boolean {
    return code >= 0x30 && code <= 0x39;
}

/**
 * Math spans: `$inline$`, `$$display$$` and the code form `` $`inline`$ ``.
 * Emits `math_inline` tokens whose `meta.display` tells the two styles apart.
 */
export function mathPlugin(md: MarkdownIt): void {
    function pushMath(state: InlineState, content: string, markup: string, display: boolean): void {
        const token = state.push('math_inline', 'span', 0);
        token.content = content;
        token.markup = markup;
        token.meta = { display };
    }

    function parseMath(state: InlineState, silent: boolean): boolean {
        const start = state.pos;
        const max = state.posMax;
        const src = state.src;

        if (src.charCodeAt(start) !== 0x24 /* $ */) { return false; }
        if (start + 1 >= max) { return false; }

        const next = src.charCodeAt(start + 1);

        if (next === 0x60 /* ` */) {
            const end = src.indexOf('`$', start + 2);
            if (end < 0 || end + 2 > max || end === start + 2) { return false; }
            if (!silent) {
                pushMath(state, src.slice(start + 2, end), '$`', false);
            }
            state.pos = end + 2;
            return true;
        }

        if (next === 0x24 /* $ */) {
            const end = src.indexOf('$$', start + 2);
            if (end < 0 || end + 2 > max || end === start + 2) { return false; }
            if (!silent) {
                pushMath(state, src.slice(start + 2, end), '$$', true);
            }
            state.pos = end + 2;
            return true;
        }

        if (isWhitespace(next)) { return false; }

        let pos = start + 1;
        while (pos < max) {
            if (src.charCodeAt(pos) === 0x24 /* $ */ &&
                src.charCodeAt(pos - 1) !== 0x5C /* \ */ &&
                !isWhitespace(src.charCodeAt(pos - 1)) &&
                !(pos + 1 < max && isDigit(src.charCodeAt(pos + 1)))) {
                break;
            }
            pos += 1;
        }

        if (pos >= max) { return false; }

        if (!silent) {
            pushMath(state, src.slice(start + 1, pos), '$', false);
        }
        state.pos = pos + 1;
        return true;
    }

    md.inline.ruler.before('escape', 'math_inline', parseMath);
}

/**
 * `__text__` renders as underline instead of strong emphasis.
 * markdown-it parses both `**` and `__` into strong tokens; the markup tells them apart.
 */
export function underlinePlugin(md: MarkdownIt): void {
    function retag(tokens: Token[]): void {
        for (const token of tokens) {
            if (token.children) {
                retag(token.children);
            }
            if (token.markup !== '__') {
                continue;
            }
            if (token.type === 'strong_open') {
                token.type = 'underline_open';
                token.tag = 'u';
            } else if (token.type === 'strong_close') {
                token.type = 'underline_close';
                token.tag = 'u';
            }
        }
    }

    md.core.ruler.push('underline', (state: CoreState) => {
        retag(state.tokens);
    });
}

const alertMarkerRe = /^\[!([a-z]+)\]$/i;

function toAlertKind(value: string): AlertKind | null {
    const kind = value.toLowerCase();
    return ALERT_KINDS.find(candidate => candidate === kind) ?? null;
}

/**
 * GitHub alerts: a blockquote whose first line is `[!NOTE]`, `[!TIP]`, `[!IMPORTANT]`,
 * `[!WARNING]` or `[!CAUTION]`. The marker line is removed and the blockquote_open
 * token carries the kind in `meta.alert`.
 */
export function alertPlugin(md: MarkdownIt): void {
    md.core.ruler.push('alert', (state: CoreState) => {
        const tokens = state.tokens;

        for (let i = 0; i + 2 < tokens.length; i += 1) {
            const open = tokens[i];
            const paragraph = tokens[i + 1];
            const inline = tokens[i + 2];

            if (open.type !== 'blockquote_open' ||
                paragraph.type !== 'paragraph_open' ||
                inline.type !== 'inline') {
                continue;
            }

            const lines = inline.content.split('\n');
            const match = lines[0].trim().match(alertMarkerRe);
            const kind = match ? toAlertKind(match[1]) : null;
            if (!kind) {
                continue;
            }

            open.meta = { ...(open.meta ?? {}), alert: kind };

            const children = inline.children ?? [];
            const breakIndex = children.findIndex(child => child.type === 'softbreak' || child.type === 'hardbreak');

            if (breakIndex < 0) {
                // Marker-only paragraph: drop paragraph_open, inline and paragraph_close
                tokens.splice(i + 1, 3);
                continue;
            }

            inline.children = children.slice(breakIndex + 1);
            inline.content = lines.slice(1).join('\n');
        }
    });
}
