/**
 * Markdown Constants
 *
 * Fixed vocabularies shared by the parser plugins and the renderers.
 *
 * @module constants/MarkdownConstants
 */

import type { AlertKind } from '../markdown/types';

/**
 * GitHub alert kinds, in the order GitHub documents them.
 */
export const ALERT_KINDS: readonly AlertKind[] = ['note', 'tip', 'important', 'warning', 'caution'];

/**
 * Titles shown above alert bodies.
 */
export const ALERT_TITLES: Readonly<Record<AlertKind, string>> = {
    note: 'Note',
    tip: 'Tip',
    important: 'Important',
    warning: 'Warning',
    caution: 'Caution'
};

/**
 * Tags disallowed by the GFM tag filter extension.
 */
export const FILTERED_HTML_TAGS: readonly string[] = [
    'title',
    'textarea',
    'style',
    'xmp',
    'iframe',
    'noembed',
    'noframes',
    'script',
    'plaintext'
];

/**
 * Prefix of heading ids when header ids are enabled.
 */
export const DEFAULT_HEADER_ID_PREFIX = 'indico-md-';
