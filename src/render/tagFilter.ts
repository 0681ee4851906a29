import { FILTERED_HTML_TAGS } from '../constants/MarkdownConstants';

const filteredTagRe = new RegExp(`<(/?)(${FILTERED_HTML_TAGS.join('|')})(?=[\\s/>]|$)`, 'gi');

/**
 * GFM tag filter: the `<` opening any disallowed tag becomes `&lt;`, so the tag
 * shows as text instead of taking effect. Other raw HTML passes unchanged.
 */
export function filterRawHtml(html: string): string {
    return html.replace(filteredTagRe, '&lt;$1$2');
}
