/**
 * URL templates
 *
 * Placeholders are `{k}` or `$k`, where `k` is a capture group number and
 * `0` stands for the whole match. Groups that did not take part in the
 * match, or that the pattern does not have, substitute as an empty string.
 *
 * @module autolink/templates
 */

const placeholderRe = /\{(\d+)\}|\$(\d+)/g;

/**
 * Group numbers referenced by a template, in order of appearance.
 */
export function templateReferences(template: string): number[] {
    return Array.from(template.matchAll(placeholderRe), match => Number(match[1] ?? match[2]));
}

export function substituteTemplate(template: string, captures: ReadonlyArray<string | undefined>): string {
    return template.replace(placeholderRe, (_placeholder, braced: string | undefined, dollar: string | undefined) => {
        const index = Number(braced ?? dollar);
        return captures[index] ?? '';
    });
}
