/**
 * Render configuration
 *
 * Options for the styled and unstyled renderers, their defaults, and the
 * validation applied to options coming from untyped callers.
 */

import { DEFAULT_HEADER_ID_PREFIX } from '../constants/MarkdownConstants';

export interface RenderOptions {
    /** Render soft line breaks as `<br />`. */
    hardbreaks: boolean;
    /** Prefix of heading anchor ids; `null` renders headings without anchors. */
    headerIdPrefix: string | null;
    /** `target` attribute for every link, e.g. `_blank`; `null` for none. */
    linkTarget: string | null;
    /** Give links created by autolink rules the matched text as their title. */
    autolinkTitle: boolean;
    /** Apply the GFM tag filter to raw HTML. */
    tagFilter: boolean;
}

export interface UnstyledRenderOptions {
    hardbreaks: boolean;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
    hardbreaks: false,
    headerIdPrefix: DEFAULT_HEADER_ID_PREFIX,
    linkTarget: null,
    autolinkTitle: false,
    tagFilter: true
});

export const DEFAULT_UNSTYLED_RENDER_OPTIONS: Readonly<UnstyledRenderOptions> = Object.freeze({
    hardbreaks: false
});

function checkBoolean(name: string, value: unknown): void {
    if (typeof value !== 'boolean') {
        throw new TypeError(`Render option "${name}" must be a boolean`);
    }
}

function checkNullableString(name: string, value: unknown): void {
    if (value !== null && typeof value !== 'string') {
        throw new TypeError(`Render option "${name}" must be a string or null`);
    }
}

/**
 * Merges caller options over the defaults and checks their types.
 */
export function resolveRenderOptions(options: Partial<RenderOptions> = {}): RenderOptions {
    const resolved: RenderOptions = {
        hardbreaks: options.hardbreaks ?? DEFAULT_RENDER_OPTIONS.hardbreaks,
        headerIdPrefix: options.headerIdPrefix === undefined ? DEFAULT_RENDER_OPTIONS.headerIdPrefix : options.headerIdPrefix,
        linkTarget: options.linkTarget === undefined ? DEFAULT_RENDER_OPTIONS.linkTarget : options.linkTarget,
        autolinkTitle: options.autolinkTitle ?? DEFAULT_RENDER_OPTIONS.autolinkTitle,
        tagFilter: options.tagFilter ?? DEFAULT_RENDER_OPTIONS.tagFilter
    };

    checkBoolean('hardbreaks', resolved.hardbreaks);
    checkBoolean('autolinkTitle', resolved.autolinkTitle);
    checkBoolean('tagFilter', resolved.tagFilter);
    checkNullableString('headerIdPrefix', resolved.headerIdPrefix);
    checkNullableString('linkTarget', resolved.linkTarget);

    return resolved;
}

export function resolveUnstyledRenderOptions(options: Partial<UnstyledRenderOptions> = {}): UnstyledRenderOptions {
    const resolved: UnstyledRenderOptions = {
        hardbreaks: options.hardbreaks ?? DEFAULT_UNSTYLED_RENDER_OPTIONS.hardbreaks
    };
    checkBoolean('hardbreaks', resolved.hardbreaks);
    return resolved;
}
