/**
 * Indico-flavoured markdown rendering.
 *
 * `render` turns markdown into HTML, linking text that matches caller-supplied
 * rules; `renderUnstyled` produces the plain variant used where only the text
 * matters.
 */

import { applyAutolinks } from './autolink/Autolinker';
import { LinkRulesInput, resolveRuleSet } from './autolink/ruleInput';
import { RuleSet } from './autolink/RuleSet';
import { RenderOptions, UnstyledRenderOptions, resolveRenderOptions } from './config/RenderConfiguration';
import { parse } from './markdown/pipeline';
import { renderDocumentHtml } from './render/styledRenderer';
import { renderUnstyledDocumentHtml } from './render/unstyledRenderer';

/**
 * Renders markdown with the full extension set and runtime autolink rules.
 *
 * @param rules - a compiled RuleSet, or rules in any shape `toLinkRuleSources` accepts
 * @throws InvalidPatternError when a rule's pattern does not compile
 * @throws TypeError when a rule or option has the wrong type
 */
export function render(
    source: string,
    rules: RuleSet | LinkRulesInput = [],
    options: Partial<RenderOptions> = {}
): string {
    const ruleSet = resolveRuleSet(rules);
    const resolved = resolveRenderOptions(options);

    const doc = parse(source, 'styled');
    const linked = applyAutolinks(doc, ruleSet, { setTitle: resolved.autolinkTitle });

    return renderDocumentHtml(linked, resolved);
}

/**
 * Renders markdown as paragraphs of escaped text without styling or links.
 */
export function renderUnstyled(source: string, options: Partial<UnstyledRenderOptions> = {}): string {
    return renderUnstyledDocumentHtml(parse(source, 'unstyled'), options);
}

export { RuleSet } from './autolink/RuleSet';
export type { LinkRule, LinkRuleSource } from './autolink/RuleSet';
export { InvalidPatternError, TemplateReferenceWarning } from './autolink/errors';
export { applyAutolinks, findRuleMatches, resolveMatches, splitTextByMatches } from './autolink/Autolinker';
export type { AutolinkMatch, AutolinkOptions } from './autolink/Autolinker';
export { resolveRuleSet, toLinkRuleSources } from './autolink/ruleInput';
export type { LinkRulePair, LinkRulesInput } from './autolink/ruleInput';
export { substituteTemplate, templateReferences } from './autolink/templates';
export {
    DEFAULT_RENDER_OPTIONS,
    DEFAULT_UNSTYLED_RENDER_OPTIONS,
    resolveRenderOptions,
    resolveUnstyledRenderOptions
} from './config/RenderConfiguration';
export type { RenderOptions, UnstyledRenderOptions } from './config/RenderConfiguration';
export { parse } from './markdown/pipeline';
export type { MarkdownFlavor } from './markdown/markdownItFactory';
export * from './markdown/types';
export { renderDocumentHtml } from './render/styledRenderer';
export { renderUnstyledDocumentHtml } from './render/unstyledRenderer';
export { Logger, logger } from './utils/logger';
