/**
 * Rule input adapter
 *
 * Callers describe rules in whichever shape suits them: `[pattern, template]`
 * pairs (the pattern a RegExp or its source), `{ pattern, template }` objects,
 * a plain object mapping pattern sources to templates, or a Map. Values come
 * from untyped callers too, so their types are checked here.
 *
 * Rule order is priority. Plain objects list integer-like keys (`'12'`) first
 * in ascending order, before all other keys; use pairs or a Map when that
 * would reorder rules.
 *
 * @module autolink/ruleInput
 */

import { LinkRuleSource, RuleSet } from './RuleSet';

export type LinkRulePair = readonly [string | RegExp, string];

export type LinkRulesInput =
    | ReadonlyArray<LinkRulePair | LinkRuleSource>
    | ReadonlyMap<string | RegExp, string>
    | Readonly<Record<string, string>>;

function toSource(pattern: unknown, template: unknown, index: number): LinkRuleSource {
    if (typeof pattern !== 'string' && !(pattern instanceof RegExp)) {
        throw new TypeError(`Rule ${index}: regular expression is not a valid string or RegExp`);
    }
    if (typeof template !== 'string') {
        throw new TypeError(`Rule ${index}: URL pattern is not a valid string`);
    }
    return { pattern, template };
}

function isPair(entry: LinkRulePair | LinkRuleSource): entry is LinkRulePair {
    return Array.isArray(entry);
}

function isRuleList(input: LinkRulesInput): input is ReadonlyArray<LinkRulePair | LinkRuleSource> {
    return Array.isArray(input);
}

function isRuleMap(input: LinkRulesInput): input is ReadonlyMap<string | RegExp, string> {
    return input instanceof Map;
}

/**
 * Normalizes any accepted rule shape into ordered rule sources. Order is the
 * array order, insertion order for maps, and `Object.entries` order for plain
 * objects (integer-like keys ascending, then the rest in insertion order).
 */
export function toLinkRuleSources(input: LinkRulesInput): LinkRuleSource[] {
    if (isRuleList(input)) {
        return input.map((entry, index) => isPair(entry)
            ? toSource(entry[0], entry[1], index)
            : toSource(entry.pattern, entry.template, index));
    }

    if (isRuleMap(input)) {
        return Array.from(input.entries(), ([pattern, template], index) => toSource(pattern, template, index));
    }

    return Object.entries(input).map(([pattern, template], index) => toSource(pattern, template, index));
}

/**
 * Accepts an already compiled RuleSet as is, or compiles any other rule input.
 */
export function resolveRuleSet(rules: RuleSet | LinkRulesInput): RuleSet {
    if (rules instanceof RuleSet) {
        return rules;
    }
    return RuleSet.compile(toLinkRuleSources(rules));
}
