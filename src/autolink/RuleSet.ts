import { InvalidPatternError, TemplateReferenceWarning } from './errors';
import { templateReferences } from './templates';
import { getErrorMessage } from '../utils/stringUtils';
import { logger } from '../utils/logger';

/**
 * A rule as callers supply it: a pattern (source text or a RegExp) and a URL template.
 */
export type LinkRuleSource = {
    pattern: string | RegExp;
    template: string;
};

export type LinkRule = {
    /**
     * Global expression; use with `matchAll`, never `exec`. Unicode mode when the
     * source allows it, so matches never split a surrogate pair; patterns only
     * valid outside unicode mode (e.g. `\-`, `\#`) get no such guarantee.
     */
    readonly pattern: RegExp;
    readonly template: string;
    /** Input position; lower wins ties between matches starting at the same offset. */
    readonly priority: number;
    readonly groupCount: number;
};

// Only flags that change what a pattern matches carry over from a RegExp input
const carriedFlags = new Set(['i', 'm', 's']);

function patternParts(pattern: string | RegExp): { source: string; flags: string } {
    if (typeof pattern === 'string') {
        return { source: pattern, flags: '' };
    }
    const flags = Array.from(pattern.flags).filter(flag => carriedFlags.has(flag)).join('');
    return { source: pattern.source, flags };
}

function compilePattern(pattern: string | RegExp, index: number): RegExp {
    const { source, flags } = patternParts(pattern);
    try {
        return new RegExp(source, `g${flags}u`);
    } catch (unicodeError) {
        if (!(unicodeError instanceof SyntaxError)) {
            throw unicodeError;
        }
    }

    // Unicode mode rejects identity escapes and lone braces the legacy syntax allows
    try {
        return new RegExp(source, `g${flags}`);
    } catch (error) {
        throw new InvalidPatternError(index, source, getErrorMessage(error));
    }
}

function countGroups(pattern: RegExp): number {
    // An empty alternative always matches, so exec reports every group slot
    const probe = new RegExp(`(?:${pattern.source})|`, pattern.flags.replace('g', '')).exec('');
    return probe ? probe.length - 1 : 0;
}

/**
 * Ordered, compiled autolink rules. Immutable once built and safe to share
 * between render calls.
 */
export class RuleSet {
    public static readonly empty = new RuleSet([], []);

    private constructor(
        public readonly rules: readonly LinkRule[],
        public readonly warnings: readonly TemplateReferenceWarning[]
    ) {
        Object.freeze(this.rules);
        Object.freeze(this.warnings);
        Object.freeze(this);
    }

    public get isEmpty(): boolean {
        return this.rules.length === 0;
    }

    /**
     * Compiles every pattern in order. The first pattern that does not compile
     * throws an InvalidPatternError and no rule set is produced.
     */
    public static compile(sources: ReadonlyArray<LinkRuleSource>): RuleSet {
        if (sources.length === 0) {
            return RuleSet.empty;
        }

        const rules: LinkRule[] = [];
        const warnings: TemplateReferenceWarning[] = [];

        sources.forEach((source, index) => {
            const pattern = compilePattern(source.pattern, index);
            const groupCount = countGroups(pattern);

            for (const groupIndex of new Set(templateReferences(source.template))) {
                if (groupIndex > groupCount) {
                    warnings.push(new TemplateReferenceWarning(index, groupIndex, groupCount));
                }
            }

            rules.push(Object.freeze({ pattern, template: source.template, priority: index, groupCount }));
        });

        warnings.forEach(warning => logger.warn(warning.message));
        logger.debug(`compiled ${rules.length} autolink rule(s)`);

        return new RuleSet(rules, warnings);
    }
}
