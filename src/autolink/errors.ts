/**
 * Raised when a rule's pattern does not compile. Compilation of the whole
 * rule set is aborted; `index` is the rule's position in the input.
 */
export class InvalidPatternError extends Error {
    constructor(
        public readonly index: number,
        public readonly pattern: string,
        public readonly reason: string
    ) {
        super(`Invalid pattern at rule ${index} (${pattern}): ${reason}`);
        this.name = 'InvalidPatternError';
    }
}

/**
 * Non-fatal: a template references a capture group its pattern cannot produce.
 * The reference renders as an empty string.
 */
export class TemplateReferenceWarning {
    public readonly message: string;

    constructor(
        public readonly ruleIndex: number,
        public readonly groupIndex: number,
        public readonly groupCount: number
    ) {
        this.message = `Template of rule ${ruleIndex} references group ${groupIndex}, but its pattern has ${groupCount} group(s)`;
    }
}
