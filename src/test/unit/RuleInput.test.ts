import { LinkRulePair, LinkRulesInput, resolveRuleSet, toLinkRuleSources } from '../../autolink/ruleInput';
import { RuleSet } from '../../autolink/RuleSet';

describe('Rule input', () => {
    it('accepts pattern/template pairs', () => {
        const pairs: LinkRulePair[] = [
            ['#(\\d+)', 'https://x/{1}'],
            [/gh:(\d+)/, 'https://gh.example/{1}']
        ];

        expect(toLinkRuleSources(pairs)).toEqual([
            { pattern: '#(\\d+)', template: 'https://x/{1}' },
            { pattern: /gh:(\d+)/, template: 'https://gh.example/{1}' }
        ]);
    });

    it('accepts rule objects, maps and plain objects in insertion order', () => {
        expect(toLinkRuleSources([{ pattern: 'a', template: 'https://a/' }])).toEqual([
            { pattern: 'a', template: 'https://a/' }
        ]);

        const map = new Map<string | RegExp, string>([['b', 'https://b/'], ['c', 'https://c/']]);
        expect(toLinkRuleSources(map)).toEqual([
            { pattern: 'b', template: 'https://b/' },
            { pattern: 'c', template: 'https://c/' }
        ]);

        expect(toLinkRuleSources({ 'd+': 'https://d/', e: 'https://e/' })).toEqual([
            { pattern: 'd+', template: 'https://d/' },
            { pattern: 'e', template: 'https://e/' }
        ]);
    });

    it('lists integer-like object keys first, unlike maps', () => {
        expect(toLinkRuleSources({ '\\d+': 'https://first/', '12': 'https://second/' })).toEqual([
            { pattern: '12', template: 'https://second/' },
            { pattern: '\\d+', template: 'https://first/' }
        ]);

        const map = new Map<string | RegExp, string>([['\\d+', 'https://first/'], ['12', 'https://second/']]);
        expect(toLinkRuleSources(map).map(source => source.pattern)).toEqual(['\\d+', '12']);
    });

    it('rejects templates that are not strings', () => {
        const input: LinkRulesInput = JSON.parse('[["ok", "https://ok/"], ["x", 5]]');

        expect(() => toLinkRuleSources(input)).toThrow(new TypeError('Rule 1: URL pattern is not a valid string'));
    });

    it('rejects patterns that are neither strings nor regular expressions', () => {
        const input: LinkRulesInput = JSON.parse('[{ "pattern": 42, "template": "https://x/" }]');

        expect(() => toLinkRuleSources(input)).toThrow(
            new TypeError('Rule 0: regular expression is not a valid string or RegExp')
        );
    });

    it('passes compiled rule sets through', () => {
        const ruleSet = RuleSet.compile([{ pattern: 'a', template: 'https://a/' }]);

        expect(resolveRuleSet(ruleSet)).toBe(ruleSet);
        expect(resolveRuleSet([])).toBe(RuleSet.empty);
        expect(resolveRuleSet({ a: 'https://a/' }).rules).toHaveLength(1);
    });
});
