import {
    AutolinkMatch,
    applyAutolinks,
    findRuleMatches,
    resolveMatches,
    splitTextByMatches
} from '../../autolink/Autolinker';
import { RuleSet } from '../../autolink/RuleSet';
import { inlineNodesToText } from '../../markdown/utils';
import { DocumentNode, InlineNode, ParagraphNode } from '../../markdown/types';

function paragraph(...children: InlineNode[]): ParagraphNode {
    return { type: 'paragraph', children };
}

function text(literal: string): InlineNode {
    return { type: 'text', literal };
}

const issueRules = RuleSet.compile([{ pattern: '#(\\d+)', template: 'https://x/{1}' }]);

describe('findRuleMatches', () => {
    it('finds every non-overlapping match of each rule', () => {
        const matches = findRuleMatches('see #12 and #34', issueRules);

        expect(matches.map(match => [match.start, match.end, match.captures[1]])).toEqual([
            [4, 7, '12'],
            [12, 15, '34']
        ]);
    });

    it('drops zero-length matches', () => {
        const ruleSet = RuleSet.compile([{ pattern: 'x*', template: 'https://x/' }]);

        expect(findRuleMatches('abc', ruleSet)).toEqual([]);
        expect(findRuleMatches('axxb', ruleSet).map(match => [match.start, match.end])).toEqual([[1, 3]]);
    });

    it('reports offsets in UTF-16 units without splitting surrogate pairs', () => {
        const ruleSet = RuleSet.compile([{ pattern: 'TKT\\d', template: 'https://x/' }]);
        const [match] = findRuleMatches('😀TKT1 ok', ruleSet);

        expect(match.start).toBe(2);
        expect(match.end).toBe(6);
    });
});

describe('resolveMatches', () => {
    const candidate = (priority: number, start: number, end: number): AutolinkMatch => ({
        priority,
        start,
        end,
        captures: []
    });

    it('prefers the lower priority among matches starting together', () => {
        const accepted = resolveMatches([candidate(1, 0, 5), candidate(0, 0, 3)]);

        expect(accepted).toEqual([candidate(0, 0, 3)]);
    });

    it('prefers the longer match when start and priority are equal', () => {
        const accepted = resolveMatches([candidate(0, 2, 4), candidate(0, 2, 8)]);

        expect(accepted).toEqual([candidate(0, 2, 8)]);
    });

    it('returns sorted, disjoint matches', () => {
        const accepted = resolveMatches([
            candidate(1, 6, 9),
            candidate(1, 4, 8),
            candidate(0, 2, 6),
            candidate(2, 10, 11)
        ]);

        expect(accepted.map(match => [match.start, match.end])).toEqual([[2, 6], [6, 9], [10, 11]]);
        for (let i = 1; i < accepted.length; i += 1) {
            expect(accepted[i].start).toBeGreaterThanOrEqual(accepted[i - 1].end);
        }
    });
});

describe('splitTextByMatches', () => {
    it('keeps the original text when links and segments are read back', () => {
        const source = '#1 then #22, end';
        const nodes = splitTextByMatches(source, resolveMatches(findRuleMatches(source, issueRules)), issueRules);

        expect(nodes.map(node => node.type)).toEqual(['link', 'text', 'link', 'text']);
        expect(inlineNodesToText(nodes)).toBe(source);
    });

    it('handles text outside the ASCII range', () => {
        const ruleSet = RuleSet.compile([{ pattern: '#(\\d+)', template: 'https://x/$1' }]);
        const source = '见 #123 见';
        const nodes = splitTextByMatches(source, resolveMatches(findRuleMatches(source, ruleSet)), ruleSet);

        expect(nodes).toEqual([
            { type: 'text', literal: '见 ' },
            { type: 'link', href: 'https://x/123', title: '', children: [{ type: 'text', literal: '#123' }] },
            { type: 'text', literal: ' 见' }
        ]);
    });

    it('sets the matched text as title when asked to', () => {
        const accepted = resolveMatches(findRuleMatches('#7', issueRules));
        const [link] = splitTextByMatches('#7', accepted, issueRules, { setTitle: true });

        expect(link).toEqual({
            type: 'link',
            href: 'https://x/7',
            title: '#7',
            children: [{ type: 'text', literal: '#7' }]
        });
    });
});

describe('applyAutolinks', () => {
    it('returns the input document for an empty rule set', () => {
        const doc: DocumentNode = { type: 'document', children: [paragraph(text('#1'))] };

        expect(applyAutolinks(doc, RuleSet.empty)).toBe(doc);
    });

    it('returns the input document when nothing matches', () => {
        const doc: DocumentNode = { type: 'document', children: [paragraph(text('nothing here'))] };

        expect(applyAutolinks(doc, issueRules)).toBe(doc);
    });

    it('copies changed paths and shares untouched subtrees', () => {
        const untouched = paragraph(text('plain'));
        const changed = paragraph(text('fix #9'));
        const doc: DocumentNode = { type: 'document', children: [untouched, changed] };

        const result = applyAutolinks(doc, issueRules);

        expect(result).not.toBe(doc);
        expect(result.children[0]).toBe(untouched);
        expect(result.children[1]).toEqual(paragraph(
            text('fix '),
            { type: 'link', href: 'https://x/9', title: '', children: [text('#9')] }
        ));
        expect(changed.children).toEqual([text('fix #9')]);
    });

    it('descends into formatting, lists, tables and quotes', () => {
        const doc: DocumentNode = {
            type: 'document',
            children: [
                paragraph({ type: 'strong', children: [text('#1')] }),
                {
                    type: 'list',
                    ordered: false,
                    start: 1,
                    delimiter: '-',
                    tight: true,
                    children: [{ type: 'task_list_item', checked: true, children: [paragraph(text('#2'))] }]
                },
                {
                    type: 'table',
                    alignments: [null],
                    children: [{ type: 'table_row', header: true, children: [{ type: 'table_cell', children: [text('#3')] }] }]
                },
                { type: 'blockquote', children: [paragraph(text('#4'))] }
            ]
        };

        const result = applyAutolinks(doc, issueRules);
        const hrefs: string[] = [];
        const collect = (value: unknown): void => {
            if (Array.isArray(value)) {
                value.forEach(collect);
            } else if (value && typeof value === 'object') {
                if ('href' in value && typeof value.href === 'string') {
                    hrefs.push(value.href);
                }
                Object.values(value).forEach(collect);
            }
        };
        collect(result);

        expect(hrefs).toEqual(['https://x/1', 'https://x/2', 'https://x/3', 'https://x/4']);
    });

    it('leaves link text, code, math and images alone', () => {
        const doc: DocumentNode = {
            type: 'document',
            children: [paragraph(
                { type: 'link', href: 'https://elsewhere.example', title: '', children: [text('#1')] },
                { type: 'code', literal: '#2' },
                { type: 'math', literal: '#3', display: false },
                { type: 'image', src: '/a.png', alt: '#4', title: '' }
            )]
        };

        expect(applyAutolinks(doc, issueRules)).toBe(doc);
    });

    it('does not link text inside raw anchor HTML', () => {
        const doc: DocumentNode = {
            type: 'document',
            children: [paragraph(
                { type: 'html_inline', literal: '<a href="https://elsewhere.example">' },
                text('#1'),
                { type: 'html_inline', literal: '</a>' },
                text(' #2')
            )]
        };

        const result = applyAutolinks(doc, issueRules);
        const first = result.children[0];

        expect(first.type === 'paragraph' && first.children).toEqual([
            { type: 'html_inline', literal: '<a href="https://elsewhere.example">' },
            text('#1'),
            { type: 'html_inline', literal: '</a>' },
            text(' '),
            { type: 'link', href: 'https://x/2', title: '', children: [text('#2')] }
        ]);
    });
});
