import { substituteTemplate, templateReferences } from '../../autolink/templates';

describe('Autolink templates', () => {
    it('lists referenced groups in order of appearance', () => {
        expect(templateReferences('https://x/{1}/$2?all={0}&n={10}')).toEqual([1, 2, 0, 10]);
        expect(templateReferences('https://x/static')).toEqual([]);
    });

    it('substitutes both placeholder forms', () => {
        const captures = ['#12-a', '12', 'a'];

        expect(substituteTemplate('https://x/{1}?v=$2', captures)).toBe('https://x/12?v=a');
        expect(substituteTemplate('https://x/search?q={0}', captures)).toBe('https://x/search?q=#12-a');
    });

    it('substitutes missing and non-participating groups as empty strings', () => {
        expect(substituteTemplate('https://x/{1}/{2}/{7}', ['m', 'one', undefined])).toBe('https://x/one//');
    });

    it('leaves text that is not a placeholder alone', () => {
        expect(substituteTemplate('https://x/{a}/$/{}', ['m'])).toBe('https://x/{a}/$/{}');
    });
});
