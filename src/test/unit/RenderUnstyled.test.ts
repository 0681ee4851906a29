import { DocumentNode, renderUnstyled, renderUnstyledDocumentHtml } from '../../index';

describe('renderUnstyled', () => {
    it('renders an empty document as an empty string', () => {
        expect(renderUnstyled('')).toBe('');
    });

    it('keeps paragraphs and line breaks, dropping other markup', () => {
        expect(renderUnstyled('## title\n[`link`](https://example.com)\\\n`more` **text**'))
            .toBe('title\n<p>link<br />\nmore text</p>\n');
        expect(renderUnstyled('**bold** [link](http://x)')).toBe('<p>bold link</p>\n');
    });

    it('drops raw HTML but keeps the text around it', () => {
        expect(renderUnstyled('[**Foo**](https://example.com)\n\n==B`ar`==<div>foo</div>'))
            .toBe('<p>Foo</p>\n<p>Barfoo</p>\n');
        expect(renderUnstyled('<div>\nblock\n</div>')).toBe('');
    });

    it('prints image alt text, and nothing for images without one', () => {
        expect(renderUnstyled('![alt](/y.png) ![](/x.png)')).toBe('<p>alt </p>\n');
    });

    it('prints math literals as escaped text', () => {
        const doc: DocumentNode = {
            type: 'document',
            children: [{
                type: 'paragraph',
                children: [
                    { type: 'text', literal: 'so ' },
                    { type: 'math', literal: 'a<b', display: false },
                    { type: 'text', literal: ' and ' },
                    { type: 'math', literal: 'x^2 & y', display: true }
                ]
            }]
        };

        expect(renderUnstyledDocumentHtml(doc)).toBe('<p>so a&lt;b and x^2 &amp; y</p>\n');
    });

    it('leaves no styling markup behind', () => {
        const html = renderUnstyled(
            '# Head\n\n| a | b |\n|---|---|\n| 1 | 2 |\n\n![i](/i.png) [l](https://l.example) `c` *e* **s**'
        );

        expect(html).toBe('Head\na | b\n1 | 2\n<p>i l c e s</p>\n');
        for (const markup of ['<a', '<img', '<table', '<code>', '<h1>', '<em>', '<strong>']) {
            expect(html).not.toContain(markup);
        }
    });

    it('escapes text', () => {
        expect(renderUnstyled('a < b & `<c>`')).toBe('<p>a &lt; b &amp; &lt;c&gt;</p>\n');
    });

    it('prints lists one item per line', () => {
        expect(renderUnstyled('* a list\n* of\n  - nested\n* things'))
            .toBe('  * a list\n  * of\n    - nested\n  * things\n');
        expect(renderUnstyled('2) a\n3) b')).toBe('  2) a\n  3) b\n');
        expect(renderUnstyled('- [x] done\n- [ ] todo')).toBe('  - [x] done\n  - [ ] todo\n');
    });

    it('prints table rows one per line', () => {
        expect(renderUnstyled('| a | b |\n|---|---|\n| 1 | *2* |')).toBe('a | b\n1 | 2\n');
    });

    it('prints code blocks as escaped text', () => {
        expect(renderUnstyled('```\nx < y\n```')).toBe('x &lt; y\n');
    });

    it('renders quotes as their content and skips thematic breaks', () => {
        expect(renderUnstyled('> quoted\n\n---\n\nafter')).toBe('<p>quoted</p>\n<p>after</p>\n');
    });

    it('does not link bare URLs or math', () => {
        expect(renderUnstyled('see https://example.com for $x$')).toBe('<p>see https://example.com for $x$</p>\n');
    });

    it('honours hardbreaks', () => {
        expect(renderUnstyled('a\nb')).toBe('<p>a\nb</p>\n');
        expect(renderUnstyled('a\nb', { hardbreaks: true })).toBe('<p>a<br />\nb</p>\n');
    });
});
