/**
 * Heading anchors: lower-cased text with punctuation removed and spaces
 * turned into hyphens. Repeated slugs within one document get `-1`, `-2`, …
 */
export class HeadingSlugger {
    private readonly seen = new Map<string, number>();

    public slug(text: string): string {
        const base = text
            .toLowerCase()
            .replace(/[^\p{L}\p{M}\p{N}\p{Pc}\s-]/gu, '')
            .trim()
            .replace(/\s/g, '-');

        const count = this.seen.get(base);
        if (count === undefined) {
            this.seen.set(base, 0);
            return base;
        }

        let next = count + 1;
        while (this.seen.has(`${base}-${next}`)) {
            next += 1;
        }
        this.seen.set(base, next);
        this.seen.set(`${base}-${next}`, 0);
        return `${base}-${next}`;
    }
}
