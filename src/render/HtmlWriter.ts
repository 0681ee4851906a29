/**
 * Output buffer for the renderers.
 *
 * Follows the CommonMark reference renderer's line discipline: block-level
 * output starts on a fresh line (`cr`) and block close tags end with a newline.
 */
export class HtmlWriter {
    private readonly parts: string[] = [];
    private lastChar = '\n';

    public write(text: string): void {
        if (!text) {
            return;
        }
        this.parts.push(text);
        this.lastChar = text.charAt(text.length - 1);
    }

    /** Starts a new line unless the output is empty or already at one. */
    public cr(): void {
        if (this.lastChar !== '\n') {
            this.write('\n');
        }
    }

    public toString(): string {
        return this.parts.join('');
    }
}
