/**
 * Logger - Centralized logging helper for the rendering pipeline.
 *
 * Normal (debug/info) output is muted when debug mode is disabled,
 * but warnings and errors always pass through so rule problems still reach the console.
 */
export class Logger {
    private debugMode = false;

    constructor(private readonly prefix: string = '[indico-markdown]') {}

    public setDebugMode(enabled: boolean): void {
        this.debugMode = enabled;
    }

    public isDebugEnabled(): boolean {
        return this.debugMode;
    }

    public debug(...args: unknown[]): void {
        if (this.debugMode) {
            console.log(this.prefix, ...args);
        }
    }

    public info(...args: unknown[]): void {
        if (this.debugMode) {
            console.info(this.prefix, ...args);
        }
    }

    public warn(...args: unknown[]): void {
        console.warn(this.prefix, ...args);
    }

    public error(...args: unknown[]): void {
        console.error(this.prefix, ...args);
    }
}

export const logger = new Logger();
