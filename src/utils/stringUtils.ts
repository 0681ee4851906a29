/**
 * String utility functions
 *
 * @module utils/stringUtils
 */

/**
 * Escapes text for use in HTML element content and double-quoted attributes.
 *
 * @param str - The string to escape
 * @returns The escaped string
 */
export function escapeHtml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

/**
 * Extracts a string message from an unknown error value.
 * Safely handles Error objects, strings, and other types.
 *
 * @param error - The error value (typically from a catch block)
 * @returns A string representation of the error
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
