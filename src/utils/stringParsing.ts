/**
 * String parsing utilities for flow scripts
 */

import type { Value } from './types';
import { stringifyValue } from './valueConversion';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*)\}/g;
const DURATION_PATTERN = /^(\d+)([smh]?)$/;

/**
 * Unescape the body of a double-quoted string (\" and \\ only)
 */
export function unescapeString(text: string): string {
    return text.replace(/\\(["\\])/g, '$1');
}

/**
 * Escape a string so it can be placed between double quotes again
 */
export function escapeString(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Remove one pair of surrounding quotes (double or single) and unescape the content.
 * Text that is not quoted is returned trimmed.
 */
export function unquote(text: string): string {
    const trimmed = text.trim();
    if (trimmed.length >= 2) {
        const first = trimmed[0];
        const last = trimmed[trimmed.length - 1];
        if ((first === '"' || first === "'") && first === last) {
            return unescapeString(trimmed.slice(1, -1));
        }
    }
    return trimmed;
}

/**
 * Check whether text is a single double-quoted string literal
 */
export function isQuoted(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length < 2 || trimmed[0] !== '"' || trimmed[trimmed.length - 1] !== '"') {
        return false;
    }
    // The closing quote must be the first unescaped quote after the opening one
    return findClosingQuote(trimmed, 0) === trimmed.length - 1;
}

/**
 * Find the index of the quote closing the string opened at `openIndex`.
 * Returns -1 when the string is unterminated.
 */
export function findClosingQuote(text: string, openIndex: number): number {
    const quote = text[openIndex];
    for (let i = openIndex + 1; i < text.length; i++) {
        const char = text[i];
        if (char === '\\') {
            i++;
            continue;
        }
        if (char === quote) {
            return i;
        }
    }
    return -1;
}

/**
 * Find `needle` in `text` at the top level: outside quoted strings and outside
 * (), [] and {} groups. Returns -1 when not found.
 *
 * @param text - Text to search
 * @param needle - Literal substring to look for
 * @param fromIndex - Index to start searching at
 */
export function indexOutsideQuotes(text: string, needle: string, fromIndex: number = 0): number {
    let depth = 0;
    let i = fromIndex;

    while (i < text.length) {
        const char = text[i];

        if (char === '"' || char === "'") {
            const close = findClosingQuote(text, i);
            if (close === -1) {
                return -1;
            }
            i = close + 1;
            continue;
        }

        if (depth === 0 && text.startsWith(needle, i)) {
            return i;
        }

        if (char === '(' || char === '[' || char === '{') {
            depth++;
        } else if ((char === ')' || char === ']' || char === '}') && depth > 0) {
            depth--;
        }
        i++;
    }

    return -1;
}

/**
 * Split text on a separator that appears at the top level only
 */
export function splitOutsideQuotes(text: string, separator: string): string[] {
    const parts: string[] = [];
    let start = 0;
    let index = indexOutsideQuotes(text, separator, start);

    while (index !== -1) {
        parts.push(text.slice(start, index));
        start = index + separator.length;
        index = indexOutsideQuotes(text, separator, start);
    }
    parts.push(text.slice(start));

    return parts;
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones
 */
export function splitCsv(text: string): string[] {
    return splitOutsideQuotes(text, ',')
        .map(part => part.trim())
        .filter(part => part.length > 0);
}

/**
 * Parse a duration into seconds. Bare digits are seconds.
 *
 * @returns Seconds, or null when the text is not a duration
 */
export function parseDuration(text: string): number | null {
    const match = text.trim().match(DURATION_PATTERN);
    if (!match) {
        return null;
    }
    const amount = parseInt(match[1], 10);
    switch (match[2]) {
        case 'm':
            return amount * 60;
        case 'h':
            return amount * 3600;
        default:
            return amount;
    }
}

/**
 * Resolve a dotted variable path (`user.name`) against the variable map.
 * Returns undefined when any segment is missing.
 */
export function resolveVariablePath(path: string, variables: ReadonlyMap<string, Value>): Value | undefined {
    if (variables.has(path)) {
        return variables.get(path);
    }

    const [head, ...rest] = path.split('.');
    if (rest.length === 0 || !variables.has(head)) {
        return undefined;
    }

    let current: Value | undefined = variables.get(head);
    for (const segment of rest) {
        if (current === null || current === undefined || typeof current !== 'object') {
            return undefined;
        }
        current = readProperty(current, segment);
    }
    return current;
}

function readProperty(target: object, key: string): Value | undefined {
    if (Array.isArray(target)) {
        const index = Number(key);
        return Number.isInteger(index) ? target[index] : undefined;
    }
    const entry = Object.entries(target).find(([name]) => name === key);
    return entry ? entry[1] : undefined;
}

/**
 * Substitute every `{name}` placeholder with the stringified variable value.
 * Unknown names are left as they are. Runs a single pass, so the result of
 * substituting text without placeholders is the text itself.
 */
export function substituteVariables(text: string, variables: ReadonlyMap<string, Value>): string {
    return text.replace(PLACEHOLDER_PATTERN, (placeholder: string, path: string) => {
        const value = resolveVariablePath(path, variables);
        return value === undefined ? placeholder : stringifyValue(value);
    });
}
