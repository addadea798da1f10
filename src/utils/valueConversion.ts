/**
 * Value conversion and type checking utilities
 */

import JSON5 from 'json5';
import type { Value } from './types';

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d+\.\d+$/;

/**
 * Convert a Value to the text used in output and comparisons
 */
export function stringifyValue(val: Value | undefined): string {
    if (val === null || val === undefined) {
        return 'null';
    }
    if (typeof val === 'string') {
        return val;
    }
    if (typeof val === 'number' || typeof val === 'boolean') {
        return String(val);
    }
    return JSON.stringify(val);
}

/**
 * Whether text looks like a JSON document or JSON string
 */
export function isJsonLike(text: string): boolean {
    const first = text.trim()[0];
    return first === '{' || first === '[' || first === '"';
}

/**
 * Best-effort literal coercion used for config values, variable defaults and
 * unquoted assignments:
 * - JSON-looking text is parsed with JSON5 (kept as text when invalid)
 * - true/false become booleans
 * - digit strings become integers, decimals become numbers
 * - anything else stays a string
 */
export function coerceLiteral(text: string): Value {
    const trimmed = text.trim();

    if (isJsonLike(trimmed)) {
        try {
            const parsed: unknown = JSON5.parse(trimmed);
            return toValue(parsed);
        } catch {
            return trimmed;
        }
    }
    if (trimmed === 'true') {
        return true;
    }
    if (trimmed === 'false') {
        return false;
    }
    if (INTEGER_PATTERN.test(trimmed)) {
        return parseInt(trimmed, 10);
    }
    if (DECIMAL_PATTERN.test(trimmed)) {
        return parseFloat(trimmed);
    }
    return trimmed;
}

/**
 * Narrow an unknown (for example a decoded JSON body) to a Value
 */
export function toValue(input: unknown): Value {
    if (input === null || input === undefined) {
        return null;
    }
    if (typeof input === 'string' || typeof input === 'number' || typeof input === 'boolean') {
        return input;
    }
    if (typeof input === 'object') {
        return input;
    }
    return String(input);
}

/**
 * Convert a value to a finite number, or null when it has no numeric reading
 */
export function toNumber(val: Value | undefined): number | null {
    if (typeof val === 'number') {
        return Number.isFinite(val) ? val : null;
    }
    if (typeof val === 'boolean') {
        return val ? 1 : 0;
    }
    if (typeof val === 'string' && val.trim() !== '') {
        const parsed = Number(val.trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

