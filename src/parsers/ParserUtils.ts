/**
 * Parser utilities and shared helper methods
 */

import { indexOutsideQuotes } from '../utils';
import type { Condition } from '../types/Ast.type';
import { parseConditions } from './ConditionParser';

export const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*';

/**
 * Name of a function or variable, optionally dotted (`utils.format`)
 */
export const QUALIFIED_NAME = `${IDENTIFIER}(?:\\.${IDENTIFIER})*`;

/**
 * A double-quoted string literal with backslash escapes, including its quotes
 */
export const QUOTED_STRING = '"(?:[^"\\\\]|\\\\.)*"';

/**
 * One source line, trimmed, with its 1-based line number
 */
export interface SourceLine {
    text: string;
    line: number;
}

/**
 * Split a trailing `if <cond>` guard off a line
 *
 * @param text - Action text, e.g. `say "hi" if mood equals "happy"`
 * @param line - Line number for errors
 * @returns The text before the guard and the parsed guard conditions
 */
export function splitTrailingGuard(text: string, line: number): { body: string; conditions: Condition[] } {
    const index = indexOutsideQuotes(text, ' if ');
    if (index === -1) {
        return { body: text.trim(), conditions: [] };
    }
    return {
        body: text.slice(0, index).trim(),
        conditions: parseConditions(text.slice(index + 4), line)
    };
}

/**
 * Parse the remainder after a trigger or step head: empty, or `if <cond>`.
 * Returns null when the remainder is anything else.
 */
export function parseOptionalGuard(rest: string, line: number): Condition[] | null {
    const trimmed = rest.trim();
    if (trimmed === '') {
        return [];
    }
    const match = trimmed.match(/^if\s+(.+)$/);
    return match ? parseConditions(match[1], line) : null;
}
