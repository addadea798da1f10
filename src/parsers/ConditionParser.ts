/**
 * Parser for condition conjunctions
 *
 * Guard syntax (triggers, action guards, `before stop`):
 *   mood equals "happy" and topic contains "weather"
 *   score greater_than "10" and score < 20
 *
 * `if` action conditions use the same operators but allow any operand
 * (`{name} equals "Ada"`) and are evaluated after variable substitution.
 */

import { indexOutsideQuotes, splitOutsideQuotes, unquote } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { Condition, ConditionType } from '../types/Ast.type';

const OPERATORS: ReadonlyArray<{ token: string; type: ConditionType }> = [
    { token: 'equals', type: 'equals' },
    { token: 'contains', type: 'contains' },
    { token: 'greater_than', type: 'greater_than' },
    { token: 'less_than', type: 'less_than' },
    { token: '==', type: 'equals' },
    { token: '>', type: 'greater_than' },
    { token: '<', type: 'less_than' }
];

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*$/;

/**
 * A comparison split into its raw operands
 */
export interface Comparison {
    left: string;
    type: ConditionType;
    right: string;
}

/**
 * Split one clause at its first top-level operator.
 * Returns null when the clause has no operator.
 */
export function splitComparison(clause: string): Comparison | null {
    let best: { index: number; token: string; type: ConditionType } | null = null;

    for (const operator of OPERATORS) {
        const index = indexOutsideQuotes(clause, ` ${operator.token} `);
        if (index !== -1 && (best === null || index < best.index)) {
            best = { index, token: operator.token, type: operator.type };
        }
    }

    if (!best) {
        return null;
    }

    const left = clause.slice(0, best.index).trim();
    const right = clause.slice(best.index + best.token.length + 2).trim();
    if (left === '' || right === '') {
        return null;
    }
    return { left, type: best.type, right };
}

/**
 * Split a conjunction into its clauses
 */
export function splitConjunction(text: string): string[] {
    return splitOutsideQuotes(text, ' and ').map(clause => clause.trim());
}

/**
 * Parse a guard conjunction into conditions
 *
 * @param text - Condition text without the leading `if`
 * @param line - Line number for errors
 */
export function parseConditions(text: string, line: number): Condition[] {
    if (text.trim() === '') {
        throw new ParseError('Expected a condition after "if"', line);
    }

    return splitConjunction(text).map(clause => {
        const comparison = splitComparison(clause);
        if (!comparison) {
            throw new ParseError(`Invalid condition: ${clause}`, line);
        }
        if (!VARIABLE_NAME.test(comparison.left)) {
            throw new ParseError(`Condition must start with a variable name: ${clause}`, line);
        }
        return {
            type: comparison.type,
            variable: comparison.left,
            value: unquote(comparison.right)
        };
    });
}

/**
 * Check that an `if` action condition has an operator in every clause
 */
export function validateConditionExpression(text: string, line: number): void {
    for (const clause of splitConjunction(text)) {
        if (!splitComparison(clause)) {
            throw new ParseError(`Invalid condition: ${clause}`, line);
        }
    }
}
