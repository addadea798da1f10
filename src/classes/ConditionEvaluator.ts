/**
 * ConditionEvaluator - evaluates guard conjunctions and `if` condition strings
 * against a variable map
 */

import { resolveVariablePath, stringifyValue, substituteVariables, toNumber, unquote } from '../utils';
import type { Value } from '../utils';
import { splitComparison, splitConjunction } from '../parsers/ConditionParser';
import type { Condition, ConditionType } from '../types/Ast.type';

const BARE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*$/;

export class ConditionEvaluator {
    /**
     * Evaluate a conjunction. An empty list holds.
     */
    static evaluateAll(conditions: readonly Condition[], variables: ReadonlyMap<string, Value>): boolean {
        return conditions.every(condition => ConditionEvaluator.evaluate(condition, variables));
    }

    /**
     * Evaluate one condition. A missing variable compares as the empty string.
     */
    static evaluate(condition: Condition, variables: ReadonlyMap<string, Value>): boolean {
        const current = resolveVariablePath(condition.variable, variables);
        const left = current === undefined ? '' : stringifyValue(current);
        return ConditionEvaluator.compare(left, condition.type, condition.value);
    }

    /**
     * Evaluate an `if` action condition.
     *
     * A bare left operand naming a variable reads that variable; every other operand
     * has `{name}` placeholders substituted and surrounding quotes removed.
     */
    static evaluateExpression(expression: string, variables: ReadonlyMap<string, Value>): boolean {
        return splitConjunction(expression).every(clause => {
            const comparison = splitComparison(clause);
            if (!comparison) {
                return false;
            }

            let left: string;
            const named = BARE_NAME.test(comparison.left) ? resolveVariablePath(comparison.left, variables) : undefined;
            if (named !== undefined) {
                left = stringifyValue(named);
            } else {
                left = unquote(substituteVariables(comparison.left, variables));
            }
            const right = unquote(substituteVariables(comparison.right, variables));

            return ConditionEvaluator.compare(left, comparison.type, right);
        });
    }

    /**
     * Compare two textual operands. Ordering comparisons need both sides numeric.
     */
    static compare(left: string, type: ConditionType, right: string): boolean {
        switch (type) {
            case 'equals':
                return left === right;
            case 'contains':
                return left.includes(right);
            case 'greater_than':
            case 'less_than': {
                const a = toNumber(left);
                const b = toNumber(right);
                if (a === null || b === null) {
                    return false;
                }
                return type === 'greater_than' ? a > b : a < b;
            }
        }
    }
}
