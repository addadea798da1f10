import { describe, expect, it } from 'vitest';
import { ConditionEvaluator } from './ConditionEvaluator';
import type { Value } from '../utils';
import type { Condition } from '../types/Ast.type';

describe('ConditionEvaluator', () => {
    const variables = new Map<string, Value>([
        ['mood', 'happy'],
        ['name', 'Ada'],
        ['role', 'superadmin'],
        ['score', 12],
        ['user', { tier: 'gold' }]
    ]);

    describe('evaluate', () => {
        it('compares strings for equals and contains', () => {
            expect(ConditionEvaluator.evaluate({ type: 'equals', variable: 'mood', value: 'happy' }, variables)).toBe(true);
            expect(ConditionEvaluator.evaluate({ type: 'equals', variable: 'mood', value: 'Happy' }, variables)).toBe(false);
            expect(ConditionEvaluator.evaluate({ type: 'contains', variable: 'role', value: 'admin' }, variables)).toBe(true);
        });

        it('compares numbers for ordering conditions', () => {
            expect(ConditionEvaluator.evaluate({ type: 'greater_than', variable: 'score', value: '10' }, variables)).toBe(true);
            expect(ConditionEvaluator.evaluate({ type: 'less_than', variable: 'score', value: '10' }, variables)).toBe(false);
            expect(ConditionEvaluator.evaluate({ type: 'greater_than', variable: 'mood', value: '1' }, variables)).toBe(false);
        });

        it('treats a missing variable as the empty string', () => {
            expect(ConditionEvaluator.evaluate({ type: 'equals', variable: 'missing', value: '' }, variables)).toBe(true);
            expect(ConditionEvaluator.evaluate({ type: 'contains', variable: 'missing', value: 'x' }, variables)).toBe(false);
            expect(ConditionEvaluator.evaluate({ type: 'less_than', variable: 'missing', value: '5' }, variables)).toBe(false);
        });

        it('reads dotted paths', () => {
            expect(ConditionEvaluator.evaluate({ type: 'equals', variable: 'user.tier', value: 'gold' }, variables)).toBe(true);
        });
    });

    describe('evaluateAll', () => {
        it('holds for an empty conjunction', () => {
            expect(ConditionEvaluator.evaluateAll([], variables)).toBe(true);
        });

        it('needs every condition to hold', () => {
            const conditions: Condition[] = [
                { type: 'equals', variable: 'mood', value: 'happy' },
                { type: 'greater_than', variable: 'score', value: '20' }
            ];

            expect(ConditionEvaluator.evaluateAll(conditions, variables)).toBe(false);
        });
    });

    describe('evaluateExpression', () => {
        it('substitutes placeholders before comparing', () => {
            expect(ConditionEvaluator.evaluateExpression('{name} equals "Ada"', variables)).toBe(true);
        });

        it('reads a bare left operand as a variable', () => {
            expect(ConditionEvaluator.evaluateExpression('score greater_than 10', variables)).toBe(true);
            expect(ConditionEvaluator.evaluateExpression('score < 10', variables)).toBe(false);
        });

        it('evaluates conjunctions', () => {
            expect(ConditionEvaluator.evaluateExpression('name equals "Ada" and role contains "admin"', variables)).toBe(true);
            expect(ConditionEvaluator.evaluateExpression('name equals "Ada" and role contains "guest"', variables)).toBe(false);
        });

        it('compares literal operands', () => {
            expect(ConditionEvaluator.evaluateExpression('"abc" contains "b"', variables)).toBe(true);
            expect(ConditionEvaluator.evaluateExpression('status equals done', variables)).toBe(false);
        });
    });
});
