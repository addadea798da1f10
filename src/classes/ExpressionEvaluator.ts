/**
 * ExpressionEvaluator - safe arithmetic for `set` right-hand sides
 *
 * Grammar:
 *   expr   := term (('+' | '-') term)*
 *   term   := unary (('*' | '/') unary)*
 *   unary  := '-' unary | atom
 *   atom   := number | variable | '(' expr ')'
 *
 * Variables resolve through the context and must hold a numeric reading.
 * Nothing is ever evaluated as code.
 */

import { resolveVariablePath, toNumber } from '../utils';
import type { Value } from '../utils';
import { ChatflowError } from './exceptions';

type Token =
    | { kind: 'number'; value: number }
    | { kind: 'name'; value: string }
    | { kind: 'op'; value: '+' | '-' | '*' | '/' | '(' | ')' };

const NUMBER = /^\d+(?:\.\d+)?/;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*/;

export class ExpressionEvaluator {
    private tokens: Token[] = [];
    private position = 0;

    constructor(private readonly variables: ReadonlyMap<string, Value>) {}

    /**
     * Whether an unquoted `set` value should be tried as arithmetic. Only a `+`
     * qualifies, so dates, phone numbers and paths stay text.
     */
    static looksArithmetic(text: string): boolean {
        return text.includes('+');
    }

    /**
     * Evaluate an arithmetic expression
     * @throws ChatflowError on syntax errors, unknown or non-numeric variables and non-finite results
     */
    evaluate(expression: string): number {
        this.tokens = ExpressionEvaluator.tokenize(expression);
        this.position = 0;

        const result = this.parseExpression();
        if (this.position < this.tokens.length) {
            throw new ChatflowError(`Unexpected token in expression: ${expression}`);
        }
        if (!Number.isFinite(result)) {
            throw new ChatflowError(`Expression did not produce a finite number: ${expression}`);
        }
        return result;
    }

    private static tokenize(expression: string): Token[] {
        const tokens: Token[] = [];
        let rest = expression.trim();

        while (rest.length > 0) {
            const char = rest[0];
            if (char === ' ' || char === '\t') {
                rest = rest.slice(1);
                continue;
            }
            if (char === '+' || char === '-' || char === '*' || char === '/' || char === '(' || char === ')') {
                tokens.push({ kind: 'op', value: char });
                rest = rest.slice(1);
                continue;
            }

            const number = rest.match(NUMBER);
            if (number) {
                tokens.push({ kind: 'number', value: parseFloat(number[0]) });
                rest = rest.slice(number[0].length);
                continue;
            }

            const name = rest.match(NAME);
            if (name) {
                tokens.push({ kind: 'name', value: name[0] });
                rest = rest.slice(name[0].length);
                continue;
            }

            throw new ChatflowError(`Unexpected character in expression: ${char}`);
        }

        return tokens;
    }

    private peekOperator(): string | null {
        const token = this.tokens[this.position];
        return token && token.kind === 'op' ? token.value : null;
    }

    private parseExpression(): number {
        let value = this.parseTerm();
        let operator = this.peekOperator();
        while (operator === '+' || operator === '-') {
            this.position++;
            const right = this.parseTerm();
            value = operator === '+' ? value + right : value - right;
            operator = this.peekOperator();
        }
        return value;
    }

    private parseTerm(): number {
        let value = this.parseUnary();
        let operator = this.peekOperator();
        while (operator === '*' || operator === '/') {
            this.position++;
            const right = this.parseUnary();
            value = operator === '*' ? value * right : value / right;
            operator = this.peekOperator();
        }
        return value;
    }

    private parseUnary(): number {
        if (this.peekOperator() === '-') {
            this.position++;
            return -this.parseUnary();
        }
        return this.parseAtom();
    }

    private parseAtom(): number {
        const token = this.tokens[this.position];
        if (!token) {
            throw new ChatflowError('Unexpected end of expression');
        }
        this.position++;

        switch (token.kind) {
            case 'number':
                return token.value;
            case 'name': {
                const value = toNumber(resolveVariablePath(token.value, this.variables));
                if (value === null) {
                    throw new ChatflowError(`Variable ${token.value} has no numeric value`);
                }
                return value;
            }
            case 'op':
                if (token.value === '(') {
                    const inner = this.parseExpression();
                    if (this.peekOperator() !== ')') {
                        throw new ChatflowError('Missing closing parenthesis');
                    }
                    this.position++;
                    return inner;
                }
                throw new ChatflowError(`Unexpected operator: ${token.value}`);
        }
    }
}
