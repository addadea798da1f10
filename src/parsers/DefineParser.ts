/**
 * Parser for `function` blocks
 * Syntax: function [async ]name[(param[: type], ...)][ -> type]:
 */

import { splitCsv } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { FlowFunction, FunctionParameter } from '../types/Ast.type';
import { ActionParser } from './ActionParser';
import { IDENTIFIER, QUALIFIED_NAME, type SourceLine } from './ParserUtils';

const SIGNATURE = new RegExp(
    `^function\\s+(async\\s+)?(${QUALIFIED_NAME})\\s*(?:\\(([^)]*)\\))?\\s*(?:->\\s*([^:]+?))?\\s*:$`
);
const PARAMETER = new RegExp(`^(${IDENTIFIER})(?:\\s*:\\s*(\\S+))?$`);

export interface DefineHeader {
    name: string;
    params: FunctionParameter[];
    returnType: string | null;
    async: boolean;
}

export class DefineParser {
    /**
     * Whether a top-level line opens a function block
     */
    static isHeader(text: string): boolean {
        return /^function\s/.test(text);
    }

    /**
     * Parse the signature line of a function block
     */
    static parseHeader(text: string, line: number): DefineHeader {
        const match = text.trim().match(SIGNATURE);
        if (!match) {
            throw new ParseError(`Invalid function signature: ${text.trim()}`, line);
        }

        const params = splitCsv(match[3] ?? '').map(param => {
            const paramMatch = param.match(PARAMETER);
            if (!paramMatch) {
                throw new ParseError(`Invalid parameter: ${param}`, line);
            }
            return { name: paramMatch[1], type: paramMatch[2] ?? null };
        });

        return {
            name: match[2],
            params,
            returnType: match[4]?.trim() ?? null,
            async: match[1] !== undefined
        };
    }

    /**
     * Parse a function block: its signature line and indented body
     */
    static parse(header: SourceLine, body: SourceLine[]): FlowFunction {
        const signature = DefineParser.parseHeader(header.text, header.line);
        return {
            ...signature,
            actions: body.map(entry => ActionParser.parse(entry.text, entry.line))
        };
    }
}
