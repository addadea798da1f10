/**
 * Parser for script-declared `middleware` blocks
 *
 *   middleware quiet_hours:
 *       before stop if hour greater_than "22"
 *       before set visits = visits + 1
 *       after say "(sent by {bot_name})"
 *       error say "Something went wrong"
 */

import { ParseError } from '../classes/exceptions';
import type { MiddlewareDefinition } from '../types/Ast.type';
import { ActionParser } from './ActionParser';
import { IDENTIFIER, parseOptionalGuard, type SourceLine } from './ParserUtils';

const HEADER = new RegExp(`^middleware\\s+(${IDENTIFIER})\\s*:$`);

export class MiddlewareParser {
    static isHeader(text: string): boolean {
        return /^middleware\s/.test(text);
    }

    static parse(header: SourceLine, body: SourceLine[]): MiddlewareDefinition {
        const headerMatch = header.text.match(HEADER);
        if (!headerMatch) {
            throw new ParseError(`Invalid middleware header: ${header.text}`, header.line);
        }

        const definition: MiddlewareDefinition = {
            name: headerMatch[1],
            before: [],
            after: [],
            error: []
        };

        for (const { text, line } of body) {
            const match = text.match(/^(before|after|error)\s+(.+)$/);
            if (!match) {
                throw new ParseError(`Unrecognized line in middleware ${definition.name}: ${text}`, line);
            }

            const [, hook, rest] = match;
            if (hook === 'before') {
                const stop = rest.match(/^stop\b(.*)$/);
                if (stop) {
                    const conditions = parseOptionalGuard(stop[1], line);
                    if (conditions === null) {
                        throw new ParseError(`Unexpected text after stop: ${stop[1].trim()}`, line);
                    }
                    definition.before.push({ kind: 'stop', conditions });
                } else {
                    definition.before.push({ kind: 'action', action: ActionParser.parse(rest, line) });
                }
            } else if (hook === 'after') {
                definition.after.push(ActionParser.parse(rest, line));
            } else {
                definition.error.push(ActionParser.parse(rest, line));
            }
        }

        return definition;
    }
}
