/**
 * Parser for `flow` blocks
 *
 *   flow greeting:
 *       use logging, rate_limit
 *       timeout 30s
 *       when user says "hi" -> call greet
 *       say "Welcome back"
 */

import { parseDuration, splitCsv } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { Flow } from '../types/Ast.type';
import { ActionParser } from './ActionParser';
import { TriggerParser } from './TriggerParser';
import { IDENTIFIER, QUALIFIED_NAME, type SourceLine } from './ParserUtils';

const HEADER = new RegExp(`^flow\\s+(${QUALIFIED_NAME})\\s*:$`);
const MIDDLEWARE_NAME = new RegExp(`^${IDENTIFIER}$`);

export class FlowParser {
    static isHeader(text: string): boolean {
        return /^flow\s/.test(text);
    }

    static parse(header: SourceLine, body: SourceLine[]): Flow {
        const headerMatch = header.text.match(HEADER);
        if (!headerMatch) {
            throw new ParseError(`Invalid flow header: ${header.text}`, header.line);
        }

        const flow: Flow = {
            name: headerMatch[1],
            triggers: [],
            actions: [],
            middleware: [],
            timeout: null,
            retries: null
        };

        for (const { text, line } of body) {
            if (text.startsWith('when ')) {
                flow.triggers.push(TriggerParser.parse(text.slice(5), line));
                continue;
            }

            const use = text.match(/^use\s+(.+)$/);
            if (use) {
                for (const name of splitCsv(use[1])) {
                    if (!MIDDLEWARE_NAME.test(name)) {
                        throw new ParseError(`Invalid middleware name: ${name}`, line);
                    }
                    flow.middleware.push(name);
                }
                continue;
            }

            const timeout = text.match(/^timeout\s+(\S+)$/);
            if (timeout) {
                const seconds = parseDuration(timeout[1]);
                if (seconds === null) {
                    throw new ParseError(`Invalid timeout: ${timeout[1]}`, line);
                }
                flow.timeout = seconds;
                continue;
            }

            const retry = text.match(/^retry\s+(\d+)$/);
            if (retry) {
                flow.retries = parseInt(retry[1], 10);
                continue;
            }

            if (ActionParser.isAction(text)) {
                flow.actions.push(ActionParser.parse(text, line));
                continue;
            }

            throw new ParseError(`Unrecognized line in flow ${flow.name}: ${text}`, line);
        }

        return flow;
    }
}
