/**
 * Parser for action lines in flow, function and middleware bodies
 *
 * Every action except `if` and `loop` may carry a trailing `if <cond>` guard.
 * The nested action of `if`/`loop` is parsed here too, so its errors are
 * reported on the line of the enclosing action.
 */

import { indexOutsideQuotes, isQuoted, parseDuration, unquote } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { Action, HttpMethod } from '../types/Ast.type';
import { validateConditionExpression } from './ConditionParser';
import { IDENTIFIER, QUALIFIED_NAME, splitTrailingGuard } from './ParserUtils';

const SAY = /^say\s+(.+)$/;
const SET = new RegExp(`^set\\s+(${QUALIFIED_NAME})\\s*=\\s*(.+)$`);
const CALL = new RegExp(`^call\\s+(${QUALIFIED_NAME})\\s*(?:\\((.*)\\))?$`);
const API = /^api\s+(get|post|put|delete)\s+(\S+)(.*)$/i;
const EMIT = new RegExp(`^emit\\s+(${IDENTIFIER})(.*)$`);
const WAIT = /^wait\s+(\S+)$/;
const IF = /^if\s+(.+?)\s+then\s+(.+)$/;
const LOOP = /^loop\s+(\d+)\s+times:\s*(.+)$/;
const GET = new RegExp(`^get\\s+(${QUALIFIED_NAME})(?:\\s+from\\s+(\\S+))?$`);
const IMPORT = new RegExp(`^import\\s+(${IDENTIFIER})$`);

const ACTION_KEYWORDS = new Set(['say', 'set', 'call', 'api', 'emit', 'wait', 'if', 'loop', 'get', 'import']);

export class ActionParser {
    /**
     * Whether a line starts with an action keyword
     */
    static isAction(text: string): boolean {
        const keyword = text.trim().split(/\s+/, 1)[0];
        return ACTION_KEYWORDS.has(keyword);
    }

    /**
     * Parse one action line
     *
     * @param text - Trimmed action text
     * @param line - Line number for errors
     */
    static parse(text: string, line: number): Action {
        const trimmed = text.trim();

        // if/loop own no guard: a trailing `if` belongs to the nested action
        const ifMatch = trimmed.match(IF);
        if (ifMatch) {
            validateConditionExpression(ifMatch[1], line);
            return {
                type: 'if',
                condition: ifMatch[1].trim(),
                action: ActionParser.parse(ifMatch[2], line),
                conditions: []
            };
        }

        const loopMatch = trimmed.match(LOOP);
        if (loopMatch) {
            return {
                type: 'loop',
                count: parseInt(loopMatch[1], 10),
                action: ActionParser.parse(loopMatch[2], line),
                conditions: []
            };
        }

        const { body, conditions } = splitTrailingGuard(trimmed, line);
        const action = ActionParser.parseBody(body, line);
        action.conditions = conditions;
        return action;
    }

    private static parseBody(body: string, line: number): Action {
        let match = body.match(SAY);
        if (match) {
            if (!isQuoted(match[1])) {
                throw new ParseError(`say expects a quoted message: ${body}`, line);
            }
            return { type: 'say', message: unquote(match[1]), conditions: [] };
        }

        match = body.match(SET);
        if (match) {
            const quoted = isQuoted(match[2]);
            return {
                type: 'set',
                variable: match[1],
                value: quoted ? unquote(match[2]) : match[2].trim(),
                quoted,
                conditions: []
            };
        }

        match = body.match(CALL);
        if (match) {
            return { type: 'call', function: match[1], params: (match[2] ?? '').trim(), conditions: [] };
        }

        match = body.match(API);
        if (match) {
            return ActionParser.parseApi(match[1].toLowerCase(), match[2], match[3], line);
        }

        match = body.match(EMIT);
        if (match) {
            const rest = match[2].trim();
            if (rest !== '' && !rest.startsWith('with ')) {
                throw new ParseError(`Invalid emit: ${body}`, line);
            }
            return {
                type: 'emit',
                event: match[1],
                data: rest === '' ? null : rest.slice(5).trim(),
                conditions: []
            };
        }

        match = body.match(WAIT);
        if (match) {
            const seconds = parseDuration(match[1]);
            if (seconds === null) {
                throw new ParseError(`Invalid wait duration: ${match[1]}`, line);
            }
            return { type: 'wait', duration: match[1], seconds, conditions: [] };
        }

        match = body.match(GET);
        if (match) {
            return { type: 'get', variable: match[1], from: match[2] ?? null, conditions: [] };
        }

        match = body.match(IMPORT);
        if (match) {
            return { type: 'import', module: match[1], conditions: [] };
        }

        throw new ParseError(`Invalid action: ${body}`, line);
    }

    /**
     * api <method> <url>[ with <data>][ as <name>]
     */
    private static parseApi(method: string, url: string, rest: string, line: number): Action {
        if (!isHttpMethod(method)) {
            throw new ParseError(`Unknown HTTP method: ${method}`, line);
        }

        let remainder = rest.trim();
        let name: string | null = null;

        const asIndex = remainder === '' ? -1 : indexOutsideQuotes(` ${remainder}`, ' as ');
        if (asIndex !== -1) {
            const nameText = ` ${remainder}`.slice(asIndex + 4).trim();
            if (!new RegExp(`^${IDENTIFIER}$`).test(nameText)) {
                throw new ParseError(`Invalid API name: ${nameText}`, line);
            }
            name = nameText;
            remainder = ` ${remainder}`.slice(0, asIndex).trim();
        }

        let data: string | null = null;
        if (remainder !== '') {
            const withMatch = remainder.match(/^with\s+(.+)$/);
            if (!withMatch) {
                throw new ParseError(`Unexpected text after api URL: ${remainder}`, line);
            }
            data = withMatch[1].trim();
        }

        return { type: 'api', method, url, data, name, conditions: [] };
    }
}

function isHttpMethod(value: string): value is HttpMethod {
    return value === 'get' || value === 'post' || value === 'put' || value === 'delete';
}
