/**
 * Parser for `when` trigger lines inside flow blocks
 * Syntax: when <trigger>[ if <cond>][ priority <n>][ -> call <fn>[(<params>)]][ priority <n>]
 */

import { indexOutsideQuotes, parseDuration, unquote } from '../utils';
import { ParseError } from '../classes/exceptions';
import type { Condition, Trigger, TriggerTarget } from '../types/Ast.type';
import { IDENTIFIER, QUALIFIED_NAME, QUOTED_STRING, parseOptionalGuard } from './ParserUtils';

const PRIORITY_SUFFIX = /\s+priority\s+(-?\d+)\s*$/;
const TARGET_PATTERN = new RegExp(`^call\\s+(${QUALIFIED_NAME})\\s*(?:\\((.*)\\))?$`);

const USER_SAYS = new RegExp(`^user\\s+says\\s+(${QUOTED_STRING})(.*)$`);
const VARIABLE_EQUALS = new RegExp(`^var\\s+(${QUALIFIED_NAME})\\s+equals\\s+(${QUOTED_STRING})(.*)$`);
const API_RETURNS = new RegExp(`^api\\s+(${IDENTIFIER})\\s+returns\\b(.*)$`);
const TIMER = /^timer\s+(\d+[smh]?)\b(.*)$/;
const EVENT = new RegExp(`^event\\s+(${IDENTIFIER})\\b(.*)$`);
const ALWAYS = /^always\b(.*)$/;

interface TriggerTail {
    conditions: Condition[];
    priority: number;
    target: TriggerTarget | null;
}

export class TriggerParser {
    /**
     * Parse the text after `when `
     *
     * @param text - Trigger text, e.g. `user says "hi" -> call greet`
     * @param line - Line number for errors
     */
    static parse(text: string, line: number): Trigger {
        let { text: head, priority } = TriggerParser.stripPriority(text.trim());

        let target: TriggerTarget | null = null;
        const arrow = indexOutsideQuotes(head, '->');
        if (arrow !== -1) {
            target = TriggerParser.parseTarget(head.slice(arrow + 2).trim(), line);
            head = head.slice(0, arrow).trim();

            // `priority <n>` may also sit before the target
            const beforeTarget = TriggerParser.stripPriority(head);
            if (beforeTarget.priority !== null) {
                if (priority !== null) {
                    throw new ParseError(`Duplicate priority in trigger: ${text.trim()}`, line);
                }
                head = beforeTarget.text;
                priority = beforeTarget.priority;
            }
        }

        return TriggerParser.parseHead(head, line, priority ?? 0, target);
    }

    private static stripPriority(text: string): { text: string; priority: number | null } {
        const match = text.match(PRIORITY_SUFFIX);
        if (!match || match.index === undefined) {
            return { text, priority: null };
        }
        return { text: text.slice(0, match.index).trim(), priority: parseInt(match[1], 10) };
    }

    private static parseTarget(text: string, line: number): TriggerTarget {
        const match = text.match(TARGET_PATTERN);
        if (!match) {
            throw new ParseError(`Invalid trigger target: ${text}`, line);
        }
        return { function: match[1], params: (match[2] ?? '').trim() };
    }

    private static parseHead(head: string, line: number, priority: number, target: TriggerTarget | null): Trigger {
        const tail = (rest: string): TriggerTail => {
            const conditions = parseOptionalGuard(rest, line);
            if (conditions === null) {
                throw new ParseError(`Unexpected text after trigger: ${rest.trim()}`, line);
            }
            return { conditions, priority, target };
        };

        let match = head.match(USER_SAYS);
        if (match) {
            return { type: 'user_says', pattern: unquote(match[1]), ...tail(match[2]) };
        }

        match = head.match(VARIABLE_EQUALS);
        if (match) {
            return { type: 'variable_equals', pattern: match[1], value: unquote(match[2]), ...tail(match[3]) };
        }

        match = head.match(API_RETURNS);
        if (match) {
            return { type: 'api_response', pattern: match[1], ...tail(match[2]) };
        }

        match = head.match(TIMER);
        if (match) {
            const seconds = parseDuration(match[1]);
            if (seconds === null || seconds <= 0) {
                throw new ParseError(`Invalid timer duration: ${match[1]}`, line);
            }
            return { type: 'timer', pattern: match[1], seconds, ...tail(match[2]) };
        }

        match = head.match(EVENT);
        if (match) {
            return { type: 'event', pattern: match[1], ...tail(match[2]) };
        }

        match = head.match(ALWAYS);
        if (match) {
            return { type: 'always', pattern: '', ...tail(match[1]) };
        }

        throw new ParseError(`Invalid trigger: when ${head}`, line);
    }
}
