import { describe, expect, it } from 'vitest';
import { Parser } from './Parser';
import { ParseError } from './exceptions';
import { createLogger } from '../utils';

const logger = createLogger('test', 'silent');

const SCRIPT = `# greeting bot
version: 1.2
import utils
var count: int = 0
var persistent nickname = "friend"
var settings: json = {"theme": "dark"}

config:
    debug: true
    retries: 3
    greeting: hello there
    ratio: 0.5

flow greeting:
    use logging
    timeout 30s
    retry 2
    when user says "hello" if mood equals "happy" -> call greet("Bob", 2) priority 5
    when timer 5m
    say "ready"

function async greet(name: string, times) -> string:
    say "Hi {name}"
`;

describe('Parser', () => {
    it('parses header declarations', () => {
        const module = Parser.parse(SCRIPT, 'bot', logger);

        expect(module.name).toBe('bot');
        expect(module.version).toBe('1.2');
        expect(module.imports).toEqual(['utils']);
        expect(module.variables.get('count')).toEqual({ name: 'count', value: 0, type: 'int', persistent: false });
        expect(module.variables.get('nickname')).toEqual({ name: 'nickname', value: 'friend', type: 'string', persistent: true });
        expect(module.variables.get('settings')?.value).toEqual({ theme: 'dark' });
    });

    it('coerces config values', () => {
        const module = Parser.parse(SCRIPT, 'bot', logger);

        expect(module.config).toEqual({ debug: true, retries: 3, greeting: 'hello there', ratio: 0.5 });
    });

    it('parses flows with triggers, settings and direct actions', () => {
        const flow = Parser.parse(SCRIPT, 'bot', logger).flows.get('greeting');

        expect(flow?.middleware).toEqual(['logging']);
        expect(flow?.timeout).toBe(30);
        expect(flow?.retries).toBe(2);
        expect(flow?.triggers).toEqual([
            {
                type: 'user_says',
                pattern: 'hello',
                conditions: [{ type: 'equals', variable: 'mood', value: 'happy' }],
                priority: 5,
                target: { function: 'greet', params: '"Bob", 2' }
            },
            { type: 'timer', pattern: '5m', seconds: 300, conditions: [], priority: 0, target: null }
        ]);
        expect(flow?.actions).toEqual([{ type: 'say', message: 'ready', conditions: [] }]);
    });

    it('parses function signatures', () => {
        const fn = Parser.parse(SCRIPT, 'bot', logger).functions.get('greet');

        expect(fn).toEqual({
            name: 'greet',
            params: [
                { name: 'name', type: 'string' },
                { name: 'times', type: null }
            ],
            returnType: 'string',
            async: true,
            actions: [{ type: 'say', message: 'Hi {name}', conditions: [] }]
        });
    });

    it('parses middleware blocks', () => {
        const source = [
            'middleware gate:',
            '    before stop if mode equals "quiet"',
            '    before set visits = visits + 1',
            '    after say "(done)"',
            '    error say "Sorry"'
        ].join('\n');

        const definition = Parser.parse(source, 'main', logger).middleware.get('gate');

        expect(definition).toEqual({
            name: 'gate',
            before: [
                { kind: 'stop', conditions: [{ type: 'equals', variable: 'mode', value: 'quiet' }] },
                { kind: 'action', action: { type: 'set', variable: 'visits', value: 'visits + 1', quoted: false, conditions: [] } }
            ],
            after: [{ type: 'say', message: '(done)', conditions: [] }],
            error: [{ type: 'say', message: 'Sorry', conditions: [] }]
        });
    });

    it('defaults the module name to main', () => {
        expect(Parser.parse('var a = 1', undefined, logger).name).toBe('main');
    });

    it('ignores unrecognized top-level lines and unknown blocks', () => {
        const source = [
            'something the parser does not know',
            'banner:',
            '    anything goes here',
            'flow ok:',
            '    say "fine"'
        ].join('\n');

        const module = Parser.parse(source, 'main', logger);

        expect([...module.flows.keys()]).toEqual(['ok']);
    });

    it('accepts CRLF line endings', () => {
        const module = Parser.parse('flow ok:\r\n    say "fine"\r\n', 'main', logger);

        expect(module.flows.get('ok')?.actions).toEqual([{ type: 'say', message: 'fine', conditions: [] }]);
    });

    it('reports the line of a malformed action', () => {
        const source = ['flow broken:', '    when user says "hi" -> call greet', '    sya "oops"'].join('\n');

        let caught: unknown;
        try {
            Parser.parse(source, 'main', logger);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ParseError);
        if (caught instanceof ParseError) {
            expect(caught.line).toBe(3);
            expect(caught.message).toBe('Unrecognized line in flow broken: sya "oops" (line 3)');
            expect(caught.format()).toContain('  >  3 |     sya "oops"');
        }
    });

    it('reports malformed triggers', () => {
        const source = ['flow broken:', '    when user shouts "hi"'].join('\n');

        expect(() => Parser.parse(source, 'main', logger)).toThrow('Invalid trigger: when user shouts "hi" (line 2)');
    });

    it('reports malformed nested actions on the enclosing line', () => {
        const source = ['function f:', '    say "ok"', '    if mood equals "happy" then sya "x"'].join('\n');

        expect(() => Parser.parse(source, 'main', logger)).toThrow('Invalid action: sya "x" (line 3)');
    });

    it('reports malformed guards', () => {
        const source = ['function f:', '    say "x" if mood is "happy"'].join('\n');

        expect(() => Parser.parse(source, 'main', logger)).toThrow('Invalid condition: mood is "happy" (line 2)');
    });

    it('rejects duplicate flows', () => {
        const source = ['flow a:', '    say "1"', 'flow a:', '    say "2"'].join('\n');

        expect(() => Parser.parse(source, 'main', logger)).toThrow('Duplicate flow: a (line 3)');
    });
});
