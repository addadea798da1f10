import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import Chatflow, { EventRecursionError, MemoryVariableStore } from './index';
import type { ChatflowOptions } from './index';
import type { HistoryEntry, HttpRequest, HttpResponse, Middleware } from './types/Environment.type';

function createEngine(options: ChatflowOptions = {}): Chatflow {
    return new Chatflow({ logLevel: 'silent', http: { request: vi.fn() }, ...options });
}

describe('Chatflow', () => {
    describe('input processing', () => {
        it('keeps variables across inputs in the same context', async () => {
            const engine = createEngine();
            engine.loadModule(`
var count: int = 0

flow greeting:
    when user says "hi" -> call bump

function bump:
    set count = count + 1
    say "count={count}"
`);
            const context = engine.createContext('user-1', 'session-1');

            expect(await engine.processInput('hi', context)).toEqual(['count=1']);
            expect(await engine.processInput('hi', context)).toEqual(['count=2']);
            expect(await engine.processInput('bye', context)).toEqual([]);
            expect(context.variables.get('count')).toBe(2);
        });

        it('runs direct actions and fallback flows in priority order', async () => {
            const engine = createEngine();
            engine.loadModule(`
flow status:
    when user says "status"
    say "All systems go"
    set checked = true

flow fallback:
    when always priority -1 -> call shrug

function shrug:
    say "Sorry, I did not get that"
`);
            const context = engine.createContext();

            expect(await engine.processInput('status', context)).toEqual(['All systems go', 'Sorry, I did not get that']);
            expect(context.variables.get('checked')).toBe(true);
            expect(await engine.processInput('anything else', context)).toEqual(['Sorry, I did not get that']);
        });

        it('reports a failing flow and still runs the others', async () => {
            const engine = createEngine({ maxCallDepth: 3 });
            engine.loadModule(`
flow recursive:
    when user says "loop" -> call forever

flow fallback:
    when always -> call greet

function forever:
    call forever

function greet:
    say "hello"
`);

            expect(await engine.processInput('loop', engine.createContext())).toEqual([
                'Error: Maximum call depth of 3 exceeded calling forever',
                'hello'
            ]);
        });

        it('runs loop, if, get and set actions', async () => {
            const engine = createEngine();
            engine.loadModule(`
var name = "Ada"

flow misc:
    when user says "misc" -> call run_all

function run_all:
    loop 3 times: say "tick {loop_index}"
    if {name} equals "Ada" then say "hi Ada"
    if name equals "Bob" then say "hi Bob"
    get name
    set copy = name
    say "copy={copy}"
    say "guarded" if name equals "Bob"
`);
            const context = engine.createContext();

            expect(await engine.processInput('misc', context)).toEqual(['tick 0\ntick 1\ntick 2\nhi Ada\nAda\ncopy=Ada']);
            expect(context.variables.get('loop_index')).toBe(2);
        });

        it('keeps dashes and slashes in unquoted assignments as text', async () => {
            const engine = createEngine();
            engine.loadModule(`
flow contact:
    when user says "contact" -> call remember

function remember:
    set date = 2024-01-01
    set phone = 555-1234
    set ratio = 3/4
    set total = 2 * 3 + 1
    say "{date} {phone} {ratio} {total}"
`);
            const context = engine.createContext();

            expect(await engine.processInput('contact', context)).toEqual(['2024-01-01 555-1234 3/4 7']);
            expect(context.variables.get('date')).toBe('2024-01-01');
            expect(context.variables.get('total')).toBe(7);
        });

        it('binds call parameters positionally as literal text', async () => {
            const engine = createEngine();
            engine.loadModule(`
var mood = "sad"

flow one:
    when user says "one" -> call pair(mood)

flow three:
    when user says "three" -> call pair("a, b", 2, extra)

function pair(first, second):
    say "first={first} second={second}"
`);
            const short = engine.createContext();
            expect(await engine.processInput('one', short)).toEqual(['first=mood second={second}']);
            expect(short.variables.get('first')).toBe('mood');
            expect(short.variables.has('second')).toBe(false);

            const long = engine.createContext();
            expect(await engine.processInput('three', long)).toEqual(['first=a, b second=2']);
            expect(long.variables.get('second')).toBe('2');
            expect(long.variables.has('extra')).toBe(false);
        });

        it('waits before continuing', async () => {
            vi.useFakeTimers();
            try {
                const engine = createEngine();
                engine.loadModule(`
flow slow:
    when user says "slow" -> call pause

function pause:
    wait 2s
    say "done"
`);
                let settled = false;
                const pending = engine.processInput('slow', engine.createContext()).then(output => {
                    settled = true;
                    return output;
                });

                await vi.advanceTimersByTimeAsync(1_999);
                expect(settled).toBe(false);

                await vi.advanceTimersByTimeAsync(1);
                expect(await pending).toEqual(['done']);
            } finally {
                vi.useRealTimers();
            }
        });
    });

    describe('middleware', () => {
        const SCRIPT = `
var mode = "loud"

middleware gate:
    before stop if mode equals "quiet"
    before set visits = "seen"
    after say "(done)"

middleware guard:
    error say "Sorry: {error_message}"

flow greeting:
    use gate
    when user says "hi" -> call greet

flow risky:
    use guard
    when user says "boom" -> call explode

function greet:
    say "hello"

function explode:
    call explode
`;

        it('runs script middleware around a flow', async () => {
            const engine = createEngine();
            engine.loadModule(SCRIPT);
            const context = engine.createContext();

            expect(await engine.processInput('hi', context)).toEqual(['hello', '(done)']);
            expect(context.variables.get('visits')).toBe('seen');

            context.variables.set('mode', 'quiet');
            expect(await engine.processInput('hi', context)).toEqual([]);
        });

        it('handles errors in script error hooks', async () => {
            const engine = createEngine({ maxCallDepth: 2 });
            engine.loadModule(SCRIPT);

            expect(await engine.processInput('boom', engine.createContext())).toEqual([
                'Sorry: Maximum call depth of 2 exceeded calling explode'
            ]);
        });

        it('runs host middleware registered by name', async () => {
            const upper: Middleware = {
                name: 'upper',
                before: () => true,
                after: (_context, _flow, output) => output.map(line => line.toUpperCase()),
                onError: () => null
            };
            const engine = createEngine();
            engine.registerMiddleware(upper);
            engine.loadModule(`
flow greeting:
    use upper
    when user says "hi" -> call greet

function greet:
    say "hello"
`);

            expect(await engine.processInput('hi', engine.createContext())).toEqual(['HELLO']);
        });

        it('rate limits users with the native middleware', async () => {
            const engine = createEngine({ rateLimit: 1, clock: () => 0 });
            engine.loadModule(`
flow greeting:
    use rate_limit
    when user says "hi" -> call greet

function greet:
    say "hello"
`);
            const context = engine.createContext('user-1');

            expect(await engine.processInput('hi', context)).toEqual(['hello']);
            expect(await engine.processInput('hi', context)).toEqual([]);
            expect(await engine.processInput('hi', engine.createContext('user-2'))).toEqual(['hello']);
        });
    });

    describe('api', () => {
        const SCRIPT = `
var city = "paris"

flow weather:
    when user says "weather" -> call fetch_weather

flow report:
    when api forecast returns -> call remember

flow create:
    when user says "create" -> call create_item

flow cleanup:
    when user says "cleanup"
    api delete https://api.test/items/1

function fetch_weather:
    api get https://api.test/weather/{city} as forecast

function remember:
    set last_temp = api_forecast_data.temp
    say "not part of the reply"

function create_item:
    api post https://api.test/items with {"city": "{city}"}
    get created from https://api.test/items
`;

        function setup() {
            const request = vi.fn(async (_request: HttpRequest): Promise<HttpResponse> => ({ status: 200, body: { temp: 21 } }));
            const engine = createEngine({ http: { request }, apiTimeout: 5 });
            engine.loadModule(SCRIPT);
            return { engine, request, context: engine.createContext() };
        }

        it('stores responses and dispatches named api handlers', async () => {
            const { engine, request, context } = setup();

            expect(await engine.processInput('weather', context)).toEqual(['API call successful: 200']);
            expect(request).toHaveBeenCalledWith({
                method: 'GET',
                url: 'https://api.test/weather/paris',
                body: undefined,
                timeoutSeconds: 5
            });
            expect(context.apiResponses.get('https://api.test/weather/paris')).toEqual({ temp: 21 });
            expect(context.variables.get('api_forecast_data')).toEqual({ temp: 21 });
            expect(context.variables.get('last_temp')).toBe(21);
        });

        it('posts substituted JSON payloads and stores empty bodies as objects', async () => {
            const { engine, request, context } = setup();
            request.mockResolvedValueOnce({ status: 201, body: undefined });

            expect(await engine.processInput('create', context)).toEqual(['API call successful: 201']);
            expect(request).toHaveBeenCalledWith({
                method: 'POST',
                url: 'https://api.test/items',
                body: { city: 'paris' },
                timeoutSeconds: 5
            });
            expect(context.variables.get('created')).toEqual({});
        });

        it('turns failures into failure text', async () => {
            const { engine, request, context } = setup();
            request.mockResolvedValueOnce({ status: 500, body: undefined });
            request.mockRejectedValueOnce(new Error('connection refused'));

            expect(await engine.processInput('weather', context)).toEqual(['API call failed: HTTP 500']);
            expect(await engine.processInput('weather', context)).toEqual(['API call failed: connection refused']);
            expect(context.apiResponses.size).toBe(0);
            expect(context.variables.has('last_temp')).toBe(false);
        });

        it('skips unsupported methods without a request', async () => {
            const { engine, request, context } = setup();

            expect(await engine.processInput('cleanup', context)).toEqual([]);
            expect(request).not.toHaveBeenCalled();
        });
    });

    describe('events', () => {
        it('stops event cycles at the maximum emit depth', async () => {
            const engine = createEngine();
            engine.loadModule(`
var hits: int = 0

flow start:
    when user says "ping" -> call kick

flow echo:
    when event ping -> call bounce

function kick:
    emit ping

function bounce:
    set hits = hits + 1
    emit ping
`);
            const context = engine.createContext();

            expect(await engine.processInput('ping', context)).toEqual(['Error: Event "ping" exceeded the maximum emit depth of 8']);
            expect(context.variables.get('hits')).toBe(8);

            const fresh = engine.createContext();
            await expect(engine.emit('ping', null, fresh)).rejects.toBeInstanceOf(EventRecursionError);
            expect(fresh.variables.get('hits')).toBe(8);
        });

        it('reports event cycles through handlers with error hooks', async () => {
            const engine = createEngine();
            engine.loadModule(`
var hits: int = 0

middleware guard:
    error say "Sorry: {error_message}"

flow start:
    when user says "ping" -> call kick

flow echo:
    use guard
    when event ping -> call bounce

function kick:
    emit ping

function bounce:
    set hits = hits + 1
    emit ping
`);
            const context = engine.createContext();

            expect(await engine.processInput('ping', context)).toEqual(['Error: Event "ping" exceeded the maximum emit depth of 8']);
            expect(context.variables.get('hits')).toBe(8);
        });

        it('isolates failing handlers from the emitter and other handlers', async () => {
            const engine = createEngine({ maxCallDepth: 2 });
            engine.loadModule(`
var done = "no"

flow one:
    when event go -> call broken

flow two:
    when event go -> call fine

flow start:
    when user says "go" -> call fire

function broken:
    call broken

function fine:
    set done = "yes"

function fire:
    emit go with {"n": 1}
    say "emitted"
`);
            const context = engine.createContext();

            expect(await engine.processInput('go', context)).toEqual(['emitted']);
            expect(context.variables.get('done')).toBe('yes');
            expect(context.variables.get('event_go_data')).toEqual({ n: 1 });
        });
    });

    describe('modules', () => {
        const V1 = `
var first = "1"

flow one:
    when user says "one" -> call reply

flow ticker:
    when timer 1s -> call reply

flow listener:
    when event ping -> call mark

function reply:
    say "v1"

function mark:
    set pinged = "yes"
`;

        const V2 = `
var second = "2"

flow two:
    when user says "two" -> call reply

function reply:
    say "v2"
`;

        it('replaces a module and its registrations on reload', async () => {
            const engine = createEngine({ clock: () => 0 });
            expect(engine.loadModule(V1)).toBe(true);

            const before = engine.createContext();
            await engine.emit('ping', null, before);
            expect(before.variables.get('pinged')).toBe('yes');
            expect(await engine.runTimers(5_000)).toBe(1);

            expect(engine.loadModule(V2)).toBe(true);
            expect(engine.listModules()).toEqual(['main']);
            expect(engine.getModuleInfo('main')).toEqual({
                name: 'main',
                version: null,
                flows: ['two'],
                functions: ['reply'],
                variables: ['second'],
                imports: [],
                config: {}
            });

            const after = engine.createContext();
            expect(await engine.processInput('one', after)).toEqual([]);
            expect(await engine.processInput('two', after)).toEqual(['v2']);
            await engine.emit('ping', null, after);
            expect(after.variables.has('pinged')).toBe(false);
            expect(await engine.runTimers(10_000)).toBe(0);
        });

        it('resolves functions through imports and qualified names', async () => {
            const engine = createEngine();
            engine.loadModule(
                `
function shout(text):
    say "{text}!"
`,
                'utils'
            );
            engine.loadModule(`
import utils

flow hey:
    when user says "hey" -> call shout("hi")

flow yo:
    when user says "yo" -> call utils.shout("yo")

flow lost:
    when user says "lost" -> call nowhere
`);
            const context = engine.createContext();

            expect(await engine.processInput('hey', context)).toEqual(['hi!']);
            expect(await engine.processInput('yo', context)).toEqual(['yo!']);
            expect(await engine.processInput('lost', context)).toEqual([]);
            expect(await engine.callFunction('utils', 'shout', '"direct"', context)).toEqual(['direct!']);
            expect(await engine.callFunction('missing', 'shout', '', context)).toEqual([]);
        });

        it('rejects scripts that do not parse and keeps the loaded ones', () => {
            const engine = createEngine();
            engine.loadModule('var a = 1', 'good');

            expect(engine.loadModule('flow broken:\n    sya "oops"', 'bad')).toBe(false);
            expect(engine.listModules()).toEqual(['good']);
            expect(engine.getModuleInfo('bad')).toBeNull();
            expect(engine.exportModule('bad')).toBeNull();
        });

        it('exports modules that load back to the same shape', () => {
            const engine = createEngine();
            engine.loadModule(V1);

            const exported = engine.exportModule('main');
            expect(exported).not.toBeNull();
            expect(engine.loadModule(exported ?? '', 'copy')).toBe(true);
            expect(engine.getModuleInfo('copy')).toEqual({ ...engine.getModuleInfo('main'), name: 'copy' });
        });

        it('unloads modules', () => {
            const engine = createEngine();
            engine.loadModule('var a = 1');

            expect(engine.unloadModule('main')).toBe(true);
            expect(engine.unloadModule('main')).toBe(false);
            expect(engine.listModules()).toEqual([]);
        });

        describe('files', () => {
            let directory: string | null = null;

            afterEach(async () => {
                if (directory) {
                    await rm(directory, { recursive: true, force: true });
                    directory = null;
                }
            });

            it('loads a module file named after the file', async () => {
                directory = await mkdtemp(join(tmpdir(), 'chatflow-'));
                const path = join(directory, 'greetings.flow');
                await writeFile(path, 'flow hello:\n    when user says "hi"\n    say "hello"\n');

                const engine = createEngine();

                expect(await engine.loadModuleFile(path)).toBe(true);
                expect(engine.listModules()).toEqual(['greetings']);
                expect(await engine.loadModuleFile(join(directory, 'missing.flow'))).toBe(false);
            });
        });
    });

    describe('contexts and persistence', () => {
        it('creates contexts seeded from every module, first module winning', () => {
            const engine = createEngine({ clock: () => 1_700_000_000_000 });
            engine.loadModule('var shared = "a"', 'a');
            engine.loadModule('var shared = "b"\nvar only_b = 1', 'b');

            const context = engine.createContext('user-1', 'session-1');

            expect(context.requestId).toBe('user-1:session-1:1700000000');
            expect(context.createdAt).toBe(1_700_000_000_000);
            expect(Object.fromEntries(context.variables)).toEqual({ shared: 'a', only_b: 1 });

            const anonymous = engine.createContext();
            expect(anonymous.userId).toBe('anonymous');
            expect(anonymous.sessionId).toBe('1700000000');
        });

        it('loads and saves persistent variables per user', async () => {
            const store = new MemoryVariableStore();
            const engine = createEngine({ variableStore: store });
            engine.loadModule('var persistent visits: int = 0\nvar name = "guest"');

            const first = engine.createContext('user-1');
            first.variables.set('visits', 5);
            first.variables.set('name', 'Ada');
            await engine.savePersistentVariables(first);

            const second = engine.createContext('user-1');
            expect(second.variables.get('visits')).toBe(0);
            await engine.loadPersistentVariables(second);
            expect(second.variables.get('visits')).toBe(5);
            expect(second.variables.get('name')).toBe('guest');

            const other = engine.createContext('user-2');
            await engine.loadPersistentVariables(other);
            expect(other.variables.get('visits')).toBe(0);

            expect(await store.load('user-1', ['name'])).toEqual({});
        });

        it('snapshots and restores a context', () => {
            const engine = createEngine({ clock: () => 0 });
            engine.loadModule('var count: int = 0');
            const context = engine.createContext('user-1');
            context.variables.set('count', 2);
            const history: HistoryEntry[] = [{ timestamp: '1970-01-01T00:00:00.000Z', type: 'user', content: 'hi' }];

            const snapshot = engine.createSnapshot(context, history);

            expect(snapshot).toEqual({
                timestamp: '1970-01-01T00:00:00.000Z',
                variables: { count: 2 },
                history,
                module: 'main'
            });
            expect(engine.restoreContext(snapshot, 'user-1').variables.get('count')).toBe(2);
        });
    });
});
