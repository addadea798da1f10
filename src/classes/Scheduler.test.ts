import { describe, expect, it, vi } from 'vitest';
import { Executor } from './Executor';
import { MiddlewarePipeline } from './MiddlewarePipeline';
import { ModuleRegistry } from './ModuleRegistry';
import { Parser } from './Parser';
import { Scheduler } from './Scheduler';
import { createLogger, resolveEngineConfig } from '../utils';
import type { Value } from '../utils';
import type { BackgroundOutput, Context } from '../types/Environment.type';

const logger = createLogger('test', 'silent');

const SCRIPT = `var enabled = "no"

flow heartbeat:
    when timer 2s -> call beat

flow gated:
    when timer 1s if enabled equals "yes" -> call beat

flow broken:
    when timer 3s -> call fail

function beat:
    say "beat"

function fail:
    call fail
`;

function createContext(): Context {
    return {
        variables: new Map<string, Value>([['enabled', 'no']]),
        apiResponses: new Map(),
        userId: 'scheduler',
        sessionId: 'timers',
        requestId: 'scheduler:timers:0',
        createdAt: 0
    };
}

function setup() {
    const clock = () => 0;
    const registry = new ModuleRegistry(clock);
    registry.register(Parser.parse(SCRIPT, 'main', logger));

    const executor = new Executor({
        registry,
        pipeline: new MiddlewarePipeline(logger),
        http: { request: vi.fn() },
        config: resolveEngineConfig({ logLevel: 'silent', maxCallDepth: 1 }),
        logger
    });

    const outputs: BackgroundOutput[] = [];
    const scheduler = new Scheduler({
        registry,
        executor,
        logger,
        createContext,
        clock,
        onOutput: output => outputs.push(output)
    });

    return { registry, scheduler, outputs };
}

describe('Scheduler', () => {
    it('fires a timer once per elapsed interval', async () => {
        const { registry, scheduler, outputs } = setup();
        const key = { module: 'main', flow: 'heartbeat', pattern: '2s' };

        const fired: number[] = [];
        const lastRuns: Array<number | undefined> = [];
        for (const now of [1_000, 2_000, 2_500, 4_000]) {
            fired.push(await scheduler.tick(now));
            lastRuns.push(registry.findTimer(key)?.lastRun);
        }

        // the broken 3s timer fires at 4000 too
        expect(fired).toEqual([0, 1, 0, 2]);
        expect(lastRuns).toEqual([0, 2_000, 2_000, 4_000]);
        expect(outputs).toEqual([
            { module: 'main', flow: 'heartbeat', output: ['beat'] },
            { module: 'main', flow: 'heartbeat', output: ['beat'] }
        ]);
    });

    it('advances a failing timer and keeps going', async () => {
        const { registry, scheduler, outputs } = setup();

        expect(await scheduler.tick(3_000)).toBe(2);
        expect(registry.findTimer({ module: 'main', flow: 'broken', pattern: '3s' })?.lastRun).toBe(3_000);
        expect(outputs).toEqual([{ module: 'main', flow: 'heartbeat', output: ['beat'] }]);
    });

    it('checks timer conditions against a fresh context', async () => {
        const { registry, scheduler } = setup();

        await scheduler.tick(10_000);

        expect(registry.findTimer({ module: 'main', flow: 'gated', pattern: '1s' })?.lastRun).toBe(0);
    });

    it('starts and stops the background loop', async () => {
        const { scheduler } = setup();

        scheduler.start();
        expect(scheduler.isRunning).toBe(true);

        await scheduler.stop();
        expect(scheduler.isRunning).toBe(false);
    });
});
