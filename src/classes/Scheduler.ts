/**
 * Scheduler - fires timer-triggered flows on a fixed one second cadence
 *
 * Each timer moves IDLE -> DUE -> IDLE. A due timer runs its flow in a fresh
 * context; its lastRun advances whether or not the flow succeeds.
 */

import { errorMessage } from '../utils';
import type { Logger } from '../utils';
import type { BackgroundOutput, Context, TimerRegistration } from '../types/Environment.type';
import { ConditionEvaluator } from './ConditionEvaluator';
import { Executor } from './Executor';
import type { ModuleRegistry } from './ModuleRegistry';
import { TimerHandlerError } from './exceptions';

export interface SchedulerOptions {
    registry: ModuleRegistry;
    executor: Executor;
    logger: Logger;
    createContext: () => Context;
    clock?: () => number;
    onOutput?: (output: BackgroundOutput) => void;
    tickInterval?: number; // ms
}

export class Scheduler {
    static readonly TICK_INTERVAL = 1000;

    private readonly registry: ModuleRegistry;
    private readonly executor: Executor;
    private readonly logger: Logger;
    private readonly createContext: () => Context;
    private readonly clock: () => number;
    private readonly onOutput: ((output: BackgroundOutput) => void) | null;
    private readonly tickInterval: number;

    private running = false;
    private loop: Promise<void> | null = null;
    private pendingSleep: { timer: ReturnType<typeof setTimeout>; resolve: () => void } | null = null;

    constructor(options: SchedulerOptions) {
        this.registry = options.registry;
        this.executor = options.executor;
        this.logger = options.logger;
        this.createContext = options.createContext;
        this.clock = options.clock ?? Date.now;
        this.onOutput = options.onOutput ?? null;
        this.tickInterval = options.tickInterval ?? Scheduler.TICK_INTERVAL;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Start ticking in the background. Does nothing while already running.
     */
    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.logger.info('Scheduler started');
        this.loop = this.runLoop();
    }

    /**
     * Stop at the next tick boundary. Resolves after the current tick finishes.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }
        this.running = false;
        if (this.pendingSleep) {
            clearTimeout(this.pendingSleep.timer);
            this.pendingSleep.resolve();
            this.pendingSleep = null;
        }
        const loop = this.loop;
        this.loop = null;
        if (loop) {
            await loop;
        }
        this.logger.info('Scheduler stopped');
    }

    /**
     * Visit every timer once and run those that are due
     *
     * @returns Number of timers fired
     */
    async tick(now: number = this.clock()): Promise<number> {
        let fired = 0;
        for (const timer of this.registry.timerRegistrations()) {
            if (now - timer.lastRun < timer.seconds * 1000) {
                continue;
            }
            const context = this.createContext();
            if (!ConditionEvaluator.evaluateAll(timer.trigger.conditions, context.variables)) {
                continue;
            }
            await this.fire(timer, context, now);
            fired++;
        }
        return fired;
    }

    private async fire(timer: TimerRegistration, context: Context, now: number): Promise<void> {
        const name = `${timer.key.module}.${timer.key.flow} (${timer.key.pattern})`;
        try {
            const output = await this.executor.runFlow(timer.module, timer.flow, context, timer.trigger, Executor.rootFrame(timer.module));
            if (this.onOutput && output.length > 0) {
                this.onOutput({ module: timer.module.name, flow: timer.flow.name, output });
            }
        } catch (error) {
            const failure = new TimerHandlerError(name, { cause: error });
            this.logger.error(`${failure.message}: ${errorMessage(error)}`);
        } finally {
            timer.lastRun = Math.max(timer.lastRun, now);
        }
    }

    private async runLoop(): Promise<void> {
        while (this.running) {
            try {
                await this.tick();
            } catch (error) {
                this.logger.error(`Scheduler tick failed: ${errorMessage(error)}`);
            }
            if (!this.running) {
                break;
            }
            await this.sleep(this.tickInterval);
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise<void>(resolve => {
            const timer = setTimeout(() => {
                this.pendingSleep = null;
                resolve();
            }, ms);
            this.pendingSleep = { timer, resolve };
        });
    }
}
