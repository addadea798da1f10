/**
 * Chatflow - flow-script engine for conversational agents
 *
 * Loads flow scripts into modules, matches user input and events against their
 * triggers and runs the matched flows through the middleware pipeline.
 *
 * @example
 * ```ts
 * const engine = new Chatflow();
 * engine.loadModule(`
 * var count: int = 0
 *
 * flow greeting:
 *     when user says "hi" -> call bump
 *
 * function bump:
 *     set count = count + 1
 *     say "count={count}"
 * `);
 * const context = engine.createContext('user-1');
 * await engine.processInput('hi', context); // ["count=1"]
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse as parsePath } from 'node:path';

import { createLogger, errorMessage, resolveEngineConfig } from './utils';
import type { EngineConfig, Logger, Value } from './utils';
import {
    Executor,
    MiddlewarePipeline,
    ModuleLoadError,
    ModuleRegistry,
    ParseError,
    Parser,
    Printer,
    Scheduler,
    TriggerMatcher
} from './classes';
import { FetchHttpClient, NATIVE_MIDDLEWARE } from './builtins';
import type {
    BackgroundOutput,
    Context,
    HistoryEntry,
    HttpClient,
    Middleware,
    ModuleInfo,
    SessionSnapshot,
    VariableStore
} from './types/Environment.type';

export interface ChatflowOptions extends Partial<EngineConfig> {
    logger?: Logger;
    http?: HttpClient;
    variableStore?: VariableStore;
    /** Milliseconds since epoch; drives timers, rate limiting and request ids */
    clock?: () => number;
    /** Receives output of timer-fired flows */
    onBackgroundOutput?: (output: BackgroundOutput) => void;
    /** Host middleware registered after the native ones */
    middleware?: Middleware[];
}

export class Chatflow {
    readonly config: EngineConfig;
    private readonly logger: Logger;
    private readonly clock: () => number;
    private readonly registry: ModuleRegistry;
    private readonly pipeline: MiddlewarePipeline;
    private readonly executor: Executor;
    private readonly scheduler: Scheduler;
    private readonly variableStore: VariableStore | null;

    constructor(options: ChatflowOptions = {}) {
        this.config = resolveEngineConfig(options);
        this.logger = options.logger ?? createLogger('Chatflow', this.config.logLevel);
        this.clock = options.clock ?? Date.now;
        this.variableStore = options.variableStore ?? null;

        this.registry = new ModuleRegistry(this.clock);

        const services = { config: this.config, logger: this.logger, clock: this.clock };
        this.pipeline = new MiddlewarePipeline(
            this.logger.child('MiddlewarePipeline'),
            NATIVE_MIDDLEWARE.map(adapter => adapter.create(services))
        );
        for (const middleware of options.middleware ?? []) {
            this.pipeline.register(middleware);
        }

        this.executor = new Executor({
            registry: this.registry,
            pipeline: this.pipeline,
            http: options.http ?? new FetchHttpClient(),
            config: this.config,
            logger: this.logger.child('Executor')
        });

        this.scheduler = new Scheduler({
            registry: this.registry,
            executor: this.executor,
            logger: this.logger.child('Scheduler'),
            createContext: () => this.createContext(),
            clock: this.clock,
            onOutput: options.onBackgroundOutput
        });
    }

    // ========================================================================
    // Modules
    // ========================================================================

    /**
     * Parse flow-script text and register it, replacing a module of the same name.
     * Failures are logged and reported as false; nothing is registered on failure.
     */
    loadModule(source: string, name?: string): boolean {
        const moduleName = name ?? Parser.DEFAULT_MODULE_NAME;
        try {
            const module = Parser.parse(source, moduleName, this.logger.child('Parser'));
            const replaced = this.registry.has(module.name);
            this.registry.register(module);
            this.logger.info(`${replaced ? 'Reloaded' : 'Loaded'} module: ${module.name}`, {
                flows: module.flows.size,
                functions: module.functions.size,
                variables: module.variables.size
            });
            return true;
        } catch (error) {
            const detail = error instanceof ParseError ? error.format() : errorMessage(error);
            const failure = new ModuleLoadError(moduleName, detail, { cause: error });
            this.logger.error(failure.message);
            return false;
        }
    }

    /**
     * Load a module from a file. The module name defaults to the file name
     * without its extension.
     */
    async loadModuleFile(path: string, name?: string): Promise<boolean> {
        const moduleName = name ?? parsePath(path).name;
        let source: string;
        try {
            source = await readFile(path, 'utf8');
        } catch (error) {
            const failure = new ModuleLoadError(moduleName, `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
            this.logger.error(failure.message);
            return false;
        }
        return this.loadModule(source, moduleName);
    }

    unloadModule(name: string): boolean {
        const removed = this.registry.unregister(name);
        if (removed) {
            this.logger.info(`Unloaded module: ${name}`);
        }
        return removed;
    }

    listModules(): string[] {
        return this.registry.names();
    }

    getModuleInfo(name: string): ModuleInfo | null {
        const module = this.registry.get(name);
        if (!module) {
            return null;
        }
        return {
            name: module.name,
            version: module.version,
            flows: [...module.flows.keys()],
            functions: [...module.functions.keys()],
            variables: [...module.variables.keys()],
            imports: [...module.imports],
            config: { ...module.config }
        };
    }

    /**
     * Serialise a loaded module back to flow-script text
     */
    exportModule(name: string): string | null {
        const module = this.registry.get(name);
        return module ? Printer.printModule(module) : null;
    }

    // ========================================================================
    // Execution
    // ========================================================================

    /**
     * Create a context seeded with every module's variable defaults.
     * On a name collision the first loaded module wins.
     */
    createContext(userId?: string, sessionId?: string): Context {
        const now = this.clock();
        const seconds = Math.floor(now / 1000);
        const user = userId ?? 'anonymous';
        const session = sessionId ?? String(seconds);

        const variables = new Map<string, Value>();
        for (const module of this.registry.all()) {
            for (const variable of module.variables.values()) {
                if (!variables.has(variable.name)) {
                    variables.set(variable.name, variable.value);
                }
            }
        }

        return {
            variables,
            apiResponses: new Map(),
            userId: user,
            sessionId: session,
            requestId: `${user}:${session}:${seconds}`,
            createdAt: now
        };
    }

    /**
     * Run every flow whose trigger matches the input, highest priority first.
     * A failing flow contributes `Error: <message>` and the others still run.
     */
    async processInput(input: string, context?: Context): Promise<string[]> {
        const ctx = context ?? this.createContext();
        const matches = TriggerMatcher.match(input, this.registry.all(), ctx);
        this.logger.debug(`Input matched ${matches.length} trigger(s)`, { requestId: ctx.requestId });

        const output: string[] = [];
        for (const match of matches) {
            try {
                output.push(...(await this.executor.runFlow(match.module, match.flow, ctx, match.trigger)));
            } catch (error) {
                this.logger.error(`Error in flow ${match.module.name}.${match.flow.name}: ${errorMessage(error)}`);
                output.push(`Error: ${errorMessage(error)}`);
            }
        }
        return output;
    }

    /**
     * Emit an event from the host. Handler failures are logged; an event cycle
     * rejects with EventRecursionError.
     */
    async emit(event: string, payload: Value, context: Context): Promise<void> {
        await this.executor.emit(event, payload, context);
    }

    /**
     * Call a module function directly with raw comma-separated parameters
     */
    async callFunction(moduleName: string, fn: string, params: string, context: Context): Promise<string[]> {
        const module = this.registry.get(moduleName);
        if (!module) {
            this.logger.warn(`Module not found: ${moduleName}`);
            return [];
        }
        try {
            return await this.executor.executeCall(fn, params, context, Executor.rootFrame(module));
        } catch (error) {
            this.logger.error(`Error calling ${moduleName}.${fn}: ${errorMessage(error)}`);
            return [`Error: ${errorMessage(error)}`];
        }
    }

    registerMiddleware(middleware: Middleware): void {
        this.pipeline.register(middleware);
    }

    // ========================================================================
    // Scheduling
    // ========================================================================

    startScheduler(): void {
        this.scheduler.start();
    }

    /**
     * Stop the scheduler at the next tick boundary
     */
    async stop(): Promise<void> {
        await this.scheduler.stop();
    }

    /**
     * Run one scheduler tick now
     *
     * @returns Number of timers fired
     */
    async runTimers(now?: number): Promise<number> {
        return this.scheduler.tick(now);
    }

    // ========================================================================
    // Persistence
    // ========================================================================

    private persistentNames(): string[] {
        const names: string[] = [];
        for (const module of this.registry.all()) {
            for (const variable of module.variables.values()) {
                if (variable.persistent && !names.includes(variable.name)) {
                    names.push(variable.name);
                }
            }
        }
        return names;
    }

    /**
     * Overwrite persistent variables in the context with stored values
     */
    async loadPersistentVariables(context: Context): Promise<void> {
        if (!this.variableStore) {
            return;
        }
        const values = await this.variableStore.load(context.userId, this.persistentNames());
        for (const [name, value] of Object.entries(values)) {
            context.variables.set(name, value);
        }
    }

    /**
     * Store the context's persistent variables
     */
    async savePersistentVariables(context: Context): Promise<void> {
        if (!this.variableStore) {
            return;
        }
        const values: Record<string, Value> = {};
        for (const name of this.persistentNames()) {
            const value = context.variables.get(name);
            if (value !== undefined) {
                values[name] = value;
            }
        }
        await this.variableStore.save(context.userId, values);
    }

    createSnapshot(context: Context, history: HistoryEntry[] = [], module: string = this.registry.names()[0] ?? ''): SessionSnapshot {
        return {
            timestamp: new Date(this.clock()).toISOString(),
            variables: Object.fromEntries(context.variables),
            history: [...history],
            module
        };
    }

    /**
     * Build a context from a snapshot: module defaults first, then the saved variables
     */
    restoreContext(snapshot: SessionSnapshot, userId?: string, sessionId?: string): Context {
        const context = this.createContext(userId, sessionId);
        for (const [name, value] of Object.entries(snapshot.variables)) {
            context.variables.set(name, value);
        }
        return context;
    }
}

export default Chatflow;

// ============================================================================
// Re-exports
// ============================================================================

export * from './classes';
export * from './parsers';
export * from './builtins';
export * from './utils';
export type * from './types/Ast.type';
export type * from './types/Environment.type';
