/**
 * Executor - interprets actions against a Context
 *
 * Every flow run goes through the middleware pipeline. Function calls, nested
 * `if`/`loop` actions and event emission recurse inside the same logical
 * execution, tracked by a Frame.
 */

import JSON5 from 'json5';
import {
    coerceLiteral,
    errorMessage,
    isJsonLike,
    resolveVariablePath,
    splitCsv,
    stringifyValue,
    substituteVariables,
    toValue,
    unquote
} from '../utils';
import type { EngineConfig, Logger, Value } from '../utils';
import type {
    Action,
    ApiAction,
    EmitAction,
    Flow,
    FlowFunction,
    GetAction,
    ImportAction,
    LoopAction,
    Module,
    SetAction,
    Trigger
} from '../types/Ast.type';
import type { Context, Frame, HandlerRegistration, HttpClient } from '../types/Environment.type';
import { ConditionEvaluator } from './ConditionEvaluator';
import { ExpressionEvaluator } from './ExpressionEvaluator';
import type { MiddlewarePipeline } from './MiddlewarePipeline';
import type { ModuleRegistry } from './ModuleRegistry';
import { ActionExecutionError, ApiCallError, ChatflowError, EventHandlerError, EventRecursionError } from './exceptions';

/**
 * Nesting counters of an execution, without its current module
 */
export type FrameDepth = Pick<Frame, 'callDepth' | 'emitDepth'>;

export interface ExecutorOptions {
    registry: ModuleRegistry;
    pipeline: MiddlewarePipeline;
    http: HttpClient;
    config: EngineConfig;
    logger: Logger;
}

export class Executor {
    private readonly registry: ModuleRegistry;
    private readonly pipeline: MiddlewarePipeline;
    private readonly http: HttpClient;
    private readonly config: EngineConfig;
    private readonly logger: Logger;

    constructor(options: ExecutorOptions) {
        this.registry = options.registry;
        this.pipeline = options.pipeline;
        this.http = options.http;
        this.config = options.config;
        this.logger = options.logger;
    }

    /**
     * Create the frame for a new top-level execution in a module
     */
    static rootFrame(module: Module): Frame {
        return { module, callDepth: 0, emitDepth: 0 };
    }

    /**
     * Run a flow through its middleware: direct actions first, then the
     * trigger's target call when it has one.
     */
    async runFlow(module: Module, flow: Flow, context: Context, trigger: Trigger | null, frame: Frame = Executor.rootFrame(module)): Promise<string[]> {
        const chain = this.pipeline.resolve(flow, module, (actions, ctx) => this.execute(actions, ctx, frame));

        return this.pipeline.run(chain, context, flow, async () => {
            const output = await this.execute(flow.actions, context, frame);
            if (trigger?.target) {
                output.push(...(await this.executeCall(trigger.target.function, trigger.target.params, context, frame)));
            }
            return output;
        });
    }

    /**
     * Execute actions in order and collect their output
     */
    async execute(actions: readonly Action[], context: Context, frame: Frame): Promise<string[]> {
        const output: string[] = [];
        for (const action of actions) {
            if (!ConditionEvaluator.evaluateAll(action.conditions, context.variables)) {
                continue;
            }
            try {
                output.push(...(await this.executeAction(action, context, frame)));
            } catch (error) {
                if (error instanceof ChatflowError) {
                    throw error;
                }
                throw new ActionExecutionError(`Action ${action.type} failed: ${errorMessage(error)}`, action.type, { cause: error });
            }
        }
        return output;
    }

    private async executeAction(action: Action, context: Context, frame: Frame): Promise<string[]> {
        switch (action.type) {
            case 'say':
                return [substituteVariables(action.message, context.variables)];
            case 'set':
                context.variables.set(action.variable, this.resolveAssignment(action, context));
                return [];
            case 'call':
                return this.executeCall(action.function, action.params, context, frame);
            case 'api':
                return this.executeApi(action, context, frame);
            case 'emit':
                await this.executeEmit(action, context, frame);
                return [];
            case 'wait':
                await new Promise<void>(resolve => setTimeout(resolve, action.seconds * 1000));
                return [];
            case 'if':
                if (!ConditionEvaluator.evaluateExpression(action.condition, context.variables)) {
                    return [];
                }
                return this.execute([action.action], context, frame);
            case 'loop':
                return this.executeLoop(action, context, frame);
            case 'get':
                return this.executeGet(action, context);
            case 'import':
                this.executeImport(action, context);
                return [];
        }
    }

    // ========================================================================
    // set
    // ========================================================================

    private resolveAssignment(action: SetAction, context: Context): Value {
        if (action.quoted) {
            return action.value;
        }

        const raw = action.value;
        const existing = resolveVariablePath(raw, context.variables);
        if (existing !== undefined) {
            return existing;
        }

        const literal = coerceLiteral(raw);
        if (typeof literal !== 'string' || !ExpressionEvaluator.looksArithmetic(raw)) {
            return literal;
        }

        try {
            return new ExpressionEvaluator(context.variables).evaluate(substituteVariables(raw, context.variables));
        } catch (error) {
            this.logger.debug(`Assigning ${action.variable} as text: ${errorMessage(error)}`);
            return literal;
        }
    }

    // ========================================================================
    // call
    // ========================================================================

    /**
     * Call a function by name with raw comma-separated parameters
     */
    async executeCall(name: string, params: string, context: Context, frame: Frame): Promise<string[]> {
        const resolved = this.resolveFunction(name, frame.module);
        if (!resolved) {
            this.logger.warn(`Function not found: ${name}`);
            return [];
        }

        if (frame.callDepth >= this.config.maxCallDepth) {
            throw new ActionExecutionError(`Maximum call depth of ${this.config.maxCallDepth} exceeded calling ${name}`, 'call');
        }

        const { module, fn } = resolved;
        this.bindParameters(fn, params, context);

        const output = await this.execute(fn.actions, context, {
            module,
            callDepth: frame.callDepth + 1,
            emitDepth: frame.emitDepth
        });
        return output.length > 0 ? [output.join('\n')] : [];
    }

    /**
     * Find a function in the current module, as `module.function`, or in the
     * current module's imports in declared order
     */
    resolveFunction(name: string, current: Module): { module: Module; fn: FlowFunction } | null {
        const local = current.functions.get(name);
        if (local) {
            return { module: current, fn: local };
        }

        const dot = name.indexOf('.');
        if (dot !== -1) {
            const owner = this.registry.get(name.slice(0, dot));
            const qualified = owner?.functions.get(name.slice(dot + 1));
            if (owner && qualified) {
                return { module: owner, fn: qualified };
            }
        }

        for (const importName of current.imports) {
            const imported = this.registry.get(importName);
            const fn = imported?.functions.get(name);
            if (imported && fn) {
                return { module: imported, fn };
            }
        }

        return null;
    }

    /**
     * Bind call parameters positionally as literal text with surrounding quotes
     * removed. Extra values are ignored and missing ones leave the parameter unset.
     */
    private bindParameters(fn: FlowFunction, params: string, context: Context): void {
        const values = splitCsv(params);
        fn.params.forEach((param, index) => {
            if (index < values.length) {
                context.variables.set(param.name, unquote(values[index]));
            }
        });
    }

    // ========================================================================
    // api
    // ========================================================================

    private async executeApi(action: ApiAction, context: Context, frame: Frame): Promise<string[]> {
        const url = substituteVariables(action.url, context.variables);

        if (action.method !== 'get' && action.method !== 'post') {
            this.logger.warn(`Unsupported HTTP method: ${action.method.toUpperCase()} ${url}`);
            return [];
        }

        let body: Value;
        let status: number;
        try {
            const response = await this.http.request({
                method: action.method === 'get' ? 'GET' : 'POST',
                url,
                body: action.method === 'post' && action.data !== null ? this.parsePayload(action.data, context) : undefined,
                timeoutSeconds: this.config.apiTimeout
            });
            if (response.status < 200 || response.status >= 300) {
                throw new ApiCallError(url, `HTTP ${response.status}`, response.status);
            }
            status = response.status;
            body = response.body ?? {};
        } catch (error) {
            this.logger.warn(`API call to ${url} failed: ${errorMessage(error)}`);
            return [`API call failed: ${errorMessage(error)}`];
        }

        context.apiResponses.set(url, body);

        if (action.name !== null) {
            context.variables.set(`api_${action.name}_data`, body);
            await this.dispatch(this.registry.apiResponseHandlers(action.name), action.name, context, frame);
        }

        return [`API call successful: ${status}`];
    }

    /**
     * Substitute variables into `with` data and parse it when it looks like JSON
     */
    private parsePayload(data: string, context: Context): Value {
        const text = substituteVariables(data, context.variables);
        if (!isJsonLike(text)) {
            return text;
        }
        try {
            const parsed: unknown = JSON5.parse(text);
            return toValue(parsed);
        } catch (error) {
            this.logger.debug(`Payload is not valid JSON, passing it as text: ${errorMessage(error)}`);
            return text;
        }
    }

    // ========================================================================
    // emit
    // ========================================================================

    private async executeEmit(action: EmitAction, context: Context, frame: Frame): Promise<void> {
        const payload = action.data === null ? null : this.parsePayload(action.data, context);
        await this.emit(action.event, payload, context, frame);
    }

    /**
     * Emit an event: store the payload under `event_<name>_data` and run every
     * handler flow whose trigger conditions hold, in registration order
     */
    async emit(event: string, payload: Value, context: Context, frame: FrameDepth = { callDepth: 0, emitDepth: 0 }): Promise<void> {
        context.variables.set(`event_${event}_data`, payload);
        await this.dispatch(this.registry.eventHandlers(event), event, context, frame);
    }

    private async dispatch(handlers: HandlerRegistration[], name: string, context: Context, frame: FrameDepth): Promise<void> {
        if (handlers.length === 0) {
            this.logger.debug(`No handlers for ${name}`);
            return;
        }
        if (frame.emitDepth >= this.config.maxEmitDepth) {
            throw new EventRecursionError(name, this.config.maxEmitDepth);
        }

        for (const handler of handlers) {
            if (!ConditionEvaluator.evaluateAll(handler.trigger.conditions, context.variables)) {
                continue;
            }
            const child: Frame = { module: handler.module, callDepth: frame.callDepth, emitDepth: frame.emitDepth + 1 };
            try {
                await this.runFlow(handler.module, handler.flow, context, handler.trigger, child);
            } catch (error) {
                // A cycle is reported to the outermost dispatch, not swallowed per level
                if (error instanceof EventRecursionError) {
                    throw error;
                }
                const failure = new EventHandlerError(name, handler.flow.name, { cause: error });
                this.logger.error(`${failure.message}: ${errorMessage(error)}`);
            }
        }
    }

    // ========================================================================
    // loop, get, import
    // ========================================================================

    private async executeLoop(action: LoopAction, context: Context, frame: Frame): Promise<string[]> {
        const output: string[] = [];
        for (let index = 0; index < action.count; index++) {
            context.variables.set('loop_index', index);
            output.push(...(await this.execute([action.action], context, frame)));
        }
        return output.length > 0 ? [output.join('\n')] : [];
    }

    private executeGet(action: GetAction, context: Context): string[] {
        if (action.from !== null) {
            const url = substituteVariables(action.from, context.variables);
            context.variables.set(action.variable, context.apiResponses.get(url) ?? null);
            return [];
        }
        return [stringifyValue(resolveVariablePath(action.variable, context.variables))];
    }

    private executeImport(action: ImportAction, context: Context): void {
        if (!this.registry.has(action.module)) {
            this.logger.warn(`Cannot import unknown module: ${action.module}`);
            return;
        }
        this.seedFromModule(action.module, context);
    }

    /**
     * Seed a context with a module's variable defaults, keeping existing values
     */
    seedFromModule(name: string, context: Context): void {
        const module = this.registry.get(name);
        if (!module) {
            return;
        }
        for (const variable of module.variables.values()) {
            if (!context.variables.has(variable.name)) {
                context.variables.set(variable.name, variable.value);
            }
        }
    }
}
