/**
 * MiddlewarePipeline - wraps flow execution with named before/after/error hooks
 */

import type { Logger } from '../utils';
import { ScriptMiddleware, type ActionRunner } from '../builtins/ScriptMiddleware';
import type { Flow, Module } from '../types/Ast.type';
import type { Context, Middleware } from '../types/Environment.type';
import { ActionExecutionError, EventRecursionError } from './exceptions';

export class MiddlewarePipeline {
    private readonly registry = new Map<string, Middleware>();

    constructor(
        private readonly logger: Logger,
        middleware: Iterable<Middleware> = []
    ) {
        for (const entry of middleware) {
            this.register(entry);
        }
    }

    /**
     * Register (or replace) a named middleware
     */
    register(middleware: Middleware): void {
        this.registry.set(middleware.name, middleware);
    }

    has(name: string): boolean {
        return this.registry.has(name);
    }

    get(name: string): Middleware | undefined {
        return this.registry.get(name);
    }

    names(): string[] {
        return [...this.registry.keys()];
    }

    /**
     * Resolve a flow's middleware names. The flow's own module middleware blocks
     * shadow registered middleware of the same name; unknown names are skipped.
     *
     * @param run - Executes script middleware actions in the flow's execution
     */
    resolve(flow: Flow, module: Module, run: ActionRunner): Middleware[] {
        const chain: Middleware[] = [];
        for (const name of flow.middleware) {
            const definition = module.middleware.get(name);
            if (definition) {
                chain.push(new ScriptMiddleware(definition, run));
                continue;
            }
            const registered = this.registry.get(name);
            if (registered) {
                chain.push(registered);
                continue;
            }
            this.logger.warn(`Unknown middleware ${name} in flow ${flow.name}`);
        }
        return chain;
    }

    /**
     * Run a flow body inside a middleware chain.
     *
     * Before-hooks run in order and any `false` stops the flow with no output.
     * After-hooks run in reverse order, each transforming the output. When the body
     * or an after-hook throws, error hooks run in order and the first to return an
     * output handles the error; otherwise the error is rethrown. An event cycle
     * skips the error hooks so it reaches the outermost caller.
     */
    async run(chain: readonly Middleware[], context: Context, flow: Flow, body: () => Promise<string[]>): Promise<string[]> {
        for (const middleware of chain) {
            if (!(await middleware.before(context, flow))) {
                this.logger.debug(`Flow ${flow.name} stopped by middleware ${middleware.name}`);
                return [];
            }
        }

        try {
            let output = await body();
            for (let i = chain.length - 1; i >= 0; i--) {
                output = await chain[i].after(context, flow, output);
            }
            return output;
        } catch (error) {
            if (error instanceof EventRecursionError) {
                this.logger.debug(`Flow ${flow.name} left an event cycle: ${error.message}`);
                throw error;
            }
            const failure = error instanceof Error ? error : new ActionExecutionError(String(error), null);
            for (const middleware of chain) {
                const handled = await middleware.onError(context, flow, failure);
                if (handled !== null) {
                    this.logger.debug(`Error in flow ${flow.name} handled by middleware ${middleware.name}`);
                    return handled;
                }
            }
            throw failure;
        }
    }
}
