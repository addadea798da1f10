import { ConditionEvaluator } from '../classes/ConditionEvaluator';
import type { Action, Flow, MiddlewareDefinition } from '../types/Ast.type';
import type { Context, Middleware } from '../types/Environment.type';

/**
 * Runs a list of actions in the flow's execution and returns their output
 */
export type ActionRunner = (actions: Action[], context: Context) => Promise<string[]>;

/**
 * Adapter from a script `middleware` block to the Middleware interface.
 *
 * - `before stop [if ...]` stops the flow when its guard holds
 * - `before <action>` runs for its side effects; its output is discarded
 * - `after <action>` output is appended to the flow output
 * - `error <action>` lines handle the error with their output; the message
 *   is available to them as `{error_message}`
 */
export class ScriptMiddleware implements Middleware {
    readonly name: string;

    constructor(
        private readonly definition: MiddlewareDefinition,
        private readonly run: ActionRunner
    ) {
        this.name = definition.name;
    }

    async before(context: Context, _flow: Flow): Promise<boolean> {
        for (const step of this.definition.before) {
            if (step.kind === 'stop') {
                if (ConditionEvaluator.evaluateAll(step.conditions, context.variables)) {
                    return false;
                }
                continue;
            }
            await this.run([step.action], context);
        }
        return true;
    }

    async after(context: Context, _flow: Flow, output: string[]): Promise<string[]> {
        if (this.definition.after.length === 0) {
            return output;
        }
        return [...output, ...(await this.run(this.definition.after, context))];
    }

    async onError(context: Context, _flow: Flow, error: Error): Promise<string[] | null> {
        if (this.definition.error.length === 0) {
            return null;
        }
        context.variables.set('error_message', error.message);
        return this.run(this.definition.error, context);
    }
}
