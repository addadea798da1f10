import { coerceLiteral, escapeString, stringifyValue } from '../../utils';
import type { Value } from '../../utils';
import type {
    Action,
    Condition,
    Flow,
    FlowFunction,
    IfAction,
    LoopAction,
    MiddlewareDefinition,
    MiddlewareStep,
    Module,
    Trigger,
    Variable
} from '../../types/Ast.type';
import { Writer } from './Writer';

/**
 * Printer class - Module → flow-script text
 *
 * Pure functions over the AST. Parsing the printed text yields a structurally
 * equal Module (comments and blank lines are not part of the AST).
 */
export class Printer {
    /**
     * Print a whole module
     */
    static printModule(module: Module): string {
        const writer = new Writer();

        if (module.version !== null) {
            writer.pushLine(`version: ${module.version}`);
        }
        if (module.imports.length > 0) {
            writer.pushLine(`import ${module.imports.join(', ')}`);
        }
        for (const variable of module.variables.values()) {
            writer.pushLine(Printer.printVariable(variable));
        }

        const entries = Object.entries(module.config);
        if (entries.length > 0) {
            writer.pushBlankLine();
            writer.pushLine('config:');
            writer.indent(1);
            for (const [key, value] of entries) {
                writer.pushLine(`${key}: ${Printer.printConfigValue(value)}`);
            }
            writer.indent(0);
        }

        for (const definition of module.middleware.values()) {
            writer.pushBlankLine();
            Printer.printMiddleware(definition, writer);
        }
        for (const flow of module.flows.values()) {
            writer.pushBlankLine();
            Printer.printFlow(flow, writer);
        }
        for (const fn of module.functions.values()) {
            writer.pushBlankLine();
            Printer.printFunction(fn, writer);
        }

        return writer.toString();
    }

    static printVariable(variable: Variable): string {
        const modifier = variable.persistent ? 'persistent ' : '';
        const declaration = `var ${modifier}${variable.name}: ${variable.type}`;
        if (variable.value === null) {
            return declaration;
        }
        const value = typeof variable.value === 'string' ? `"${escapeString(variable.value)}"` : stringifyValue(variable.value);
        return `${declaration} = ${value}`;
    }

    /**
     * Strings print bare when they would read back as the same string
     */
    static printConfigValue(value: Value): string {
        if (typeof value === 'string') {
            return coerceLiteral(value) === value ? value : JSON.stringify(value);
        }
        return stringifyValue(value);
    }

    static printFlow(flow: Flow, writer: Writer): void {
        writer.indent(0);
        writer.pushLine(`flow ${flow.name}:`);
        writer.indent(1);
        if (flow.middleware.length > 0) {
            writer.pushLine(`use ${flow.middleware.join(', ')}`);
        }
        if (flow.timeout !== null) {
            writer.pushLine(`timeout ${flow.timeout}`);
        }
        if (flow.retries !== null) {
            writer.pushLine(`retry ${flow.retries}`);
        }
        for (const trigger of flow.triggers) {
            writer.pushLine(Printer.printTrigger(trigger));
        }
        for (const action of flow.actions) {
            writer.pushLine(Printer.printAction(action));
        }
        writer.indent(0);
    }

    static printFunction(fn: FlowFunction, writer: Writer): void {
        const params = fn.params.map(param => (param.type ? `${param.name}: ${param.type}` : param.name));
        let header = `function ${fn.async ? 'async ' : ''}${fn.name}`;
        if (params.length > 0) {
            header += `(${params.join(', ')})`;
        }
        if (fn.returnType !== null) {
            header += ` -> ${fn.returnType}`;
        }

        writer.indent(0);
        writer.pushLine(`${header}:`);
        writer.indent(1);
        for (const action of fn.actions) {
            writer.pushLine(Printer.printAction(action));
        }
        writer.indent(0);
    }

    static printMiddleware(definition: MiddlewareDefinition, writer: Writer): void {
        writer.indent(0);
        writer.pushLine(`middleware ${definition.name}:`);
        writer.indent(1);
        for (const step of definition.before) {
            writer.pushLine(`before ${Printer.printStep(step)}`);
        }
        for (const action of definition.after) {
            writer.pushLine(`after ${Printer.printAction(action)}`);
        }
        for (const action of definition.error) {
            writer.pushLine(`error ${Printer.printAction(action)}`);
        }
        writer.indent(0);
    }

    private static printStep(step: MiddlewareStep): string {
        if (step.kind === 'stop') {
            return `stop${Printer.printGuard(step.conditions)}`;
        }
        return Printer.printAction(step.action);
    }

    static printTrigger(trigger: Trigger): string {
        let text = Printer.printTriggerHead(trigger);
        text += Printer.printGuard(trigger.conditions);
        if (trigger.target) {
            text += ` -> ${Printer.printCall(trigger.target.function, trigger.target.params)}`;
        }
        if (trigger.priority !== 0) {
            text += ` priority ${trigger.priority}`;
        }
        return text;
    }

    private static printTriggerHead(trigger: Trigger): string {
        switch (trigger.type) {
            case 'user_says':
                return `when user says "${escapeString(trigger.pattern)}"`;
            case 'variable_equals':
                return `when var ${trigger.pattern} equals "${escapeString(trigger.value)}"`;
            case 'api_response':
                return `when api ${trigger.pattern} returns`;
            case 'timer':
                return `when timer ${trigger.pattern}`;
            case 'event':
                return `when event ${trigger.pattern}`;
            case 'always':
                return 'when always';
        }
    }

    /**
     * Print an action with its guard
     */
    static printAction(action: Action): string {
        switch (action.type) {
            case 'if':
                return `if ${action.condition} then ${Printer.printAction(action.action)}`;
            case 'loop':
                return `loop ${action.count} times: ${Printer.printAction(action.action)}`;
            default:
                return Printer.printActionBody(action) + Printer.printGuard(action.conditions);
        }
    }

    private static printActionBody(action: Exclude<Action, IfAction | LoopAction>): string {
        switch (action.type) {
            case 'say':
                return `say "${escapeString(action.message)}"`;
            case 'set':
                return `set ${action.variable} = ${action.quoted ? `"${escapeString(action.value)}"` : action.value}`;
            case 'call':
                return Printer.printCall(action.function, action.params);
            case 'api': {
                let text = `api ${action.method} ${action.url}`;
                if (action.data !== null) {
                    text += ` with ${action.data}`;
                }
                if (action.name !== null) {
                    text += ` as ${action.name}`;
                }
                return text;
            }
            case 'emit':
                return action.data === null ? `emit ${action.event}` : `emit ${action.event} with ${action.data}`;
            case 'wait':
                return `wait ${action.duration}`;
            case 'get':
                return action.from === null ? `get ${action.variable}` : `get ${action.variable} from ${action.from}`;
            case 'import':
                return `import ${action.module}`;
        }
    }

    private static printCall(name: string, params: string): string {
        return params === '' ? `call ${name}` : `call ${name}(${params})`;
    }

    static printConditions(conditions: readonly Condition[]): string {
        return conditions.map(condition => `${condition.variable} ${condition.type} "${escapeString(condition.value)}"`).join(' and ');
    }

    private static printGuard(conditions: readonly Condition[]): string {
        return conditions.length === 0 ? '' : ` if ${Printer.printConditions(conditions)}`;
    }
}
