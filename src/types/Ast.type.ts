/**
 * AST (Abstract Syntax Tree) Type Definitions for flow scripts
 *
 * A parsed script is a Module: its variables, flows, functions and script-declared
 * middleware. The model is pure data; the parser produces it and the engine reads it.
 */

import type { Value } from '../utils/types';

// ============================================================================
// Conditions
// ============================================================================

export type ConditionType = 'equals' | 'contains' | 'greater_than' | 'less_than';

/**
 * One clause of a guard: `<variable> <type> "<value>"`
 */
export interface Condition {
    type: ConditionType;
    variable: string;
    value: string; // Literal comparison value; parsed to a number for ordering comparisons
}

// ============================================================================
// Triggers
// ============================================================================

/**
 * Function a trigger dispatches to (`-> call greet("Bob")`)
 */
export interface TriggerTarget {
    function: string;
    params: string; // Raw comma-separated parameter text, '' when absent
}

interface TriggerBase {
    pattern: string;
    conditions: Condition[];
    priority: number; // Higher wins; ties keep declaration order
    target: TriggerTarget | null;
}

export interface UserSaysTrigger extends TriggerBase {
    type: 'user_says';
}

export interface VariableEqualsTrigger extends TriggerBase {
    type: 'variable_equals';
    value: string; // pattern holds the variable name
}

export interface ApiResponseTrigger extends TriggerBase {
    type: 'api_response'; // pattern holds the API name given with `as <name>`
}

export interface TimerTrigger extends TriggerBase {
    type: 'timer'; // pattern holds the duration as written (e.g. "5m")
    seconds: number;
}

export interface EventTrigger extends TriggerBase {
    type: 'event'; // pattern holds the event name
}

export interface AlwaysTrigger extends TriggerBase {
    type: 'always';
}

export type Trigger =
    | UserSaysTrigger
    | VariableEqualsTrigger
    | ApiResponseTrigger
    | TimerTrigger
    | EventTrigger
    | AlwaysTrigger;

export type TriggerType = Trigger['type'];

// ============================================================================
// Actions
// ============================================================================

interface ActionBase {
    conditions: Condition[]; // Guard evaluated before execution; empty means always
}

export interface SayAction extends ActionBase {
    type: 'say';
    message: string;
}

export interface SetAction extends ActionBase {
    type: 'set';
    variable: string;
    value: string;
    quoted: boolean; // true for `set x = "literal"`, false for values and expressions
}

export interface CallAction extends ActionBase {
    type: 'call';
    function: string;
    params: string;
}

export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

export interface ApiAction extends ActionBase {
    type: 'api';
    method: HttpMethod;
    url: string;
    data: string | null;
    name: string | null; // `as <name>` dispatches `when api <name> returns` flows
}

export interface EmitAction extends ActionBase {
    type: 'emit';
    event: string;
    data: string | null;
}

export interface WaitAction extends ActionBase {
    type: 'wait';
    duration: string;
    seconds: number;
}

export interface IfAction extends ActionBase {
    type: 'if';
    condition: string; // Evaluated after variable substitution
    action: Action;
}

export interface LoopAction extends ActionBase {
    type: 'loop';
    count: number;
    action: Action;
}

export interface GetAction extends ActionBase {
    type: 'get';
    variable: string;
    from: string | null; // URL of a cached API response
}

export interface ImportAction extends ActionBase {
    type: 'import';
    module: string;
}

export type Action =
    | SayAction
    | SetAction
    | CallAction
    | ApiAction
    | EmitAction
    | WaitAction
    | IfAction
    | LoopAction
    | GetAction
    | ImportAction;

export type ActionType = Action['type'];

// ============================================================================
// Declarations
// ============================================================================

export interface Variable {
    name: string;
    value: Value;
    type: string; // Informational only
    persistent: boolean; // Loaded and saved through a VariableStore when one is configured
}

export interface FunctionParameter {
    name: string;
    type: string | null;
}

export interface FlowFunction {
    name: string;
    params: FunctionParameter[];
    actions: Action[];
    returnType: string | null; // Informational
    async: boolean; // Informational: every function runs under the same scheduling model
}

export interface Flow {
    name: string;
    triggers: Trigger[];
    actions: Action[]; // Direct actions, run before the trigger target
    middleware: string[];
    timeout: number | null; // Seconds; declared, not enforced
    retries: number | null; // Declared, not enforced
}

/**
 * `before stop [if <cond>]` or `before <action>`
 */
export type MiddlewareStep =
    | { kind: 'stop'; conditions: Condition[] }
    | { kind: 'action'; action: Action };

export interface MiddlewareDefinition {
    name: string;
    before: MiddlewareStep[];
    after: Action[];
    error: Action[];
}

export interface Module {
    name: string;
    version: string | null;
    flows: Map<string, Flow>;
    functions: Map<string, FlowFunction>;
    variables: Map<string, Variable>;
    middleware: Map<string, MiddlewareDefinition>;
    imports: string[];
    config: Record<string, Value>;
}
