/**
 * Error classes raised while loading and running flow scripts
 */

import type { ActionType } from '../types/Ast.type';
import { formatErrorWithContext } from '../utils/errorFormatter';

/**
 * Base class for every error the engine raises
 */
export class ChatflowError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ChatflowError';
    }
}

/**
 * Malformed trigger or action syntax inside a flow, function or middleware block
 */
export class ParseError extends ChatflowError {
    line: number; // 1-based
    source: string | null;

    constructor(message: string, line: number, source?: string | null) {
        super(`${message} (line ${line})`);
        this.name = 'ParseError';
        this.line = line;
        this.source = source ?? null;
    }

    /**
     * Message with the offending line and its neighbours, for logs
     */
    format(): string {
        return formatErrorWithContext({
            message: this.message,
            line: this.line,
            code: this.source ?? undefined
        });
    }
}

/**
 * Missing file or parser failure while loading a module
 */
export class ModuleLoadError extends ChatflowError {
    moduleName: string;

    constructor(moduleName: string, message: string, options?: { cause?: unknown }) {
        super(`Failed to load module ${moduleName}: ${message}`, options);
        this.name = 'ModuleLoadError';
        this.moduleName = moduleName;
    }
}

/**
 * Failure while interpreting one action
 */
export class ActionExecutionError extends ChatflowError {
    action: ActionType | null;

    constructor(message: string, action: ActionType | null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ActionExecutionError';
        this.action = action;
    }
}

/**
 * Emission nested deeper than the configured limit (an event cycle)
 */
export class EventRecursionError extends ActionExecutionError {
    event: string;
    depth: number;

    constructor(event: string, depth: number) {
        super(`Event "${event}" exceeded the maximum emit depth of ${depth}`, 'emit');
        this.name = 'EventRecursionError';
        this.event = event;
        this.depth = depth;
    }
}

/**
 * Network, timeout, status or decode failure of an `api` action.
 * Always caught inside the action and turned into failure text.
 */
export class ApiCallError extends ChatflowError {
    url: string;
    status: number | null;

    constructor(url: string, message: string, status?: number | null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ApiCallError';
        this.url = url;
        this.status = status ?? null;
    }
}

/**
 * Failure inside a flow run for an emitted event. Logged, never propagated.
 */
export class EventHandlerError extends ChatflowError {
    event: string;
    flow: string;

    constructor(event: string, flow: string, options?: { cause?: unknown }) {
        super(`Error in handler ${flow} for event ${event}`, options);
        this.name = 'EventHandlerError';
        this.event = event;
        this.flow = flow;
    }
}

/**
 * Failure inside a timer-fired flow. Logged, never stops the scheduler.
 */
export class TimerHandlerError extends ChatflowError {
    timer: string;

    constructor(timer: string, options?: { cause?: unknown }) {
        super(`Error in timer ${timer}`, options);
        this.name = 'TimerHandlerError';
        this.timer = timer;
    }
}
