import type { Value } from '../utils/types';
import type { Flow, Module, Trigger } from './Ast.type';

// ============================================================================
// Context
// ============================================================================

/**
 * Per-session state threaded through execution. Owned by the caller; the engine
 * never stores or discards it.
 */
export interface Context {
    variables: Map<string, Value>;
    apiResponses: Map<string, Value>; // Decoded bodies keyed by request URL
    userId: string;
    sessionId: string;
    requestId: string;
    createdAt: number; // ms since epoch
}

/**
 * Bookkeeping for one logical execution (an input, an emitted event or a timer firing)
 */
export interface Frame {
    module: Module; // Module whose functions are resolved first
    callDepth: number;
    emitDepth: number;
}

// ============================================================================
// Matching
// ============================================================================

export interface MatchResult {
    module: Module;
    flow: Flow;
    trigger: Trigger;
    priority: number;
}

// ============================================================================
// Middleware
// ============================================================================

/**
 * Hooks wrapped around flow execution.
 *
 * - before: return false to stop the flow (no output, no after/error hooks)
 * - after: receives the accumulated output and returns it, possibly transformed
 * - onError: return null to pass, or the output to respond with to handle the error
 */
export interface Middleware {
    readonly name: string;
    before(context: Context, flow: Flow): Promise<boolean> | boolean;
    after(context: Context, flow: Flow, output: string[]): Promise<string[]> | string[];
    onError(context: Context, flow: Flow, error: Error): Promise<string[] | null> | string[] | null;
}

// ============================================================================
// HTTP collaborator
// ============================================================================

export interface HttpRequest {
    method: 'GET' | 'POST';
    url: string;
    body?: Value;
    timeoutSeconds: number;
}

export interface HttpResponse {
    status: number;
    body: Value | undefined; // undefined for an empty body
}

/**
 * Transport used by the `api` action. Rejects on network, timeout and decode errors;
 * non-2xx statuses resolve normally.
 */
export interface HttpClient {
    request(request: HttpRequest): Promise<HttpResponse>;
}

// ============================================================================
// Registrations
// ============================================================================

export interface TimerKey {
    module: string;
    flow: string;
    pattern: string;
}

export interface TimerRegistration {
    key: TimerKey;
    module: Module;
    flow: Flow;
    trigger: Trigger;
    seconds: number;
    lastRun: number; // ms since epoch; only moves forward
}

export interface HandlerRegistration {
    module: Module;
    flow: Flow;
    trigger: Trigger;
}

// ============================================================================
// Persistence hooks
// ============================================================================

/**
 * External durable storage for variables declared `persistent`
 */
export interface VariableStore {
    load(userId: string, names: string[]): Promise<Record<string, Value>>;
    save(userId: string, values: Record<string, Value>): Promise<void>;
}

export interface HistoryEntry {
    timestamp: string;
    type: 'user' | 'bot';
    content: string;
}

export interface SessionSnapshot {
    timestamp: string;
    variables: Record<string, Value>;
    history: HistoryEntry[];
    module: string;
}

// ============================================================================
// Engine surface
// ============================================================================

export interface ModuleInfo {
    name: string;
    version: string | null;
    flows: string[];
    functions: string[];
    variables: string[];
    imports: string[];
    config: Record<string, Value>;
}

/**
 * Output produced outside the input path (timer firings)
 */
export interface BackgroundOutput {
    module: string;
    flow: string;
    output: string[];
}
