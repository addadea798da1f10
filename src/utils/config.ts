/**
 * Engine configuration: option defaults and environment overrides
 */

import type { LogLevel } from './types';
import { resolveDefaultLogLevel } from './logger';

/**
 * Tunables resolved once when the engine is constructed
 */
export interface EngineConfig {
    logLevel: LogLevel;
    /** Seconds before an `api` request is aborted */
    apiTimeout: number;
    /** Requests allowed per user in a 60 second window by the rate_limit middleware */
    rateLimit: number;
    /** Nested `emit` levels allowed before EventRecursionError */
    maxEmitDepth: number;
    /** Nested `call` levels allowed before ActionExecutionError */
    maxCallDepth: number;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
    logLevel: 'info',
    apiTimeout: 10,
    rateLimit: 60,
    maxEmitDepth: 8,
    maxCallDepth: 32
};

function readPositiveNumber(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Merge explicit options over environment overrides over defaults.
 *
 * Environment: CHATFLOW_LOG_LEVEL / CHATFLOW_DEBUG, CHATFLOW_API_TIMEOUT, CHATFLOW_RATE_LIMIT.
 */
export function resolveEngineConfig(options: Partial<EngineConfig> = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        logLevel: options.logLevel ?? resolveDefaultLogLevel(env),
        apiTimeout: options.apiTimeout ?? readPositiveNumber(env.CHATFLOW_API_TIMEOUT) ?? DEFAULT_CONFIG.apiTimeout,
        rateLimit: options.rateLimit ?? readPositiveNumber(env.CHATFLOW_RATE_LIMIT) ?? DEFAULT_CONFIG.rateLimit,
        maxEmitDepth: options.maxEmitDepth ?? DEFAULT_CONFIG.maxEmitDepth,
        maxCallDepth: options.maxCallDepth ?? DEFAULT_CONFIG.maxCallDepth
    };
}
