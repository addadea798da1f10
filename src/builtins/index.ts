/**
 * Built-in collaborators: native middleware, the fetch HTTP client and an
 * in-memory variable store
 */

import type { EngineConfig, Logger } from '../utils';
import type { Middleware } from '../types/Environment.type';
import { LoggingMiddleware } from './LoggingMiddleware';
import { RateLimitMiddleware } from './RateLimitMiddleware';

export { LoggingMiddleware } from './LoggingMiddleware';
export { RateLimitMiddleware } from './RateLimitMiddleware';
export { ScriptMiddleware, type ActionRunner } from './ScriptMiddleware';
export { FetchHttpClient } from './FetchHttpClient';
export { MemoryVariableStore } from './MemoryVariableStore';

/**
 * What a native middleware may need from the engine that owns it
 */
export interface MiddlewareServices {
    config: EngineConfig;
    logger: Logger;
    clock: () => number;
}

/**
 * Native middleware adapter: a name and a factory creating one instance per engine
 */
export interface MiddlewareAdapter {
    name: string;
    create(services: MiddlewareServices): Middleware;
}

export const NATIVE_MIDDLEWARE: readonly MiddlewareAdapter[] = [
    {
        name: 'logging',
        create: ({ logger }) => new LoggingMiddleware(logger.child('middleware:logging'))
    },
    {
        name: 'rate_limit',
        create: ({ config, clock }) => new RateLimitMiddleware(config.rateLimit, clock)
    }
];
