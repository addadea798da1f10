/**
 * Console-backed logger with levels and scopes.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO] Chatflow: Loaded module: main`.
 * The default level comes from CHATFLOW_LOG_LEVEL; CHATFLOW_DEBUG=true forces debug.
 */

import type { LogLevel } from './types';

export interface Logger {
    readonly level: LogLevel;
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
    /**
     * Create a logger with the same level under another scope
     */
    child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolve the default level from the environment
 */
export function resolveDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    if (env.CHATFLOW_DEBUG === 'true') {
        return 'debug';
    }
    const configured = env.CHATFLOW_LOG_LEVEL?.toLowerCase();
    if (configured && isLogLevel(configured)) {
        return configured;
    }
    return 'info';
}

class ConsoleLogger implements Logger {
    constructor(
        private readonly scope: string,
        readonly level: LogLevel
    ) {}

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('error', message, data);
    }

    child(scope: string): Logger {
        return new ConsoleLogger(scope, this.level);
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }
        const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${this.scope}: ${message}`;
        const args: unknown[] = data ? [line, data] : [line];
        switch (level) {
            case 'error':
                console.error(...args);
                break;
            case 'warn':
                console.warn(...args);
                break;
            default:
                console.log(...args);
        }
    }
}

/**
 * Create a scoped logger
 *
 * @param scope - Name printed in front of every message
 * @param level - Minimum level to print (defaults to the environment setting)
 */
export function createLogger(scope: string, level: LogLevel = resolveDefaultLogLevel()): Logger {
    return new ConsoleLogger(scope, level);
}
