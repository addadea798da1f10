/**
 * Shared types for utility functions
 */

export type Value = string | number | boolean | null | object;

/**
 * Severity levels understood by the logger, in increasing order.
 * 'silent' disables output entirely.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
