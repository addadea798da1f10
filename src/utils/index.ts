/**
 * Utility functions for flow scripts
 */

export * from './types';
export * from './stringParsing';
export * from './valueConversion';
export * from './errorFormatter';
export * from './logger';
export * from './config';
