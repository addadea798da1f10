/**
 * Code Converter Module - Exports
 */

export { Writer } from './Writer';
export { Printer } from './Printer';
