/**
 * Parsers - one per block or line kind
 * Parser.ts splits the source into blocks and hands each to its parser
 */

export { FlowParser } from './FlowParser';
export { DefineParser, type DefineHeader } from './DefineParser';
export { MiddlewareParser } from './MiddlewareParser';
export { DeclarationParser } from './DeclarationParser';
export { TriggerParser } from './TriggerParser';
export { ActionParser } from './ActionParser';
export { parseConditions, splitComparison, splitConjunction, validateConditionExpression, type Comparison } from './ConditionParser';
export { splitTrailingGuard, parseOptionalGuard, type SourceLine } from './ParserUtils';
