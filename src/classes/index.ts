/**
 * Barrel export for all engine classes
 */

export { Parser } from './Parser';
export { ConditionEvaluator } from './ConditionEvaluator';
export { ExpressionEvaluator } from './ExpressionEvaluator';
export { TriggerMatcher } from './TriggerMatcher';
export { Executor, type ExecutorOptions, type FrameDepth } from './Executor';
export { MiddlewarePipeline } from './MiddlewarePipeline';
export { ModuleRegistry } from './ModuleRegistry';
export { Scheduler, type SchedulerOptions } from './Scheduler';
export { Printer, Writer } from './code-converter';
export {
    ChatflowError,
    ParseError,
    ModuleLoadError,
    ActionExecutionError,
    EventRecursionError,
    ApiCallError,
    EventHandlerError,
    TimerHandlerError
} from './exceptions';
