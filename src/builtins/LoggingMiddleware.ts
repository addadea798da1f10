import type { Logger } from '../utils';
import type { Flow } from '../types/Ast.type';
import type { Context, Middleware } from '../types/Environment.type';

/**
 * Built-in `logging` middleware: records flow start, completion and failure.
 * Never stops a flow and never handles an error.
 */
export class LoggingMiddleware implements Middleware {
    readonly name = 'logging';

    constructor(private readonly logger: Logger) {}

    before(context: Context, flow: Flow): boolean {
        this.logger.info(`Flow ${flow.name} started`, { userId: context.userId, requestId: context.requestId });
        return true;
    }

    after(context: Context, flow: Flow, output: string[]): string[] {
        this.logger.info(`Flow ${flow.name} completed with ${output.length} output line(s)`, { requestId: context.requestId });
        return output;
    }

    onError(context: Context, flow: Flow, error: Error): null {
        this.logger.error(`Flow ${flow.name} failed: ${error.message}`, { requestId: context.requestId });
        return null;
    }
}
