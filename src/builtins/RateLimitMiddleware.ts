import type { Flow } from '../types/Ast.type';
import type { Context, Middleware } from '../types/Environment.type';

const WINDOW_MS = 60_000;

/**
 * Built-in `rate_limit` middleware: a sliding 60 second window of request
 * timestamps per user id. Stops the flow once `limit` requests are in the window.
 */
export class RateLimitMiddleware implements Middleware {
    readonly name = 'rate_limit';
    private readonly requests = new Map<string, number[]>();

    constructor(
        private readonly limit: number,
        private readonly clock: () => number = Date.now
    ) {}

    before(context: Context, _flow: Flow): boolean {
        const now = this.clock();
        const recent = (this.requests.get(context.userId) ?? []).filter(timestamp => now - timestamp < WINDOW_MS);

        if (recent.length >= this.limit) {
            this.requests.set(context.userId, recent);
            return false;
        }

        recent.push(now);
        this.requests.set(context.userId, recent);
        return true;
    }

    after(_context: Context, _flow: Flow, output: string[]): string[] {
        return output;
    }

    onError(): null {
        return null;
    }

    /**
     * Number of requests currently counted for a user
     */
    count(userId: string): number {
        return this.requests.get(userId)?.length ?? 0;
    }
}
