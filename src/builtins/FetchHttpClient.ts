/**
 * Default HTTP collaborator for the `api` action
 * Sends requests with the native fetch API and decodes JSON bodies
 */

import { toValue } from '../utils';
import type { Value } from '../utils';
import { ApiCallError } from '../classes/exceptions';
import type { HttpClient, HttpRequest, HttpResponse } from '../types/Environment.type';

export class FetchHttpClient implements HttpClient {
    constructor(private readonly headers: Record<string, string> = {}) {}

    async request(request: HttpRequest): Promise<HttpResponse> {
        const headers: Record<string, string> = { Accept: 'application/json', ...this.headers };

        const init: RequestInit = {
            method: request.method,
            headers,
            signal: AbortSignal.timeout(request.timeoutSeconds * 1000)
        };

        if (request.method === 'POST' && request.body !== undefined) {
            if (!headers['Content-Type'] && !headers['content-type']) {
                headers['Content-Type'] = 'application/json';
            }
            init.body = typeof request.body === 'string' ? request.body : JSON.stringify(request.body);
        }

        let response: Response;
        let text: string;
        try {
            response = await fetch(request.url, init);
            text = await response.text();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ApiCallError(request.url, `Fetch failed: ${reason}`, null, { cause: error });
        }

        return { status: response.status, body: FetchHttpClient.decode(request.url, text) };
    }

    /**
     * Decode a response body: empty -> undefined, otherwise JSON
     */
    private static decode(url: string, text: string): Value | undefined {
        if (text.trim() === '') {
            return undefined;
        }
        try {
            const parsed: unknown = JSON.parse(text);
            return toValue(parsed);
        } catch (error) {
            throw new ApiCallError(url, 'Response is not valid JSON', null, { cause: error });
        }
    }
}
