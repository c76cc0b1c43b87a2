import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

/**
 * HttpTransport on the global fetch. Network failures and aborts are
 * thrown as fetch raised them.
 */
export class FetchTransport implements HttpTransport {
    private readonly timeoutMs: number | undefined;

    constructor(options?: { timeoutMs?: number }) {
        this.timeoutMs = options?.timeoutMs;
    }

    async send(request: HttpRequest): Promise<HttpResponse> {
        const controller = new AbortController();
        const timeout = this.timeoutMs === undefined ? undefined : setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await fetch(request.url, {
                method: request.method,
                headers: request.headers,
                signal: controller.signal
            });

            return { status: response.status, body: await response.text() };
        } finally {
            clearTimeout(timeout);
        }
    }
}
