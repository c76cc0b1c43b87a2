import type { ExchangeRate, ExchangeRateQuery } from '@fxgate/domain';

export interface ExchangeRateService {
    /** Fetch the rate for a latest or historical query. */
    getExchangeRate(query: ExchangeRateQuery): Promise<ExchangeRate>;
    /** Whether this service can answer the query at all. */
    supportQuery(query: ExchangeRateQuery): boolean;
    getName(): string;
}

export interface HttpRequest {
    method: 'GET';
    url: string;
    headers: Record<string, string>;
}

export interface HttpResponse {
    status: number;
    body: string;
}

/** The HTTP capability a rate service depends on but does not implement. */
export interface HttpTransport {
    send(request: HttpRequest): Promise<HttpResponse>;
}

export type RequestFactory = (url: string) => HttpRequest;

export const defaultRequestFactory: RequestFactory = (url) => ({
    method: 'GET',
    url,
    headers: { Accept: 'application/json' }
});
