import {
    UnsupportedCurrencyPairError,
    createExchangeRate,
    type ExchangeRate,
    type ExchangeRateQuery
} from '@fxgate/domain';
import { log } from '@fxgate/observability';
import type { ExchangeRateService } from './types.js';

/**
 * Mock rate service answering from a fixed table keyed by `BASE/QUOTE`.
 * Used for local development and testing.
 */
export class MockExchangeRateService implements ExchangeRateService {
    private readonly rates: Map<string, number>;
    private readonly receivedQueries: ExchangeRateQuery[] = [];

    constructor(rates: Record<string, number> = {}) {
        this.rates = new Map(Object.entries(rates));
    }

    async getExchangeRate(query: ExchangeRateQuery): Promise<ExchangeRate> {
        this.receivedQueries.push(query);
        const pair = query.currencyPair.toString();
        const value = this.rates.get(pair);

        if (value === undefined) {
            throw new UnsupportedCurrencyPairError(pair, this.getName());
        }

        log('info', '[MockFx] Rate served', { pair, kind: query.kind, value });

        return createExchangeRate({
            value,
            currencyPair: query.currencyPair,
            date: query.kind === 'historical' ? query.date : new Date(),
            providerName: this.getName()
        });
    }

    supportQuery(_query: ExchangeRateQuery): boolean {
        return true;
    }

    getName(): string {
        return 'mock';
    }

    /** Get all received queries (for test assertions). */
    getReceivedQueries(): ReadonlyArray<ExchangeRateQuery> {
        return this.receivedQueries;
    }

    /** Get the last received query. */
    getLastQuery(): ExchangeRateQuery | undefined {
        return this.receivedQueries[this.receivedQueries.length - 1];
    }

    /** Clear query history. */
    clear(): void {
        this.receivedQueries.length = 0;
    }
}
