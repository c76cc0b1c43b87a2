import type { CurrencyPair } from './currency-pair.js';
import { InvalidArgumentError } from './errors.js';

const MAX_TIME = Date.UTC(9999, 11, 31, 23, 59, 59, 999);
const MIN_TIME = new Date(0).setUTCFullYear(0, 0, 1);

/** Days must be valid and fit a four-digit UTC year. */
function assertCalendarDate(date: Date): void {
    const time = date.getTime();
    if (Number.isNaN(time) || time < MIN_TIME || time > MAX_TIME) {
        throw new InvalidArgumentError('The date must be a valid date between the years 0000 and 9999 (UTC).', {
            date: Number.isNaN(time) ? 'Invalid Date' : time
        });
    }
}

export interface LatestExchangeRateQuery {
    readonly kind: 'latest';
    readonly currencyPair: CurrencyPair;
}

export interface HistoricalExchangeRateQuery {
    readonly kind: 'historical';
    readonly currencyPair: CurrencyPair;
    /** Only the UTC calendar day is meaningful. */
    readonly date: Date;
}

export type ExchangeRateQuery = LatestExchangeRateQuery | HistoricalExchangeRateQuery;

export interface ExchangeRate {
    readonly value: number;
    /** The pair instance carried by the query that produced this rate. */
    readonly currencyPair: CurrencyPair;
    readonly date: Date;
    readonly providerName: string;
}

export function latestQuery(currencyPair: CurrencyPair): LatestExchangeRateQuery {
    return Object.freeze({ kind: 'latest', currencyPair });
}

export function historicalQuery(currencyPair: CurrencyPair, date: Date): HistoricalExchangeRateQuery {
    assertCalendarDate(date);
    return Object.freeze({ kind: 'historical', currencyPair, date });
}

export function isHistoricalQuery(query: ExchangeRateQuery): query is HistoricalExchangeRateQuery {
    return query.kind === 'historical';
}

export function createExchangeRate(params: {
    value: number;
    currencyPair: CurrencyPair;
    date: Date;
    providerName: string;
}): ExchangeRate {
    return Object.freeze({
        value: params.value,
        currencyPair: params.currencyPair,
        date: params.date,
        providerName: params.providerName
    });
}

/** Formats the UTC calendar day of `date` as `YYYY-MM-DD`. */
export function formatUtcDate(date: Date): string {
    assertCalendarDate(date);
    return date.toISOString().slice(0, 10);
}
