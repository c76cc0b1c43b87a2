export { CurrencyPair } from './currency-pair.js';
export {
    ConfigurationError,
    ERRORS,
    ExchangeRateError,
    InvalidArgumentError,
    ProviderError,
    ResponseDecodeError,
    UnsupportedCurrencyPairError,
    UnsupportedQueryError,
    type ExchangeRateErrorCode,
    type ExchangeRateErrorDefinition
} from './errors.js';
export {
    createExchangeRate,
    formatUtcDate,
    historicalQuery,
    isHistoricalQuery,
    latestQuery,
    type ExchangeRate,
    type ExchangeRateQuery,
    type HistoricalExchangeRateQuery,
    type LatestExchangeRateQuery
} from './exchange-rate.js';
