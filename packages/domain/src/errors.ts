/**
 * Exchange-rate error taxonomy.
 *
 * Every failure raised by a rate service carries a stable code and a
 * human-readable message. Transport failures are not wrapped here: they
 * reach the caller exactly as the transport threw them.
 */

export interface ExchangeRateErrorDefinition {
    code: string;
    message: string;
}

export const ERRORS = {
    INVALID_ARGUMENT: { code: 'INVALID_ARGUMENT', message: 'Invalid argument.' },
    INVALID_CONFIGURATION: { code: 'INVALID_CONFIGURATION', message: 'Invalid service configuration.' },
    PROVIDER_ERROR: { code: 'PROVIDER_ERROR', message: 'The exchange rate provider returned an error.' },
    UNSUPPORTED_CURRENCY_PAIR: {
        code: 'UNSUPPORTED_CURRENCY_PAIR',
        message: 'The currency pair is not supported by the provider.'
    },
    RESPONSE_DECODE_FAILED: {
        code: 'RESPONSE_DECODE_FAILED',
        message: 'The provider response could not be decoded.'
    },
    UNSUPPORTED_QUERY: { code: 'UNSUPPORTED_QUERY', message: 'The exchange rate query is not supported.' }
} as const satisfies Record<string, ExchangeRateErrorDefinition>;

export type ExchangeRateErrorCode = (typeof ERRORS)[keyof typeof ERRORS]['code'];

/** Base class of every error a rate service raises on its own. */
export class ExchangeRateError extends Error {
    readonly code: ExchangeRateErrorCode;
    readonly details?: unknown;

    constructor(def: { code: ExchangeRateErrorCode; message: string }, message?: string, details?: unknown) {
        super(message ?? def.message);
        this.name = 'ExchangeRateError';
        this.code = def.code;
        this.details = details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

export class InvalidArgumentError extends ExchangeRateError {
    constructor(message: string, details?: unknown) {
        super(ERRORS.INVALID_ARGUMENT, message, details);
        this.name = 'InvalidArgumentError';
    }
}

/** Raised while constructing a service whose options cannot work. */
export class ConfigurationError extends ExchangeRateError {
    constructor(message: string, details?: unknown) {
        super(ERRORS.INVALID_CONFIGURATION, message, details);
        this.name = 'ConfigurationError';
    }
}

export class ProviderError extends ExchangeRateError {
    constructor(message?: string, details?: unknown, def: { code: ExchangeRateErrorCode; message: string } = ERRORS.PROVIDER_ERROR) {
        super(def, message, details);
        this.name = 'ProviderError';
    }
}

export class UnsupportedCurrencyPairError extends ProviderError {
    readonly currencyPair: string;
    readonly providerName: string;

    constructor(currencyPair: string, providerName: string) {
        super(
            `The currency pair "${currencyPair}" is not supported by the service "${providerName}".`,
            { currencyPair, providerName },
            ERRORS.UNSUPPORTED_CURRENCY_PAIR
        );
        this.name = 'UnsupportedCurrencyPairError';
        this.currencyPair = currencyPair;
        this.providerName = providerName;
    }
}

/** The body was not JSON, or matched no known response shape. */
export class ResponseDecodeError extends ExchangeRateError {
    constructor(message: string, details?: unknown) {
        super(ERRORS.RESPONSE_DECODE_FAILED, message, details);
        this.name = 'ResponseDecodeError';
    }
}

export class UnsupportedQueryError extends ExchangeRateError {
    constructor(providerName: string, details?: unknown) {
        super(ERRORS.UNSUPPORTED_QUERY, `The query is not supported by the service "${providerName}".`, details);
        this.name = 'UnsupportedQueryError';
    }
}
