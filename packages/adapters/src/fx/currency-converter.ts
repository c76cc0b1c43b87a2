import {
    ConfigurationError,
    ProviderError,
    ResponseDecodeError,
    UnsupportedCurrencyPairError,
    UnsupportedQueryError,
    createExchangeRate,
    formatUtcDate,
    type ExchangeRate,
    type ExchangeRateQuery
} from '@fxgate/domain';
import { createServiceLogger, type ServiceLogger } from '@fxgate/observability';
import { z } from 'zod';
import {
    defaultRequestFactory,
    type ExchangeRateService,
    type HttpTransport,
    type RequestFactory
} from './types.js';

const FREE_HOST = 'free.currencyconverterapi.com';
const ENTERPRISE_HOST = 'api.currencyconverterapi.com';
const CONVERT_PATH = '/api/v6/convert';

export const CURRENCY_CONVERTER_NAME = 'currency_converter';

const optionsSchema = z
    .object({
        access_key: z.string().optional(),
        enterprise: z.boolean().default(false)
    })
    .superRefine((value, context) => {
        if (value.enterprise && !value.access_key) {
            context.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['access_key'],
                message: 'The access_key option must be provided.'
            });
        }
    });

export type CurrencyConverterOptions = z.input<typeof optionsSchema>;

// Any `error` key marks a failure, whatever its value.
const errorResponseSchema = z
    .object({ error: z.unknown() })
    .passthrough()
    .refine((value) => 'error' in value);

const successResponseSchema = z.record(z.unknown());

// Historical answers may key the value by day: { "val": { "2017-01-01": 0.72 } }.
const conversionSchema = z.object({ val: z.union([z.number(), z.record(z.number())]) }).passthrough();

export interface CurrencyConverterDeps {
    logger?: ServiceLogger;
    /** Timestamp given to latest rates (default: now). */
    now?: () => Date;
}

/** Provider text for the error payload; undefined selects the default message. */
function describeProviderError(error: unknown): string | undefined {
    if (typeof error === 'string') {
        return error.length > 0 ? error : undefined;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message.length > 0 ? error.message : undefined;
    }
    return undefined;
}

/**
 * Rate service backed by currencyconverterapi.com.
 * One GET to /api/v6/convert per query, on the free host or, in
 * enterprise mode, on the authenticated API host.
 * @see https://www.currencyconverterapi.com/docs
 */
export class CurrencyConverterService implements ExchangeRateService {
    private readonly accessKey: string | undefined;
    private readonly enterprise: boolean;
    private readonly requestFactory: RequestFactory;
    private readonly logger: ServiceLogger;
    private readonly now: () => Date;

    constructor(
        private readonly transport: HttpTransport,
        requestFactory: RequestFactory | null,
        options: CurrencyConverterOptions,
        deps: CurrencyConverterDeps = {}
    ) {
        const parsed = optionsSchema.safeParse(options);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new ConfigurationError(issue?.message ?? 'Invalid currency_converter options.', parsed.error.issues);
        }

        this.accessKey = parsed.data.access_key;
        this.enterprise = parsed.data.enterprise;
        this.requestFactory = requestFactory ?? defaultRequestFactory;
        this.logger = deps.logger ?? createServiceLogger({ service: 'currency-converter' });
        this.now = deps.now ?? (() => new Date());
    }

    async getExchangeRate(query: ExchangeRateQuery): Promise<ExchangeRate> {
        if (!this.supportQuery(query)) {
            throw new UnsupportedQueryError(CURRENCY_CONVERTER_NAME, { query });
        }

        const pair = query.currencyPair;
        const pairKey = `${pair.baseCurrency}_${pair.quoteCurrency}`;
        const url = this.buildUrl(query, pairKey);

        const response = await this.transport.send(this.requestFactory(url));
        const value = this.parseRate(response.status, response.body, pairKey, query);

        this.logger.debug('Exchange rate fetched', {
            pair: pair.toString(),
            historical: query.kind === 'historical',
            enterprise: this.enterprise
        });

        return createExchangeRate({
            value,
            currencyPair: pair,
            date: query.kind === 'historical' ? query.date : this.now(),
            providerName: CURRENCY_CONVERTER_NAME
        });
    }

    supportQuery(query: ExchangeRateQuery): boolean {
        switch (query.kind) {
            case 'latest':
            case 'historical':
                return true;
            default:
                return false;
        }
    }

    getName(): string {
        return CURRENCY_CONVERTER_NAME;
    }

    private buildUrl(query: ExchangeRateQuery, pairKey: string): string {
        const params = new URLSearchParams({ q: pairKey });

        if (query.kind === 'historical') {
            params.set('date', formatUtcDate(query.date));
        }

        if (this.accessKey) {
            params.set('access_key', this.accessKey);
        }

        const host = this.enterprise ? ENTERPRISE_HOST : FREE_HOST;
        return `https://${host}${CONVERT_PATH}?${params.toString()}`;
    }

    private parseRate(status: number, body: string, pairKey: string, query: ExchangeRateQuery): number {
        let data: unknown;
        let decodeFailure: string | undefined;
        try {
            data = JSON.parse(body);
        } catch (error) {
            decodeFailure = error instanceof Error ? error.message : String(error);
        }

        const errorShape = decodeFailure === undefined ? errorResponseSchema.safeParse(data) : undefined;
        if (errorShape?.success) {
            throw new ProviderError(describeProviderError(errorShape.data.error), {
                status,
                error: errorShape.data.error
            });
        }

        // A non-2xx status fails as a provider error whether or not the body decodes.
        if (status < 200 || status >= 300) {
            throw new ProviderError(`currency_converter responded with status ${status}`, { status });
        }

        if (decodeFailure !== undefined) {
            throw new ResponseDecodeError(`currency_converter returned a body that is not JSON: ${decodeFailure}`, {
                status
            });
        }

        const successShape = successResponseSchema.safeParse(data);
        if (!successShape.success) {
            throw new ResponseDecodeError('currency_converter returned an unexpected payload.', { status });
        }

        const results = successResponseSchema.safeParse(successShape.data.results);
        const entry = successShape.data[pairKey] ?? (results.success ? results.data[pairKey] : undefined);
        if (entry === undefined) {
            throw new UnsupportedCurrencyPairError(query.currencyPair.toString(), CURRENCY_CONVERTER_NAME);
        }

        const conversion = conversionSchema.safeParse(entry);
        if (!conversion.success) {
            throw new ResponseDecodeError(`currency_converter returned no numeric "val" for ${pairKey}.`, {
                status,
                issues: conversion.error.issues
            });
        }

        const { val } = conversion.data;
        if (typeof val === 'number') {
            return val;
        }

        const day = query.kind === 'historical' ? formatUtcDate(query.date) : undefined;
        const dated = day === undefined ? undefined : val[day];
        if (dated === undefined) {
            throw new ResponseDecodeError(`currency_converter returned no rate for the requested day of ${pairKey}.`, {
                status,
                days: Object.keys(val)
            });
        }
        return dated;
    }
}
