export type {
    ExchangeRateService,
    HttpRequest,
    HttpResponse,
    HttpTransport,
    RequestFactory
} from './types.js';
export { defaultRequestFactory } from './types.js';
export {
    CURRENCY_CONVERTER_NAME,
    CurrencyConverterService,
    type CurrencyConverterDeps,
    type CurrencyConverterOptions
} from './currency-converter.js';
export { FetchTransport } from './fetch-transport.js';
export { MockExchangeRateService } from './mock.js';

import { toCurrencyConverterOptions, type CurrencyConverterEnv } from '@fxgate/config';
import { createServiceLogger, type LogLevel } from '@fxgate/observability';
import type { ExchangeRateService, HttpTransport } from './types.js';
import { CurrencyConverterService } from './currency-converter.js';
import { FetchTransport } from './fetch-transport.js';
import { MockExchangeRateService } from './mock.js';

export interface ExchangeRateServiceConfig {
    provider: 'currency_converter' | 'mock';
    accessKey?: string;
    enterprise?: boolean;
    timeoutMs?: number;
    logLevel?: LogLevel;
    mockRates?: Record<string, number>;
}

export function createExchangeRateService(
    config: ExchangeRateServiceConfig,
    transport?: HttpTransport
): ExchangeRateService {
    switch (config.provider) {
        case 'currency_converter':
            return new CurrencyConverterService(
                transport ?? new FetchTransport(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
                null,
                {
                    enterprise: config.enterprise ?? false,
                    ...(config.accessKey ? { access_key: config.accessKey } : {})
                },
                {
                    logger: createServiceLogger({
                        service: 'currency-converter',
                        ...(config.logLevel ? { minLevel: config.logLevel } : {})
                    })
                }
            );
        case 'mock':
            return new MockExchangeRateService(config.mockRates);
        default:
            throw new Error(`Unknown exchange rate provider: ${config.provider as string}`);
    }
}

export function createExchangeRateServiceFromEnv(env: CurrencyConverterEnv, transport?: HttpTransport): ExchangeRateService {
    const options = toCurrencyConverterOptions(env);
    return createExchangeRateService(
        {
            provider: env.FX_PROVIDER,
            enterprise: options.enterprise,
            timeoutMs: env.CURRENCY_CONVERTER_TIMEOUT_MS,
            ...(options.access_key ? { accessKey: options.access_key } : {}),
            ...(env.LOG_LEVEL ? { logLevel: env.LOG_LEVEL } : {})
        },
        transport
    );
}
