import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const boolFromString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    FX_PROVIDER: z.enum(['currency_converter', 'mock']).default('currency_converter'),
    CURRENCY_CONVERTER_ACCESS_KEY: optionalNonEmptyString,
    CURRENCY_CONVERTER_ENTERPRISE: boolFromString,
    CURRENCY_CONVERTER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    LOG_LEVEL: z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional())
  })
  .superRefine((value, context) => {
    if (value.CURRENCY_CONVERTER_ENTERPRISE && !value.CURRENCY_CONVERTER_ACCESS_KEY) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CURRENCY_CONVERTER_ACCESS_KEY'],
        message: 'CURRENCY_CONVERTER_ACCESS_KEY is required when CURRENCY_CONVERTER_ENTERPRISE=true.'
      });
    }
  });

export type CurrencyConverterEnv = z.infer<typeof envSchema>;

export interface CurrencyConverterEnvOptions {
  access_key?: string;
  enterprise: boolean;
}

export function loadCurrencyConverterEnv(input: NodeJS.ProcessEnv = process.env): CurrencyConverterEnv {
  return envSchema.parse(input);
}

export function toCurrencyConverterOptions(env: CurrencyConverterEnv): CurrencyConverterEnvOptions {
  return {
    enterprise: env.CURRENCY_CONVERTER_ENTERPRISE,
    ...(env.CURRENCY_CONVERTER_ACCESS_KEY ? { access_key: env.CURRENCY_CONVERTER_ACCESS_KEY } : {})
  };
}
