export {
  loadCurrencyConverterEnv,
  toCurrencyConverterOptions,
  type CurrencyConverterEnv,
  type CurrencyConverterEnvOptions
} from './env.js';
