import { describe, expect, it } from 'vitest';
import { CurrencyPair } from '../src/currency-pair.js';
import { InvalidArgumentError } from '../src/errors.js';

describe('CurrencyPair', () => {
  it('parses a BASE/QUOTE string', () => {
    const pair = CurrencyPair.createFromString('USD/EUR');

    expect(pair.baseCurrency).toBe('USD');
    expect(pair.quoteCurrency).toBe('EUR');
    expect(pair.toString()).toBe('USD/EUR');
  });

  it('trims whitespace around codes', () => {
    expect(CurrencyPair.createFromString(' GBP / JPY ').toString()).toBe('GBP/JPY');
  });

  it.each(['USD', 'USD/EUR/GBP', 'usd/eur', 'US/EUR', '/EUR', ''])('rejects %j', (value) => {
    expect(() => CurrencyPair.createFromString(value)).toThrow(InvalidArgumentError);
    expect(() => CurrencyPair.createFromString(value)).toThrow('The currency pair must be in the form "EUR/USD".');
  });

  it('validates codes passed to the constructor', () => {
    expect(() => new CurrencyPair('USD', 'EURO')).toThrow('The quote currency "EURO" must be a three-letter ISO 4217 code.');
  });

  it('detects identical pairs', () => {
    expect(new CurrencyPair('EUR', 'EUR').isIdentical()).toBe(true);
    expect(new CurrencyPair('EUR', 'USD').isIdentical()).toBe(false);
  });

  it('compares by value', () => {
    const pair = CurrencyPair.createFromString('USD/EUR');

    expect(pair.equals(new CurrencyPair('USD', 'EUR'))).toBe(true);
    expect(pair.equals(new CurrencyPair('EUR', 'USD'))).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(CurrencyPair.createFromString('USD/EUR'))).toBe(true);
  });
});
