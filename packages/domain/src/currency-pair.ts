import { InvalidArgumentError } from './errors.js';

const CURRENCY_CODE = /^[A-Z]{3}$/;

function assertCurrencyCode(code: string, role: 'base' | 'quote'): void {
    if (!CURRENCY_CODE.test(code)) {
        throw new InvalidArgumentError(`The ${role} currency "${code}" must be a three-letter ISO 4217 code.`, {
            [role]: code
        });
    }
}

/** Ordered base/quote pair of ISO 4217 codes. Instances are frozen. */
export class CurrencyPair {
    readonly baseCurrency: string;
    readonly quoteCurrency: string;

    constructor(baseCurrency: string, quoteCurrency: string) {
        assertCurrencyCode(baseCurrency, 'base');
        assertCurrencyCode(quoteCurrency, 'quote');
        this.baseCurrency = baseCurrency;
        this.quoteCurrency = quoteCurrency;
        Object.freeze(this);
    }

    /** Parses a pair written as `BASE/QUOTE`, e.g. `EUR/USD`. */
    static createFromString(value: string): CurrencyPair {
        const parts = value.split('/').map((part) => part.trim());
        const [base, quote] = parts;

        if (parts.length !== 2 || !base || !quote || !CURRENCY_CODE.test(base) || !CURRENCY_CODE.test(quote)) {
            throw new InvalidArgumentError('The currency pair must be in the form "EUR/USD".', { value });
        }

        return new CurrencyPair(base, quote);
    }

    isIdentical(): boolean {
        return this.baseCurrency === this.quoteCurrency;
    }

    equals(other: CurrencyPair): boolean {
        return this.baseCurrency === other.baseCurrency && this.quoteCurrency === other.quoteCurrency;
    }

    toString(): string {
        return `${this.baseCurrency}/${this.quoteCurrency}`;
    }
}
