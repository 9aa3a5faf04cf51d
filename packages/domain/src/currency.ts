import { InvalidArgumentError } from './errors.js';

/** ISO 4217-style three letter code identifying a quoted currency. */
export interface Currency {
    readonly code: string;
}

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export function isCurrencyCode(code: string): boolean {
    return CURRENCY_CODE_PATTERN.test(code);
}

export function currency(code: string): Currency {
    if (!isCurrencyCode(code)) {
        throw new InvalidArgumentError('code', `Currency code must be three uppercase letters, got "${code}".`);
    }
    return Object.freeze({ code });
}

export function currencyEquals(a: Currency, b: Currency): boolean {
    return a.code === b.code;
}

/** Index currencies by code. The first value seen for a code wins. */
export function currencyIndex(currencies: Iterable<Currency>): Map<string, Currency> {
    const index = new Map<string, Currency>();
    for (const c of currencies) {
        if (!index.has(c.code)) {
            index.set(c.code, c);
        }
    }
    return index;
}
