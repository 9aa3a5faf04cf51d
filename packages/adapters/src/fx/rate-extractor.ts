import { Decimal } from 'decimal.js';
import { currencyIndex, ExchangeRate, InvalidArgumentError, requireNonEmpty, type Currency } from '@feedrates/domain';

// source|target|amount|code|rate
const FIELD_COUNT = 5;
const AMOUNT_FIELD = 2;
const CODE_FIELD = 3;
const RATE_FIELD = 4;
const CODE_LENGTH = 3;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

const WHOLE_NUMBER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/** Parse a signed 32-bit whole number, tolerating surrounding whitespace. */
export function parseWholeNumber(raw: string): number | undefined {
    const value = raw.trim();
    if (!WHOLE_NUMBER_PATTERN.test(value)) {
        return undefined;
    }
    const parsed = Number(value);
    if (parsed < INT32_MIN || parsed > INT32_MAX) {
        return undefined;
    }
    return parsed;
}

/** Parse a decimal number without binary floating-point rounding. */
export function parseDecimal(raw: string): Decimal | undefined {
    const value = raw.trim();
    if (!DECIMAL_PATTERN.test(value)) {
        return undefined;
    }
    return new Decimal(value);
}

/**
 * Extract the rates for the requested currencies from a pipe-delimited feed.
 *
 * Lines that are not well-formed records (headers, blank lines, wrong field
 * count, wrong code length, unparsable numbers) are skipped, as are records
 * for currencies that were not requested. Output follows line order.
 */
export function extractRates(content: string, currencies: Iterable<Currency> | null | undefined): ExchangeRate[] {
    requireNonEmpty(content, 'content', 'Content cannot be null or empty.');
    if (currencies === null || currencies === undefined) {
        throw new InvalidArgumentError('currencies', 'Currencies cannot be null.');
    }

    const requested = currencyIndex(currencies);
    const rates: ExchangeRate[] = [];

    for (const line of content.split('\n')) {
        const fields = line.split('|');
        if (fields.length !== FIELD_COUNT) continue;

        const code = fields[CODE_FIELD] ?? '';
        if (code.length !== CODE_LENGTH) continue;

        const quoted = requested.get(code);
        if (quoted === undefined) continue;

        const amount = parseWholeNumber(fields[AMOUNT_FIELD] ?? '');
        const rate = parseDecimal(fields[RATE_FIELD] ?? '');
        if (amount === undefined || rate === undefined) continue;

        // An ExchangeRate needs a positive unit size and a non-negative rate.
        if (amount <= 0 || rate.lessThan(0)) continue;

        rates.push(new ExchangeRate(quoted, amount, rate));
    }

    return rates;
}
