import { Decimal } from 'decimal.js';
import type { Currency } from './currency.js';
import { InvalidArgumentError } from './errors.js';

export interface ExchangeRateJson {
    currency: string;
    amount: number;
    rate: string;
}

/**
 * A quotation declared by a feed: `amount` units of `currency` are worth
 * `rate` units of the feed's reference currency.
 *
 * The reference currency is implied by the feed and is not modelled here.
 */
export class ExchangeRate {
    readonly currency: Currency;
    readonly amount: number;
    readonly rate: Decimal;

    constructor(currency: Currency, amount: number, rate: Decimal) {
        if (!Number.isInteger(amount) || amount <= 0) {
            throw new InvalidArgumentError('amount', `Amount must be a positive integer, got ${amount}.`);
        }
        if (rate.isNaN() || rate.lessThan(0)) {
            throw new InvalidArgumentError('rate', `Rate must be a non-negative decimal, got ${rate.toString()}.`);
        }

        this.currency = currency;
        this.amount = amount;
        this.rate = rate;
        Object.freeze(this);
    }

    toString(): string {
        return `${this.amount} ${this.currency.code} = ${this.rate.toString()}`;
    }

    toJSON(): ExchangeRateJson {
        return {
            currency: this.currency.code,
            amount: this.amount,
            rate: this.rate.toString()
        };
    }
}
