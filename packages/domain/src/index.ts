export { currency, currencyIndex, currencyEquals, isCurrencyCode, type Currency } from './currency.js';
export { ExchangeRate, type ExchangeRateJson } from './exchange-rate.js';
export {
    ERRORS,
    FetchError,
    InvalidArgumentError,
    RatesError,
    requireNonEmpty,
    type RatesErrorDefinition
} from './errors.js';
