import type { Currency, ExchangeRate } from '@feedrates/domain';

/** Transport capability: one request, one text body, or a thrown `FetchError`. */
export interface FeedFetcher {
    fetch(url: string): Promise<string>;
}

export interface ExchangeRateProvider {
    /**
     * Return the rates the source declares for the requested currencies.
     * Rates are never derived by inversion or cross-multiplication.
     */
    getRates(currencies: Iterable<Currency> | null | undefined): Promise<ExchangeRate[]>;
}

/** Subset of the global `fetch` signature the feed fetcher relies on. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
