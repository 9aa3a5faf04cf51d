import { requireNonEmpty, type Currency, type ExchangeRate } from '@feedrates/domain';
import { createServiceLogger, type ServiceLogger } from '@feedrates/observability';
import { HttpFeedFetcher } from './feed-fetcher.js';
import { extractRates } from './rate-extractor.js';
import type { ExchangeRateProvider, FeedFetcher } from './types.js';

export interface FeedExchangeRateProviderOptions {
    commonCurrenciesUrl: string;
    otherCurrenciesUrl: string;
    /** Held for the provider's lifetime. Defaults to an `HttpFeedFetcher` over the global `fetch`. */
    fetcher?: FeedFetcher;
    logger?: ServiceLogger;
}

/**
 * Rate provider backed by two plain-text feeds.
 *
 * The common feed is always read. The other feed is read only when the common
 * feed returned fewer rates than currencies were requested. That is a count
 * heuristic: it does not check which currencies are missing, so a common feed
 * with extra matching rows can suppress the fallback, and the fallback may run
 * for a currency neither feed carries.
 */
export class FeedExchangeRateProvider implements ExchangeRateProvider {
    private readonly commonCurrenciesUrl: string;
    private readonly otherCurrenciesUrl: string;
    private readonly fetcher: FeedFetcher;
    private readonly logger: ServiceLogger;

    constructor(options: FeedExchangeRateProviderOptions) {
        this.commonCurrenciesUrl = requireNonEmpty(
            options.commonCurrenciesUrl,
            'commonCurrenciesUrl',
            'Common currencies URL cannot be null or empty.'
        );
        this.otherCurrenciesUrl = requireNonEmpty(
            options.otherCurrenciesUrl,
            'otherCurrenciesUrl',
            'Other currencies URL cannot be null or empty.'
        );
        this.logger = options.logger ?? createServiceLogger({ service: 'rates-provider' });
        this.fetcher = options.fetcher ?? new HttpFeedFetcher({ logger: this.logger });
    }

    async getRates(currencies: Iterable<Currency> | null | undefined): Promise<ExchangeRate[]> {
        const requested = currencies ? [...currencies] : [];
        if (requested.length === 0) {
            return [];
        }

        const rates = await this.fetchAndExtract(this.commonCurrenciesUrl, requested);

        if (requested.length > rates.length) {
            this.logger.debug('Common feed returned fewer rates than requested, reading other feed', {
                requested: requested.length,
                found: rates.length
            });
            const additional = await this.fetchAndExtract(this.otherCurrenciesUrl, requested);
            rates.push(...additional);
        }

        this.logger.info('Exchange rates resolved', { requested: requested.length, found: rates.length });
        return rates;
    }

    private async fetchAndExtract(url: string, currencies: Currency[]): Promise<ExchangeRate[]> {
        const content = await this.fetcher.fetch(url);
        return extractRates(content, currencies);
    }
}
