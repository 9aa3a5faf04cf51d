export type { ExchangeRateProvider, FeedFetcher, FetchLike } from './types.js';
export { HttpFeedFetcher, isValidTimeout, MAX_TIMEOUT_MS, type HttpFeedFetcherOptions } from './feed-fetcher.js';
export { extractRates, parseDecimal, parseWholeNumber } from './rate-extractor.js';
export { FeedExchangeRateProvider, type FeedExchangeRateProviderOptions } from './feed-rate-provider.js';
