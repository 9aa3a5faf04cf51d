export { DEFAULT_COMMON_FEED_URL, DEFAULT_OTHER_FEED_URL, loadRatesConfig, type RatesConfig } from './env.js';
