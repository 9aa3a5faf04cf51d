#!/usr/bin/env node
import { FeedExchangeRateProvider, HttpFeedFetcher } from '@feedrates/adapters';
import { loadRatesConfig } from '@feedrates/config';
import { currency } from '@feedrates/domain';
import { createServiceLogger } from '@feedrates/observability';
import { formatError, formatRates } from './format.js';
import { parseArgs } from './parser.js';

function usage(): string {
  return [
    'Usage:',
    '  rates-cli <CODE> [<CODE> ...] [--common-url <url>] [--other-url <url>] [--timeout <ms>] [--json]',
    '',
    'Environment:',
    '  RATES_COMMON_FEED_URL, RATES_OTHER_FEED_URL, RATES_FETCH_TIMEOUT_MS, LOG_LEVEL'
  ].join('\n');
}

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
    console.log(usage());
    process.exit(0);
  }

  const args = parseArgs(rawArgs);
  const config = loadRatesConfig();
  // stdout carries the result; keep logs to warnings unless asked otherwise
  const logger = createServiceLogger({ service: 'rates-cli', minLevel: config.LOG_LEVEL ?? 'warn' });
  const timeoutMs = args.timeoutMs ?? config.RATES_FETCH_TIMEOUT_MS;

  const provider = new FeedExchangeRateProvider({
    commonCurrenciesUrl: args.commonUrl ?? config.RATES_COMMON_FEED_URL,
    otherCurrenciesUrl: args.otherUrl ?? config.RATES_OTHER_FEED_URL,
    fetcher: new HttpFeedFetcher({ logger, ...(timeoutMs !== undefined ? { timeoutMs } : {}) }),
    logger
  });

  const rates = await provider.getRates(args.codes.map((code) => currency(code)));
  console.log(formatRates(rates, { json: args.json }));
}

main().catch((error) => {
  console.error(formatError(error, { json: process.argv.includes('--json') }));
  process.exit(1);
});
