import { z } from 'zod';

export const DEFAULT_COMMON_FEED_URL =
  'https://www.cnb.cz/en/financial-markets/foreign-exchange-market/central-bank-exchange-rate-fixing/central-bank-exchange-rate-fixing/daily.txt';
export const DEFAULT_OTHER_FEED_URL =
  'https://www.cnb.cz/en/financial-markets/foreign-exchange-market/fx-rates-of-other-currencies/fx-rates-of-other-currencies/fx_rates.txt';

// Node timers clamp larger delays to 1 ms
const MAX_TIMEOUT_MS = 2_147_483_647;

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional()),
  RATES_COMMON_FEED_URL: z.preprocess(emptyStringToUndefined, z.string().url().default(DEFAULT_COMMON_FEED_URL)),
  RATES_OTHER_FEED_URL: z.preprocess(emptyStringToUndefined, z.string().url().default(DEFAULT_OTHER_FEED_URL)),
  RATES_FETCH_TIMEOUT_MS: z.preprocess(emptyStringToUndefined, z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional())
});

export type RatesConfig = z.infer<typeof envSchema>;

export function loadRatesConfig(input: NodeJS.ProcessEnv = process.env): RatesConfig {
  return envSchema.parse(input);
}
