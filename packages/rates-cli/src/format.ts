import { RatesError, type ExchangeRate } from '@feedrates/domain';
import type { FormatOptions } from './types.js';

export function formatRates(rates: ExchangeRate[], options: FormatOptions): string {
  if (options.json) {
    return JSON.stringify(rates.map((rate) => rate.toJSON()), null, 2);
  }

  if (rates.length === 0) {
    return 'No exchange rates found.';
  }

  return rates.map((rate) => rate.toString()).join('\n');
}

export function formatError(error: unknown, options: FormatOptions): string {
  const message = error instanceof Error ? error.message : String(error);

  if (!options.json) {
    return `rates-cli error: ${message}`;
  }

  if (error instanceof RatesError) {
    return JSON.stringify(error.toJSON());
  }

  return JSON.stringify({ error: { code: 'UNEXPECTED_ERROR', message } });
}
