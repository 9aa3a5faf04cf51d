import { isValidTimeout, MAX_TIMEOUT_MS } from '@feedrates/adapters';
import { isCurrencyCode } from '@feedrates/domain';
import type { ParsedArgs } from './types.js';

const VALUE_FLAGS = new Set(['--common-url', '--other-url', '--timeout']);

export function parseArgs(argv: string[]): ParsedArgs {
  const codes: string[] = [];
  const values = new Map<string, string>();
  let json = false;

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    if (!current) {
      continue;
    }

    if (current === '--json') {
      json = true;
      continue;
    }

    if (VALUE_FLAGS.has(current)) {
      const next = argv[i + 1];
      if (!next || next.startsWith('--')) {
        throw new Error(`Missing value for ${current}.`);
      }
      values.set(current, next);
      i += 1;
      continue;
    }

    if (current.startsWith('-')) {
      throw new Error(`Unknown option ${current}.`);
    }

    const code = current.toUpperCase();
    if (!isCurrencyCode(code)) {
      throw new Error(`Invalid currency code "${current}". Expected three letters, e.g. USD.`);
    }
    codes.push(code);
  }

  if (codes.length === 0) {
    throw new Error('At least one currency code is required.');
  }

  const timeoutRaw = values.get('--timeout');
  const timeoutMs = timeoutRaw ? Number(timeoutRaw) : undefined;
  if (timeoutMs !== undefined && !isValidTimeout(timeoutMs)) {
    throw new Error(`Invalid --timeout value. It must be an integer between 1 and ${MAX_TIMEOUT_MS}.`);
  }

  const commonUrl = values.get('--common-url');
  const otherUrl = values.get('--other-url');

  return {
    codes,
    json,
    ...(commonUrl ? { commonUrl } : {}),
    ...(otherUrl ? { otherUrl } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {})
  };
}
