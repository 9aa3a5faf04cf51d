import { FetchError, InvalidArgumentError, requireNonEmpty } from '@feedrates/domain';
import { createServiceLogger, type ServiceLogger } from '@feedrates/observability';
import type { FeedFetcher, FetchLike } from './types.js';

/** Largest delay a Node timer accepts; anything above is clamped to 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function isValidTimeout(timeoutMs: number): boolean {
    return Number.isInteger(timeoutMs) && timeoutMs >= 1 && timeoutMs <= MAX_TIMEOUT_MS;
}

export interface HttpFeedFetcherOptions {
    /** Transport reused for every request. Defaults to the global `fetch`. */
    fetchImpl?: FetchLike;
    /** Abort each request after this many milliseconds. */
    timeoutMs?: number;
    logger?: ServiceLogger;
}

/**
 * Plain-text feed fetcher over HTTP.
 * One request per call; any non-2xx status or transport failure becomes a `FetchError`.
 */
export class HttpFeedFetcher implements FeedFetcher {
    private readonly fetchImpl: FetchLike;
    private readonly timeoutMs: number | undefined;
    private readonly logger: ServiceLogger;

    constructor(options?: HttpFeedFetcherOptions) {
        this.fetchImpl = options?.fetchImpl ?? ((input: string, init?: RequestInit) => fetch(input, init));
        if (options?.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
            throw new InvalidArgumentError(
                'timeoutMs',
                `Timeout must be an integer between 1 and ${MAX_TIMEOUT_MS} ms, got ${options.timeoutMs}.`
            );
        }
        this.timeoutMs = options?.timeoutMs;
        this.logger = options?.logger ?? createServiceLogger({ service: 'feed-fetcher' });
    }

    async fetch(url: string): Promise<string> {
        requireNonEmpty(url, 'url', 'URL cannot be null or empty.');

        const init: RequestInit = {};
        if (this.timeoutMs !== undefined) {
            init.signal = AbortSignal.timeout(this.timeoutMs);
        }

        let response: Response;
        let body: string;
        try {
            response = await this.fetchImpl(url, init);
            body = response.ok ? await response.text() : '';
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn('Feed request failed', { url, error: error instanceof Error ? error : reason });
            throw new FetchError(url, `Failed to retrieve data from ${url}: ${reason}`, { cause: error });
        }

        if (!response.ok) {
            await response.body?.cancel();
            this.logger.warn('Feed responded with non-success status', { url, status: response.status });
            throw new FetchError(url, `Failed to retrieve data from ${url}: status ${response.status}`, {
                status: response.status
            });
        }

        this.logger.info('Feed fetched', { url, status: response.status, length: body.length });
        return body;
    }
}
