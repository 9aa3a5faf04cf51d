import { FetchError, InvalidArgumentError } from '@feedrates/domain';
import type { ServiceLogger } from '@feedrates/observability';
import { describe, expect, it, vi } from 'vitest';
import { HttpFeedFetcher, MAX_TIMEOUT_MS } from '../src/fx/feed-fetcher.js';

const URL = 'https://feeds.test/daily.txt';

function silentLogger(): ServiceLogger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('HttpFeedFetcher', () => {
    it('returns the body of a successful response', async () => {
        const fetchImpl = vi.fn().mockResolvedValue(new Response('A|B|1|USD|22.48', { status: 200 }));
        const fetcher = new HttpFeedFetcher({ fetchImpl, logger: silentLogger() });

        await expect(fetcher.fetch(URL)).resolves.toBe('A|B|1|USD|22.48');
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(fetchImpl.mock.calls[0]?.[0]).toBe(URL);
    });

    it('rejects an empty url before any request', async () => {
        const fetchImpl = vi.fn();
        const fetcher = new HttpFeedFetcher({ fetchImpl, logger: silentLogger() });

        await expect(fetcher.fetch('')).rejects.toBeInstanceOf(InvalidArgumentError);
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('turns a non-success status into a FetchError', async () => {
        const fetchImpl = vi.fn().mockResolvedValue(new Response('gone', { status: 404 }));
        const logger = silentLogger();
        const fetcher = new HttpFeedFetcher({ fetchImpl, logger });

        const error = await fetcher.fetch(URL).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ url: URL, status: 404, code: 'FETCH_FAILED' });
        expect(logger.warn).toHaveBeenCalledWith('Feed responded with non-success status', { url: URL, status: 404 });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('releases the body of a non-success response', async () => {
        const response = new Response('service unavailable', { status: 503 });
        const fetcher = new HttpFeedFetcher({ fetchImpl: vi.fn().mockResolvedValue(response), logger: silentLogger() });

        await expect(fetcher.fetch(URL)).rejects.toMatchObject({ status: 503 });
        expect(response.bodyUsed).toBe(true);
    });

    it('turns a transport failure into a FetchError without retrying', async () => {
        const fetchImpl = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
        const logger = silentLogger();
        const fetcher = new HttpFeedFetcher({ fetchImpl, logger });

        await expect(fetcher.fetch(URL)).rejects.toThrow(`Failed to retrieve data from ${URL}: fetch failed`);
        expect(logger.warn).toHaveBeenCalledWith('Feed request failed', { url: URL, error: expect.any(TypeError) });
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('aborts requests that exceed the timeout', async () => {
        const fetchImpl = vi.fn(
            (_input: string, init?: RequestInit) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted due to timeout')));
                })
        );
        const fetcher = new HttpFeedFetcher({ fetchImpl, timeoutMs: 5, logger: silentLogger() });

        await expect(fetcher.fetch(URL)).rejects.toBeInstanceOf(FetchError);
    });

    it('accepts timeouts up to the largest timer delay', () => {
        expect(() => new HttpFeedFetcher({ timeoutMs: 1, logger: silentLogger() })).not.toThrow();
        expect(() => new HttpFeedFetcher({ timeoutMs: MAX_TIMEOUT_MS, logger: silentLogger() })).not.toThrow();
    });

    it('rejects timeouts a timer cannot honour', () => {
        expect(() => new HttpFeedFetcher({ timeoutMs: MAX_TIMEOUT_MS + 1 })).toThrow(InvalidArgumentError);
        expect(() => new HttpFeedFetcher({ timeoutMs: 3_000_000_000 })).toThrow(
            'Timeout must be an integer between 1 and 2147483647 ms, got 3000000000.'
        );
        expect(() => new HttpFeedFetcher({ timeoutMs: 0 })).toThrow(InvalidArgumentError);
        expect(() => new HttpFeedFetcher({ timeoutMs: -5 })).toThrow(InvalidArgumentError);
        expect(() => new HttpFeedFetcher({ timeoutMs: 1.5 })).toThrow(InvalidArgumentError);
    });

    it('uses the global fetch by default', async () => {
        const originalFetch = globalThis.fetch;
        const fetchMock = vi.fn().mockResolvedValue(new Response('body', { status: 200 }));
        globalThis.fetch = fetchMock;

        try {
            const fetcher = new HttpFeedFetcher({ logger: silentLogger() });
            await expect(fetcher.fetch(URL)).resolves.toBe('body');
            expect(fetchMock).toHaveBeenCalledTimes(1);
        } finally {
            globalThis.fetch = originalFetch;
        }
    });
});
