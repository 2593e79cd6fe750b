import { vi, type Mock } from 'vitest';
import { HttpClient, type FetchFn } from '../../crawl/http.js';
import { StaticFetcher } from '../../crawl/staticFetcher.js';
import { DelayPolicy } from '../../crawl/delay.js';
import { RetryPolicy } from '../../crawl/retry.js';

/**
 * Static fetcher over a routing fake: the first route whose key is a prefix of
 * the requested URL answers; anything else is a 404.
 */
export function routedFetcher(routes: Record<string, () => Response>) {
  const fetchFn: Mock<FetchFn> = vi.fn<FetchFn>(async (url) => {
    const match = Object.keys(routes).find((prefix) => url.startsWith(prefix));
    const route = match === undefined ? undefined : routes[match];
    return route ? route() : new Response('not found', { status: 404 });
  });
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const delay = new DelayPolicy({ minMs: 0, maxMs: 0, sleep });
  const retry = new RetryPolicy({ maxAttempts: 1, delay });
  const fetcher = new StaticFetcher({ client: new HttpClient({ fetchFn }), retry, sleep });
  return { fetcher, fetchFn, delay, sleep };
}

export function json(value: unknown, status = 200): () => Response {
  return () => new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } });
}
