import { describe, it, expect, vi } from 'vitest';
import { listingUrl, planListingTasks, planReviewTasks, runListingCrawl, runReviewCrawl } from '../jobs.js';
import { parseConfig } from '../../shared/config.js';
import { DriverError } from '../../shared/errors.js';
import type { BrowserLauncher } from '../dynamicSession.js';
import type { FetchFn } from '../http.js';
import { fakeLauncher } from './fakes.js';

const sleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => {};

const config = parseConfig({
  scraping: { delay_min_s: 0, delay_max_s: 0, max_retries: 3, seed: 1 },
  listings: { base_url: 'http://shop.test/', categories: ['books'], max_pages: 3 },
  reviews: { product_urls: [] },
});

function listingPage(names: string[]): string {
  const items = names
    .map((n) => `<div class="product-item"><h3 class="product-name">${n}</h3><span class="price">$5</span></div>`)
    .join('');
  return `<html><body>${items}</body></html>`;
}

describe('listingUrl', () => {
  it('builds a category page URL', () => {
    expect(listingUrl('http://shop.test/', 'home & garden', 2)).toBe(
      'http://shop.test/category/home%20%26%20garden?page=2',
    );
  });
});

describe('planListingTasks', () => {
  it('visits every page of a category before the next category', () => {
    const plan = [...planListingTasks('http://shop.test', ['a', 'b'], 2)].map((t) => `${t.category}:${t.page}`);
    expect(plan).toEqual(['a:1', 'a:2', 'b:1', 'b:2']);
  });
});

describe('planReviewTasks', () => {
  it('numbers product pages from one', () => {
    const plan = [...planReviewTasks(['http://shop.test/p/1', 'http://shop.test/p/2'])];
    expect(plan.map((t) => t.page)).toEqual([1, 2]);
    expect(plan[0]).toMatchObject({ category: 'reviews', url: 'http://shop.test/p/1', attempts: 0 });
  });
});

describe('runListingCrawl', () => {
  it('collects pages 1 and 3 when page 2 keeps failing', async () => {
    const fetchFn = vi.fn<FetchFn>(async (url) => {
      if (url.endsWith('page=2')) return new Response('down', { status: 500 });
      const page = url.endsWith('page=1') ? 1 : 3;
      return new Response(listingPage([`Book ${page}a`, `Book ${page}b`]));
    });

    const result = await runListingCrawl(config, {}, { fetchFn, sleep });

    expect(result.records.map((r) => r.name)).toEqual(['Book 1a', 'Book 1b', 'Book 3a', 'Book 3b']);
    expect(result.records.every((r) => r.price === 5 && r.source === 'competitor_site')).toBe(true);
    expect(result.pagesFailed).toBe(1);
    expect(result.failures[0]).toMatchObject({ page: 2, attempts: 3 });
    expect(fetchFn).toHaveBeenCalledTimes(5);
  });

  it('honours option overrides', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response(listingPage(['Pen'])));

    const result = await runListingCrawl(
      config,
      { baseUrl: 'http://other.test', categories: ['office'], maxPages: 1 },
      { fetchFn, sleep },
    );

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe('http://other.test/category/office?page=1');
    expect(result.records).toHaveLength(1);
  });
});

describe('runReviewCrawl', () => {
  const PRODUCT = 'http://shop.test/product/7';
  const REVIEWS = `<html><body>
    <div class="review-item"><span class="reviewer-name">Ana</span><span class="review-date">2026-01-01</span><p class="review-text">Good</p></div>
    <div class="review-item"><span class="reviewer-name">Ben</span><span class="review-date">2026-01-02</span><p class="review-text">Fine</p></div>
  </body></html>`;

  it('does not duplicate reviews when a product is listed twice', async () => {
    const fake = fakeLauncher({ pages: { [PRODUCT]: REVIEWS } });

    const result = await runReviewCrawl(config, { productUrls: [PRODUCT, PRODUCT] }, { launcher: fake.launcher, sleep });

    expect(fake.visited).toEqual([PRODUCT, PRODUCT]);
    expect(result.records.map((r) => r.reviewer_name)).toEqual(['Ana', 'Ben']);
    expect(fake.close).toHaveBeenCalledTimes(1);
  });

  it('moves on after a page whose marker never renders', async () => {
    const SLOW = 'http://shop.test/product/8';
    const fake = fakeLauncher({ pages: { [SLOW]: '<p>spinner</p>', [PRODUCT]: REVIEWS } });

    const result = await runReviewCrawl(config, { productUrls: [SLOW, PRODUCT] }, { launcher: fake.launcher, sleep });

    expect(fake.visited).toEqual([SLOW, PRODUCT]);
    expect(result.pagesFailed).toBe(0);
    expect(result.pagesFetched).toBe(2);
    expect(result.records.map((r) => r.product_url)).toEqual([PRODUCT, PRODUCT]);
  });

  it('fails the crawl when the browser cannot launch', async () => {
    const launcher = vi.fn<BrowserLauncher>(async () => {
      throw new Error('no chromium');
    });
    await expect(runReviewCrawl(config, { productUrls: [PRODUCT] }, { launcher, sleep })).rejects.toBeInstanceOf(
      DriverError,
    );
  });
});
