import type { Config } from '../shared/config.js';
import { createSeededRandom, type RandomSource, type SleepFn } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { DelayPolicy } from './delay.js';
import { RetryPolicy } from './retry.js';
import { HttpClient, type FetchFn } from './http.js';
import { StaticFetcher } from './staticFetcher.js';
import { DynamicSession, type BrowserLauncher } from './dynamicSession.js';
import { CrawlOrchestrator, type CrawlResult } from './orchestrator.js';
import { buildSiteProfile, extractListings, extractReviews, type SiteProfile } from './profile.js';
import { dedupeRecords, listingKey, reviewKey } from './dedup.js';
import type { ExtractedRecord, FetchTask, ReviewRecord } from './types.js';

/**
 * Seams for everything that touches the network, the clock or a browser.
 */
export interface CrawlDeps {
  fetchFn?: FetchFn;
  launcher?: BrowserLauncher;
  random?: RandomSource;
  sleep?: SleepFn;
  clock?: () => Date;
}

export interface CrawlToolkit {
  delay: DelayPolicy;
  retry: RetryPolicy;
  client: HttpClient;
  fetcher: StaticFetcher;
  profile: SiteProfile;
}

export function createCrawlToolkit(config: Config, deps: CrawlDeps = {}): CrawlToolkit {
  const { scraping } = config;
  const random = deps.random ?? (scraping.seed !== undefined ? createSeededRandom(scraping.seed) : Math.random);
  const delay = DelayPolicy.fromSeconds(scraping.delay_min_s, scraping.delay_max_s, {
    random,
    sleep: deps.sleep,
  });
  const retry = new RetryPolicy({
    maxAttempts: scraping.max_retries,
    delay,
    backoffMultiplier: scraping.backoff_multiplier,
    maxDelayMs: scraping.max_backoff_s * 1000,
  });
  const client = new HttpClient({
    fetchFn: deps.fetchFn,
    timeoutMs: scraping.timeout_ms,
    userAgents: scraping.user_agents,
  });
  const fetcher = new StaticFetcher({ client, retry, sleep: deps.sleep });
  const profile = buildSiteProfile(
    'configured',
    config.listings.selectors,
    config.reviews.selectors,
    config.reviews.max_reviews,
  );
  return { delay, retry, client, fetcher, profile };
}

export function listingUrl(baseUrl: string, category: string, page: number): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/category/${encodeURIComponent(category)}?page=${page}`;
}

/**
 * Tasks in crawl order: every page of the first category, then the next.
 */
export function* planListingTasks(
  baseUrl: string,
  categories: readonly string[],
  maxPages: number,
): Generator<FetchTask> {
  for (const category of categories) {
    for (let page = 1; page <= maxPages; page++) {
      yield { category, page, url: listingUrl(baseUrl, category, page), attempts: 0 };
    }
  }
}

export function* planReviewTasks(productUrls: readonly string[]): Generator<FetchTask> {
  let page = 0;
  for (const url of productUrls) {
    page++;
    yield { category: 'reviews', page, url, attempts: 0 };
  }
}

export interface ListingCrawlOptions {
  baseUrl?: string;
  categories?: string[];
  maxPages?: number;
  signal?: AbortSignal;
}

/**
 * Static crawl of category listing pages, deduplicated by (source URL, page, position).
 */
export async function runListingCrawl(
  config: Config,
  options: ListingCrawlOptions = {},
  deps: CrawlDeps = {},
): Promise<CrawlResult<ExtractedRecord>> {
  const baseUrl = options.baseUrl ?? config.listings.base_url;
  const categories = options.categories ?? config.listings.categories;
  const maxPages = options.maxPages ?? config.listings.max_pages;
  const toolkit = createCrawlToolkit(config, deps);

  logger.info({ baseUrl, categories, maxPages }, 'Starting listing crawl');
  const orchestrator = new CrawlOrchestrator<ExtractedRecord>({
    source: toolkit.fetcher,
    extract: extractListings(toolkit.profile.listing, config.listings.source_tag),
    delay: toolkit.delay,
    clock: deps.clock,
  });
  const result = await orchestrator.run(planListingTasks(baseUrl, categories, maxPages), options.signal);
  return { ...result, records: dedupeRecords(result.records, listingKey) };
}

export interface ReviewCrawlOptions {
  productUrls?: string[];
  signal?: AbortSignal;
}

/**
 * Rendered-DOM crawl of product pages, deduplicated by (reviewer, date, text).
 * A browser that cannot launch fails the whole crawl with DriverError.
 */
export async function runReviewCrawl(
  config: Config,
  options: ReviewCrawlOptions = {},
  deps: CrawlDeps = {},
): Promise<CrawlResult<ReviewRecord>> {
  const productUrls = options.productUrls ?? config.reviews.product_urls;
  const toolkit = createCrawlToolkit(config, deps);
  const session = new DynamicSession({
    headless: config.scraping.headless,
    timeoutMs: config.scraping.timeout_ms,
    userAgent: toolkit.client.nextUserAgent(),
    executablePath: config.scraping.browser_executable,
    marker: config.reviews.marker,
    waitTimeoutMs: config.reviews.wait_timeout_ms,
    launcher: deps.launcher,
  });

  logger.info({ products: productUrls.length }, 'Starting review crawl');
  const orchestrator = new CrawlOrchestrator<ReviewRecord>({
    source: session,
    extract: extractReviews(toolkit.profile.review),
    delay: toolkit.delay,
    clock: deps.clock,
  });
  const result = await orchestrator.run(planReviewTasks(productUrls), options.signal);
  return { ...result, records: dedupeRecords(result.records, reviewKey) };
}
