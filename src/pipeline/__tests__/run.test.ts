import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../../db/migrate.js';
import { parseConfig, type Config } from '../../shared/config.js';
import { CancelledError } from '../../shared/errors.js';
import { isStageName, runPipeline, summaryPath, type PipelineDeps } from '../run.js';
import type { FetchFn } from '../../crawl/http.js';
import type { BrowserLauncher } from '../../crawl/dynamicSession.js';
import { fakeLauncher } from '../../crawl/__tests__/fakes.js';

const NOW = new Date('2026-06-01T08:00:00.000Z');
const PRODUCT = 'http://shop.test/product/1';

let db: Database.Database;
let outDir: string;
let config: Config;

const routes: Record<string, unknown> = {
  'http://catalog.test/products': [{ id: 1, title: 'Mug', price: 4 }],
  'http://catalog.test/users': [{ id: 1, email: 'ana@example.test' }],
  'http://catalog.test/carts': [{ id: 1, userId: 1, date: '2026-05-01', products: [{ productId: 1, quantity: 3 }] }],
  'https://social.test/search.json': {
    data: { children: [{ data: { title: 'Mugs?', permalink: '/r/x/1', score: 2 } }] },
  },
};

const fetchFn = vi.fn<FetchFn>(async (url) => {
  if (url.startsWith('http://shop.test/category/')) {
    return new Response(
      '<div class="product-item"><h3 class="product-name">Mug</h3><span class="price">$4.00</span></div>',
    );
  }
  const key = Object.keys(routes).find((prefix) => url.startsWith(prefix));
  return key === undefined
    ? new Response('missing', { status: 404 })
    : new Response(JSON.stringify(routes[key]));
});

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    fetchFn,
    launcher: fakeLauncher({
      pages: {
        [PRODUCT]:
          '<div class="review-item"><span class="reviewer-name">Ana</span><span class="review-rating">4 out of 5</span></div>',
      },
    }).launcher,
    sleep: async () => {},
    clock: () => NOW,
    generator: { generate: async () => ({ customers: [{ id: 1, name: 'Ana' }] }) },
    ...overrides,
  };
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shopharvest-run-'));
  config = parseConfig({
    scraping: { delay_min_s: 0, delay_max_s: 0, seed: 7 },
    listings: { base_url: 'http://shop.test', categories: ['kitchen'], max_pages: 1 },
    reviews: { product_urls: [PRODUCT] },
    social: { endpoint: 'https://social.test/search.json', keywords: ['mugs'] },
    external: { catalog_base_url: 'http://catalog.test', cities: ['Oslo'], mock_weather_days: 2, economic_days: 3 },
    output: { dir: outDir },
  });
  fetchFn.mockClear();
});

afterEach(() => {
  db.close();
  fs.rmSync(outDir, { recursive: true, force: true });
});

describe('runPipeline', () => {
  it('writes and loads every dataset', async () => {
    const summary = await runPipeline(db, config, {}, deps());

    expect(summary.failures).toEqual([]);
    expect(summary.loads.map((l) => [l.table, l.rowCount])).toEqual([
      ['customers', 1],
      ['catalog_products', 1],
      ['catalog_users', 1],
      ['catalog_cart_items', 1],
      ['weather_data', 2],
      ['economic_data', 3],
      ['competitor_products', 1],
      ['product_reviews', 1],
      ['social_mentions', 1],
    ]);
    expect(db.prepare('SELECT name, price FROM competitor_products').all()).toEqual([{ name: 'Mug', price: 4 }]);
    expect(db.prepare('SELECT reviewer_name, rating FROM product_reviews').all()).toEqual([
      { reviewer_name: 'Ana', rating: 4 },
    ]);
    expect(fs.existsSync(path.join(outDir, 'raw', 'internal', 'customers.csv'))).toBe(true);
    expect(fs.existsSync(path.join(outDir, 'raw', 'external', 'catalog_data.json'))).toBe(true);
    expect(summary.runId).toMatch(/^[A-Za-z0-9_-]{12}$/);
    expect(JSON.parse(fs.readFileSync(summaryPath(summary), 'utf-8'))).toMatchObject({
      runId: summary.runId,
      startedAt: '2026-06-01T08:00:00.000Z',
      stages: ['internal', 'catalog', 'weather', 'economic', 'listings', 'reviews', 'social'],
    });
  });

  it('records a failing stage and carries on', async () => {
    const launcher = vi.fn<BrowserLauncher>(async () => {
      throw new Error('no browser');
    });
    const reporter = { report: vi.fn() };

    const summary = await runPipeline(db, config, { only: ['reviews', 'social'] }, deps({ launcher, reporter }));

    expect(summary.failures).toEqual([
      { stage: 'reviews', code: 'DRIVER_ERROR', error: 'Browser failed to launch: no browser' },
    ]);
    expect(summary.loads.map((l) => l.table)).toEqual(['social_mentions']);
    expect(reporter.report).toHaveBeenCalledWith(summary);
  });

  it('writes files without loading when load is off', async () => {
    const summary = await runPipeline(db, config, { only: ['weather'], load: false }, deps());

    expect(summary.loads).toEqual([]);
    expect(summary.datasets).toEqual([
      { stage: 'weather', name: 'weather_data', rows: 2, csvPath: path.join(outDir, 'raw', 'external', 'weather_data.csv') },
    ]);
    expect(db.prepare("SELECT name FROM sqlite_master WHERE name = 'weather_data'").get()).toBeUndefined();
  });

  it('skips crawls with nothing configured', async () => {
    const bare = parseConfig({ output: { dir: outDir } });
    const summary = await runPipeline(db, bare, { only: ['listings', 'reviews', 'internal'] }, { generator: undefined });
    expect(summary.datasets).toEqual([]);
    expect(summary.failures).toEqual([]);
  });

  it('stops on cancellation', async () => {
    await expect(runPipeline(db, config, { signal: AbortSignal.abort() }, deps())).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});

describe('isStageName', () => {
  it('accepts known stages only', () => {
    expect(isStageName('weather')).toBe(true);
    expect(isStageName('emails')).toBe(false);
  });
});
