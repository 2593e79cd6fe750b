import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  parseConfig,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.scraping.headless).toBe(true);
      expect(result.data.scraping.delay_min_s).toBe(1);
      expect(result.data.scraping.delay_max_s).toBe(3);
      expect(result.data.scraping.max_retries).toBe(3);
      expect(result.data.listings.categories).toEqual(['electronics', 'clothing', 'books']);
      expect(result.data.listings.selectors.item).toBe('div.product-item');
      expect(result.data.reviews.marker).toBe('.review-item');
      expect(result.data.db.path).toBe('~/.shopharvest/shopharvest.db');
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      scraping: { headless: false, seed: 42 },
      listings: { base_url: 'https://shop.test', max_pages: 5 },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.scraping.headless).toBe(false);
      expect(result.data.scraping.seed).toBe(42);
      expect(result.data.listings.max_pages).toBe(5);
      // defaults still apply for other fields
      expect(result.data.listings.source_tag).toBe('competitor_site');
      expect(result.data.scraping.timeout_ms).toBe(30000);
    }
  });

  it('rejects invalid types', () => {
    const result = ConfigSchema.safeParse({ listings: { max_pages: 'three' } });
    expect(result.success).toBe(false);
  });

  it('rejects an inverted delay range', () => {
    const result = ConfigSchema.safeParse({ scraping: { delay_min_s: 5, delay_max_s: 2 } });
    expect(result.success).toBe(false);
  });
});

describe('parseConfig', () => {
  it('throws ConfigError with field errors', () => {
    let caught: unknown;
    try {
      parseConfig({ scraping: { max_retries: 0 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.details?.['errors']).toHaveProperty('scraping');
    }
  });
});

describe('applyEnvOverrides', () => {
  it('injects the weather key and paths from the environment', () => {
    const raw = applyEnvOverrides(
      { external: { cities: ['Oslo'] } },
      {
        SHOPHARVEST_WEATHER_API_KEY: 'test-key',
        SHOPHARVEST_DB_PATH: ':memory:',
        SHOPHARVEST_OUTPUT_DIR: '/tmp/out',
      },
    );
    const config = parseConfig(raw);
    expect(config.external.weather_api_key).toBe('test-key');
    expect(config.external.cities).toEqual(['Oslo']);
    expect(config.db.path).toBe(':memory:');
    expect(config.output.dir).toBe('/tmp/out');
  });

  it('leaves the config untouched without overrides', () => {
    const raw = { db: { path: 'a.db' } };
    expect(applyEnvOverrides(raw, {})).toEqual(raw);
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string with every section', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('scraping:');
    expect(yaml).toContain('listings:');
    expect(yaml).toContain('product_urls: []');
  });

  it('round-trips through the schema', () => {
    const config = generateDefaultConfig();
    expect(ConfigSchema.parse(config)).toEqual(config);
  });
});
