import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getHarvestDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

export const ScrapingSchema = z
  .object({
    headless: z.boolean().default(true),
    delay_min_s: z.number().nonnegative().default(1),
    delay_max_s: z.number().nonnegative().default(3),
    max_retries: z.number().int().min(1).default(3),
    backoff_multiplier: z.number().min(1).default(2),
    max_backoff_s: z.number().nonnegative().default(30),
    timeout_ms: z.number().int().positive().default(30000),
    user_agents: z.array(z.string()).min(1).default(DEFAULT_USER_AGENTS),
    seed: z.number().int().optional(),
    browser_executable: z.string().optional(),
  })
  .refine((s) => s.delay_min_s <= s.delay_max_s, {
    message: 'delay_min_s must not exceed delay_max_s',
    path: ['delay_min_s'],
  });

export const ConfigSchema = z.object({
  scraping: ScrapingSchema.default({}),

  listings: z
    .object({
      base_url: z.string().default(''),
      categories: z.array(z.string()).default(['electronics', 'clothing', 'books']),
      max_pages: z.number().int().min(1).default(3),
      source_tag: z.string().default('competitor_site'),
      selectors: z
        .object({
          item: z.string().default('div.product-item'),
          name: z.string().default('h3.product-name'),
          price: z.string().default('span.price'),
          rating: z.string().default('div.rating'),
          image: z.string().default('img'),
          star: z.string().default('span.star-filled'),
        })
        .default({}),
    })
    .default({}),

  reviews: z
    .object({
      product_urls: z.array(z.string()).default([]),
      max_reviews: z.number().int().positive().default(50),
      marker: z.string().default('.review-item'),
      wait_timeout_ms: z.number().int().positive().default(10000),
      selectors: z
        .object({
          item: z.string().default('.review-item'),
          reviewer: z.string().default('.reviewer-name'),
          rating: z.string().default('.review-rating'),
          text: z.string().default('.review-text'),
          date: z.string().default('.review-date'),
          star: z.string().default('.star-filled'),
        })
        .default({}),
    })
    .default({}),

  social: z
    .object({
      endpoint: z.string().default('https://www.reddit.com/search.json'),
      keywords: z
        .array(z.string())
        .default([
          'ecommerce',
          'online shopping',
          'retail trends',
          'customer experience',
          'digital commerce',
        ]),
      platforms: z.array(z.string()).default(['reddit']),
      limit: z.number().int().positive().default(25),
    })
    .default({}),

  external: z
    .object({
      catalog_base_url: z.string().default('https://fakestoreapi.com'),
      weather_base_url: z.string().default('http://api.openweathermap.org/data/2.5/weather'),
      weather_api_key: z.string().default(''),
      cities: z
        .array(z.string())
        .default(['New York', 'Los Angeles', 'Chicago', 'Houston', 'Phoenix']),
      mock_weather_days: z.number().int().positive().default(30),
      economic_days: z.number().int().positive().default(365),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('./data'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.shopharvest/shopharvest.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...(value as Record<string, unknown>) }
    : {};
}

/**
 * Apply SHOPHARVEST_* environment overrides on top of the raw file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const weatherKey = env['SHOPHARVEST_WEATHER_API_KEY'];
  if (weatherKey) {
    result['external'] = { ...asRecord(result['external']), weather_api_key: weatherKey };
  }

  const dbPath = env['SHOPHARVEST_DB_PATH'];
  if (dbPath) {
    result['db'] = { ...asRecord(result['db']), path: dbPath };
  }

  const outputDir = env['SHOPHARVEST_OUTPUT_DIR'];
  if (outputDir) {
    result['output'] = { ...asRecord(result['output']), dir: outputDir };
  }

  return result;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('shopharvest', {
    searchPlaces: [
      'shopharvest.config.yaml',
      'shopharvest.config.yml',
      '.shopharvestrc.yaml',
      '.shopharvestrc.yml',
    ],
  });

  const envConfigPath = process.env['SHOPHARVEST_CONFIG'];
  const defaultConfigPath = path.join(getHarvestDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const local = await explorer.search();
    if (local) {
      rawConfig = asRecord(local.config);
      logger.debug({ path: local.filepath }, 'Using project config');
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = asRecord(result?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

