import path from 'node:path';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { CancelledError, HarvestError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  createSeededRandom,
  generateId,
  resolvePath,
  throwIfAborted,
  type RandomSource,
} from '../shared/utils.js';
import { createCrawlToolkit, runListingCrawl, runReviewCrawl, type CrawlDeps } from '../crawl/jobs.js';
import { withinCaptureWindow } from '../crawl/dedup.js';
import { LISTING_COLUMNS, MENTION_COLUMNS, REVIEW_COLUMNS } from '../crawl/types.js';
import { fetchCatalog } from '../external/catalog.js';
import { fetchWeather } from '../external/weather.js';
import { mockEconomicIndicators } from '../external/economic.js';
import { fetchSocialMentions } from '../external/social.js';
import { TabularLoader, type LoadResult } from '../load/tabularLoader.js';
import type { TabularRow } from '../load/normalize.js';
import { ensureOutputDirs, writeDataset, writeJson, type OutputDirs } from '../output/writer.js';

export const STAGES = ['internal', 'catalog', 'weather', 'economic', 'listings', 'reviews', 'social'] as const;
export type StageName = (typeof STAGES)[number];

export function isStageName(value: string): value is StageName {
  return (STAGES as readonly string[]).includes(value);
}

/**
 * Supplies baseline internal datasets (customers, products, transactions),
 * keyed by dataset name. Generation itself lives outside this package.
 */
export interface RecordGenerator {
  generate(): Promise<Record<string, TabularRow[]>>;
}

export interface Reporter {
  report(summary: PipelineSummary): void;
}

export interface PipelineDeps extends CrawlDeps {
  generator?: RecordGenerator;
  reporter?: Reporter;
}

export interface PipelineOptions {
  only?: readonly StageName[];
  load?: boolean;
  signal?: AbortSignal;
}

export interface DatasetOutput {
  stage: StageName;
  name: string;
  rows: number;
  csvPath: string;
}

export interface StageFailure {
  stage: StageName;
  code: string;
  error: string;
}

export interface PipelineSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  outputDir: string;
  stages: StageName[];
  datasets: DatasetOutput[];
  loads: LoadResult[];
  failures: StageFailure[];
}

interface Dataset {
  name: string;
  rows: TabularRow[];
  columns?: readonly string[];
  dir: 'internal' | 'external';
}

interface StageContext {
  config: Config;
  deps: PipelineDeps;
  signal?: AbortSignal;
  clock: () => Date;
  dirs: OutputDirs;
}

type StageRunner = (ctx: StageContext) => Promise<Dataset[]>;

const runInternal: StageRunner = async ({ deps }) => {
  if (!deps.generator) {
    logger.info('No record generator supplied, skipping internal datasets');
    return [];
  }
  const generated = await deps.generator.generate();
  return Object.entries(generated).map(([name, rows]) => ({ name, rows, dir: 'internal' as const }));
};

const runCatalog: StageRunner = async ({ config, deps, signal, dirs }) => {
  const { fetcher, delay } = createCrawlToolkit(config, deps);
  const catalog = await fetchCatalog(fetcher, delay, config.external.catalog_base_url, signal);
  writeJson(catalog.raw, 'catalog_data', dirs.external);
  return Object.entries(catalog.tables).map(([name, rows]) => ({ name, rows, dir: 'external' as const }));
};

function randomFor(config: Config, deps: PipelineDeps): RandomSource {
  const seed = config.scraping.seed;
  return deps.random ?? (seed !== undefined ? createSeededRandom(seed) : Math.random);
}

const runWeather: StageRunner = async ({ config, deps, signal, clock }) => {
  const { fetcher, delay } = createCrawlToolkit(config, deps);
  const rows = await fetchWeather(fetcher, delay, {
    baseUrl: config.external.weather_base_url,
    apiKey: config.external.weather_api_key,
    cities: config.external.cities,
    mockDays: config.external.mock_weather_days,
    random: randomFor(config, deps),
    clock,
    signal,
  });
  return [{ name: 'weather_data', rows, dir: 'external' }];
};

const runEconomic: StageRunner = async ({ config, deps, clock }) => {
  const rows = mockEconomicIndicators(config.external.economic_days, randomFor(config, deps), clock());
  return [{ name: 'economic_data', rows, dir: 'external' }];
};

const runListings: StageRunner = async ({ config, deps, signal, clock }) => {
  if (!config.listings.base_url) {
    logger.info('No listings base_url configured, skipping listing crawl');
    return [];
  }
  const result = await runListingCrawl(config, { signal }, { ...deps, clock });
  const rows = withinCaptureWindow(result.records, result.startedAt, clock());
  return [{ name: 'competitor_products', rows, columns: LISTING_COLUMNS, dir: 'external' }];
};

const runReviews: StageRunner = async ({ config, deps, signal, clock }) => {
  if (config.reviews.product_urls.length === 0) {
    logger.info('No product URLs configured, skipping review crawl');
    return [];
  }
  const result = await runReviewCrawl(config, { signal }, { ...deps, clock });
  const rows = withinCaptureWindow(result.records, result.startedAt, clock());
  return [{ name: 'product_reviews', rows, columns: REVIEW_COLUMNS, dir: 'external' }];
};

const runSocial: StageRunner = async ({ config, deps, signal, clock }) => {
  const startedAt = clock();
  const { fetcher, delay } = createCrawlToolkit(config, deps);
  const mentions = await fetchSocialMentions(fetcher, delay, {
    endpoint: config.social.endpoint,
    keywords: config.social.keywords,
    platforms: config.social.platforms,
    limit: config.social.limit,
    clock,
    signal,
  });
  const rows = withinCaptureWindow(mentions, startedAt, clock());
  return [{ name: 'social_mentions', rows, columns: MENTION_COLUMNS, dir: 'external' }];
};

const RUNNERS: Record<StageName, StageRunner> = {
  internal: runInternal,
  catalog: runCatalog,
  weather: runWeather,
  economic: runEconomic,
  listings: runListings,
  reviews: runReviews,
  social: runSocial,
};

/**
 * Run the selected stages in order. Each dataset is written to CSV/JSON and
 * loaded with full-replace semantics. A fatal error fails only its stage;
 * cancellation stops the run.
 */
export async function runPipeline(
  db: Database.Database,
  config: Config,
  options: PipelineOptions = {},
  deps: PipelineDeps = {},
): Promise<PipelineSummary> {
  const clock = deps.clock ?? (() => new Date());
  const startedAt = clock();
  const stages = STAGES.filter((s) => !options.only || options.only.includes(s));
  const shouldLoad = options.load ?? true;
  const dirs = ensureOutputDirs(resolvePath(config.output.dir));
  const loader = new TabularLoader(db);

  const summary: PipelineSummary = {
    runId: generateId(12),
    startedAt: startedAt.toISOString(),
    finishedAt: '',
    outputDir: dirs.root,
    stages: [...stages],
    datasets: [],
    loads: [],
    failures: [],
  };

  logger.info({ runId: summary.runId, stages, outputDir: dirs.root }, 'Pipeline started');

  for (const stage of stages) {
    throwIfAborted(options.signal, { stage });
    try {
      const datasets = await RUNNERS[stage]({ config, deps, signal: options.signal, clock, dirs });
      for (const dataset of datasets) {
        const dir = dataset.dir === 'internal' ? dirs.internal : dirs.external;
        const written = writeDataset(dataset.rows, dataset.name, dir, dataset.columns);
        summary.datasets.push({ stage, name: dataset.name, rows: written.rows, csvPath: written.csvPath });
        if (shouldLoad) {
          summary.loads.push(loader.load(dataset.rows, dataset.name, { columns: dataset.columns }));
        }
      }
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      const failure: StageFailure = {
        stage,
        code: err instanceof HarvestError ? err.code : 'UNEXPECTED',
        error: err instanceof Error ? err.message : String(err),
      };
      summary.failures.push(failure);
      logger.error({ ...failure, details: err instanceof HarvestError ? err.details : undefined }, 'Stage failed');
    }
  }

  summary.finishedAt = clock().toISOString();
  writeJson(summary, 'pipeline_summary', dirs.root);
  logger.info(
    { runId: summary.runId, loads: summary.loads.length, failures: summary.failures.length, outputDir: dirs.root },
    'Pipeline finished',
  );
  deps.reporter?.report(summary);
  return summary;
}

export function summaryPath(summary: PipelineSummary): string {
  return path.join(summary.outputDir, 'pipeline_summary.json');
}
