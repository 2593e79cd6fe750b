#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getHarvestDir, resolvePath } from '../shared/utils.js';
import { HarvestError } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { TabularLoader } from '../load/tabularLoader.js';
import { loadCsvDirectory } from '../load/csvDirectory.js';
import {
  runPipeline,
  isStageName,
  summaryPath,
  STAGES,
  type PipelineOptions,
  type PipelineSummary,
  type Reporter,
  type StageName,
} from '../pipeline/run.js';

const program = new Command();

program
  .name('shopharvest')
  .description('Crawl competitor listings, reviews and market APIs into a relational store')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the default config and database')
  .action(async () => {
    const configPath = path.join(getHarvestDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(config.db.path);
    const { applied } = runMigrations(db);
    log(
      applied.length > 0
        ? `✓ ${config.db.path} created (${applied.length} migrations applied)`
        : `✓ ${config.db.path} already up to date`,
    );
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and crawl targets')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const dbPath = resolvePath(config.db.path);
        if (config.db.path !== ':memory:' && !fs.existsSync(dbPath)) {
          results.push('DB: missing (run shopharvest init)');
        } else {
          const db = initDb(config.db.path);
          runMigrations(db);
          const tables = new TabularLoader(db).listTables();
          results.push(`DB: ok (${tables.length} tables)`);
          closeDb();
        }
      } catch (err) {
        results.push(`DB: error (${err instanceof Error ? err.message : String(err)})`);
      }

      results.push(config.listings.base_url ? `Listings: ${config.listings.base_url}` : 'Listings: (no base_url)');
      results.push(`Reviews: ${config.reviews.product_urls.length} product URLs`);
      results.push(config.external.weather_api_key ? 'Weather: live' : 'Weather: mock (no API key)');
    } catch (err) {
      results.push(`Config: error (${err instanceof Error ? err.message : String(err)})`);
    }

    log(results.join(' | '));
  });

// === crawl ===
const crawlCmd = program.command('crawl').description('Scrape competitor pages');

crawlCmd
  .command('listings')
  .description('Crawl category listing pages (static HTML)')
  .option('-u, --base-url <url>', 'Site base URL')
  .option('-c, --category <name...>', 'Categories to crawl')
  .option('-p, --pages <n>', 'Max pages per category', parsePositiveInt)
  .option('--no-load', 'Write files only, skip the database load')
  .action(async (opts: { baseUrl?: string; category?: string[]; pages?: number; load: boolean }) => {
    await runStages(['listings'], { load: opts.load }, (config) => ({
      ...config,
      listings: {
        ...config.listings,
        base_url: opts.baseUrl ?? config.listings.base_url,
        categories: opts.category ?? config.listings.categories,
        max_pages: opts.pages ?? config.listings.max_pages,
      },
    }));
  });

crawlCmd
  .command('reviews [urls...]')
  .description('Crawl product review pages in a headless browser')
  .option('--headed', 'Show the browser window')
  .option('--no-load', 'Write files only, skip the database load')
  .action(async (urls: string[], opts: { headed?: boolean; load: boolean }) => {
    await runStages(['reviews'], { load: opts.load }, (config) => ({
      ...config,
      scraping: { ...config.scraping, headless: opts.headed ? false : config.scraping.headless },
      reviews: {
        ...config.reviews,
        product_urls: urls.length > 0 ? urls : config.reviews.product_urls,
      },
    }));
  });

// === social ===
program
  .command('social [keywords...]')
  .description('Search social platforms for keyword mentions')
  .option('--no-load', 'Write files only, skip the database load')
  .action(async (keywords: string[], opts: { load: boolean }) => {
    await runStages(['social'], { load: opts.load }, (config) => ({
      ...config,
      social: { ...config.social, keywords: keywords.length > 0 ? keywords : config.social.keywords },
    }));
  });

// === external ===
program
  .command('external')
  .description('Fetch the sample catalog and weather APIs, and generate economic indicators')
  .option('--no-load', 'Write files only, skip the database load')
  .action(async (opts: { load: boolean }) => {
    await runStages(['catalog', 'weather', 'economic'], { load: opts.load });
  });

// === run ===
program
  .command('run')
  .description('Run every stage: internal, catalog, weather, economic, listings, reviews, social')
  .option('-o, --only <stages>', `Comma-separated subset of: ${STAGES.join(', ')}`, parseStages)
  .option('--no-load', 'Write files only, skip the database load')
  .action(async (opts: { only?: StageName[]; load: boolean }) => {
    await runStages(opts.only ?? [...STAGES], { load: opts.load });
  });

// === load ===
program
  .command('load [dir]')
  .description('Load every CSV file below a directory (default: the output dir)')
  .action(async (dir: string | undefined) => {
    const { db, config, cleanup } = await getDb();
    try {
      const target = resolvePath(dir ?? config.output.dir);
      const result = loadCsvDirectory(new TabularLoader(db), target);
      for (const loaded of result.loaded) {
        log(`  • ${loaded.table}: ${loaded.rowCount.toLocaleString()} rows`);
      }
      for (const failed of result.failed) {
        log(`  ✗ ${failed.file}: ${failed.error}`);
      }
      log(`✓ Loaded ${result.loaded.length}/${result.files} files`);
      if (result.failed.length > 0) process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === tables ===
program
  .command('tables')
  .description('List loaded tables with row counts')
  .action(async () => {
    const { db, cleanup } = await getDb();
    try {
      const tables = new TabularLoader(db).listTables();
      if (tables.length === 0) {
        log('No tables found in database');
        return;
      }
      log(`Database contains ${tables.length} tables:`);
      for (const t of tables) {
        log(`  • ${t.name.padEnd(24)} ${t.rowCount.toLocaleString().padStart(8)} rows   ${t.lastLoadedAt ?? ''}`);
      }
    } finally {
      cleanup();
    }
  });

// === Helpers ===

const consoleReporter: Reporter = {
  report(summary: PipelineSummary) {
    for (const load of summary.loads) {
      log(`  • ${load.table}: ${load.rowCount.toLocaleString()} rows, ${load.columns.length} columns`);
    }
    for (const failure of summary.failures) {
      log(`  ✗ ${failure.stage} [${failure.code}]: ${failure.error}`);
    }
    log(`✓ Run ${summary.runId}: summary written to ${summaryPath(summary)}`);
  },
};

async function runStages(
  stages: StageName[],
  options: Omit<PipelineOptions, 'only' | 'signal'>,
  configure: (config: Config) => Config = (c) => c,
): Promise<void> {
  const { db, config, cleanup } = await getDb();
  const controller = new AbortController();
  const onSigint = (): void => {
    log('Interrupted, stopping after the current request...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const summary = await runPipeline(
      db,
      configure(config),
      { ...options, only: stages, signal: controller.signal },
      { reporter: consoleReporter },
    );
    if (summary.failures.length > 0) process.exitCode = 1;
  } catch (err) {
    const code = err instanceof HarvestError ? err.code : 'UNEXPECTED';
    log(`✗ [${code}] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
    cleanup();
  }
}

async function getDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const db = initDb(config.db.path);
  runMigrations(db);
  return { db, config, cleanup: closeDb };
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

function parseStages(value: string): StageName[] {
  const stages = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  const unknown = stages.filter((s) => !isStageName(s));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(`Unknown stage(s): ${unknown.join(', ')}`);
  }
  return stages.filter(isStageName);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
