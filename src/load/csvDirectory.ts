import fs from 'node:fs';
import path from 'node:path';
import { parse as csvParse } from 'csv-parse/sync';
import { logger } from '../shared/logger.js';
import type { TabularLoader, LoadResult } from './tabularLoader.js';
import type { TabularRow } from './normalize.js';

export interface CsvDirectoryResult {
  files: number;
  loaded: LoadResult[];
  failed: Array<{ file: string; error: string }>;
}

export function findCsvFiles(dir: string): string[] {
  const found: string[] = [];
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.csv')) {
        found.push(full);
      }
    }
  };
  walk(dir);
  return found.sort();
}

export function readCsvFile(file: string): TabularRow[] {
  const text = fs.readFileSync(file, 'utf-8');
  return csvParse(text, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    cast: true,
    trim: true,
  }) as TabularRow[];
}

/**
 * Load every CSV below `dir` into a table named after the file. A file that
 * fails to parse or load is reported and the rest continue.
 */
export function loadCsvDirectory(loader: TabularLoader, dir: string): CsvDirectoryResult {
  if (!fs.existsSync(dir)) {
    logger.error({ dir }, 'Data directory not found');
    return { files: 0, loaded: [], failed: [] };
  }

  const files = findCsvFiles(dir);
  if (files.length === 0) {
    logger.warn({ dir }, 'No CSV files found');
  }

  const result: CsvDirectoryResult = { files: files.length, loaded: [], failed: [] };
  for (const file of files) {
    const table = path.basename(file, path.extname(file));
    try {
      const rows = readCsvFile(file);
      result.loaded.push(loader.load(rows, table));
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      result.failed.push({ file, error });
      logger.error({ file, table, error }, 'CSV load failed');
    }
  }

  logger.info({ dir, loaded: result.loaded.length, files: files.length }, 'CSV directory load complete');
  return result;
}
