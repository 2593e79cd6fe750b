import fs from 'node:fs';
import path from 'node:path';
import { stringify as csvStringify } from 'csv-stringify/sync';
import { logger } from '../shared/logger.js';
import type { TabularRow } from '../load/normalize.js';

export const OUTPUT_SUBDIRS = ['raw/internal', 'raw/external', 'processed', 'staging'] as const;

export interface OutputDirs {
  root: string;
  internal: string;
  external: string;
  processed: string;
  staging: string;
}

export function ensureOutputDirs(root: string): OutputDirs {
  for (const sub of OUTPUT_SUBDIRS) {
    fs.mkdirSync(path.join(root, sub), { recursive: true });
  }
  return {
    root,
    internal: path.join(root, 'raw', 'internal'),
    external: path.join(root, 'raw', 'external'),
    processed: path.join(root, 'processed'),
    staging: path.join(root, 'staging'),
  };
}

export function collectColumns(rows: readonly TabularRow[], hint: readonly string[] = []): string[] {
  const columns = new Set<string>(hint);
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

function csvCell(value: unknown): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

export interface WrittenDataset {
  csvPath: string;
  jsonPath: string;
  rows: number;
}

/**
 * Write `{name}.csv` and `{name}.json` side by side.
 */
export function writeDataset(
  rows: readonly TabularRow[],
  name: string,
  dir: string,
  columnsHint: readonly string[] = [],
): WrittenDataset {
  fs.mkdirSync(dir, { recursive: true });
  const csvPath = path.join(dir, `${name}.csv`);
  const jsonPath = path.join(dir, `${name}.json`);

  const columns = collectColumns(rows, columnsHint);
  const csv = csvStringify(
    rows.map((row) => Object.fromEntries(columns.map((c) => [c, csvCell(row[c])]))),
    { header: columns.length > 0, columns },
  );
  fs.writeFileSync(csvPath, csv, 'utf-8');
  fs.writeFileSync(jsonPath, JSON.stringify(rows, null, 2), 'utf-8');

  logger.info({ csvPath, jsonPath, rows: rows.length }, 'Dataset written');
  return { csvPath, jsonPath, rows: rows.length };
}

export function writeJson(value: unknown, name: string, dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, `${name}.json`);
  fs.writeFileSync(file, JSON.stringify(value, null, 2), 'utf-8');
  return file;
}
