import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

type MigrationRow = { name: string; checksum: string | null };

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function checksumOf(sql: string): string {
  return createHash('sha256').update(sql.replace(/\r\n/g, '\n')).digest('hex');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function readAppliedRows(db: Database.Database): Map<string, string | null> {
  ensureMigrationsTable(db);
  const rows = db.prepare('SELECT name, checksum FROM _migrations').all() as MigrationRow[];
  return new Map(rows.map((r) => [r.name, r.checksum]));
}

export function listAppliedMigrations(db: Database.Database): Set<string> {
  return new Set(readAppliedRows(db).keys());
}

/** Every `*.sql` file in `dir`, name-ordered, with its contents and checksum. */
export function loadMigrationFiles(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, sql, checksum: checksumOf(sql) };
    });
}

/**
 * Bring the database up to date with the `*.sql` files in `migrationsDir`.
 *
 * Files already recorded are checked against the stored checksum and never
 * re-run; an edited file aborts the run before anything pending is applied.
 * Each pending file runs in its own transaction together with its bookkeeping row.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = getMigrationsDir(),
): MigrationReport {
  const recorded = readAppliedRows(db);
  const files = loadMigrationFiles(migrationsDir);

  const report: MigrationReport = { applied: [], skipped: [] };
  const pending: MigrationFile[] = [];

  for (const file of files) {
    if (!recorded.has(file.name)) {
      pending.push(file);
      continue;
    }
    const stored = recorded.get(file.name);
    if (stored === null || stored === undefined) {
      // Recorded before checksums were kept; adopt the current contents.
      db.prepare('UPDATE _migrations SET checksum = ? WHERE name = ?').run(file.checksum, file.name);
    } else if (stored !== file.checksum) {
      throw new DbError(`Migration changed after it was applied: ${file.name}`, {
        migration: file.name,
        expected: stored,
        actual: file.checksum,
      });
    }
    report.skipped.push(file.name);
  }

  const record = db.prepare('INSERT INTO _migrations (name, checksum) VALUES (?, ?)');
  for (const file of pending) {
    const apply = db.transaction(() => {
      db.exec(file.sql);
      record.run(file.name, file.checksum);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${file.name}`, {
        migration: file.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    report.applied.push(file.name);
    logger.info({ migration: file.name }, 'Migration applied');
  }

  return report;
}
