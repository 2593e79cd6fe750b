import type Database from 'better-sqlite3';
import { LoadError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  coerceDateColumn,
  inferColumnType,
  isDateLikeColumn,
  isEmptyRow,
  normalizeIdentifier,
  quoteIdentifier,
  toSqlValue,
  type ColumnSchema,
  type TabularRow,
} from './normalize.js';

export interface LoadResult {
  table: string;
  rowCount: number;
  columns: ColumnSchema[];
}

export interface LoadOptions {
  /** Schema for an empty dataset, and the column order for a non-empty one. */
  columns?: readonly string[];
}

export interface TableInfo {
  name: string;
  rowCount: number;
  lastLoadedAt: string | null;
}

interface PreparedTable {
  columns: ColumnSchema[];
  rows: unknown[][];
}

const RESERVED_PREFIXES = ['_', 'sqlite_'];

/**
 * Full-replace writer for one dataset per table. The drop, create, insert and
 * verification steps share one transaction, so a failed load leaves the
 * previous table in place.
 */
export class TabularLoader {
  constructor(private readonly db: Database.Database) {}

  load(records: readonly TabularRow[], tableName: string, options: LoadOptions = {}): LoadResult {
    const table = normalizeIdentifier(tableName);
    if (!table || RESERVED_PREFIXES.some((p) => table.startsWith(p))) {
      throw new LoadError(`Invalid table name: "${tableName}"`, { table: tableName });
    }

    const prepared = this.prepare(records, table, options.columns ?? []);
    const tableSql = quoteIdentifier(table);

    const write = this.db.transaction((): LoadResult => {
      this.db.exec(`DROP TABLE IF EXISTS ${tableSql}`);

      if (prepared.columns.length === 0) {
        return { table, rowCount: 0, columns: [] };
      }

      const columnDefs = prepared.columns.map((c) => `${quoteIdentifier(c.name)} ${c.type}`).join(', ');
      this.db.exec(`CREATE TABLE ${tableSql} (${columnDefs})`);

      const placeholders = prepared.columns.map(() => '?').join(', ');
      const insert = this.db.prepare(`INSERT INTO ${tableSql} VALUES (${placeholders})`);
      for (const row of prepared.rows) {
        insert.run(...row.map(toSqlValue));
      }

      const { count } = this.db.prepare(`SELECT COUNT(*) AS count FROM ${tableSql}`).get() as { count: number };
      if (count !== prepared.rows.length) {
        throw new LoadError(`Row count mismatch for ${table}: wrote ${prepared.rows.length}, found ${count}`, {
          table,
          expected: prepared.rows.length,
          actual: count,
        });
      }

      this.db
        .prepare('INSERT INTO _load_log (table_name, row_count, columns) VALUES (?, ?, ?)')
        .run(table, count, JSON.stringify(prepared.columns));

      return { table, rowCount: count, columns: prepared.columns };
    });

    let result: LoadResult;
    try {
      result = write();
    } catch (err) {
      if (err instanceof LoadError) throw err;
      throw new LoadError(`Failed to load ${table}: ${err instanceof Error ? err.message : String(err)}`, {
        table,
        rows: prepared.rows.length,
      });
    }

    logger.info({ table, rows: result.rowCount, columns: result.columns.length }, 'Table loaded');
    return result;
  }

  listTables(): TableInfo[] {
    const names = this.db
      .prepare(
        `SELECT name FROM sqlite_master
         WHERE type = 'table' AND name NOT LIKE '\\_%' ESCAPE '\\' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
         ORDER BY name`,
      )
      .all() as Array<{ name: string }>;
    const lastLoad = this.db.prepare('SELECT MAX(loaded_at) AS loaded_at FROM _load_log WHERE table_name = ?');

    return names.map(({ name }) => {
      const { count } = this.db
        .prepare(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(name)}`)
        .get() as { count: number };
      const log = lastLoad.get(name) as { loaded_at: string | null } | undefined;
      return { name, rowCount: count, lastLoadedAt: log?.loaded_at ?? null };
    });
  }

  private prepare(records: readonly TabularRow[], table: string, hint: readonly string[]): PreparedTable {
    // Normalized name -> first original spelling, in first-seen order.
    const origin = new Map<string, string>();
    const addColumn = (raw: string): void => {
      const name = normalizeIdentifier(raw);
      if (!name) {
        throw new LoadError(`Empty column name in ${table}`, { table, column: raw });
      }
      const existing = origin.get(name);
      if (existing !== undefined && existing !== raw) {
        throw new LoadError(`Columns "${existing}" and "${raw}" both normalize to "${name}"`, {
          table,
          column: name,
        });
      }
      origin.set(name, raw);
    };

    for (const raw of hint) addColumn(raw);
    for (const record of records) {
      for (const raw of Object.keys(record)) {
        const name = normalizeIdentifier(raw);
        if (origin.get(name) === raw) continue;
        addColumn(raw);
      }
    }

    const names = [...origin.keys()];
    const nonEmpty = records.filter((r) => !isEmptyRow(r));
    const dropped = records.length - nonEmpty.length;
    if (dropped > 0) {
      logger.debug({ table, dropped }, 'Dropped empty rows');
    }

    const byColumn: unknown[][] = names.map(() => []);
    for (const record of nonEmpty) {
      const normalized = new Map<string, unknown>();
      for (const [raw, value] of Object.entries(record)) {
        normalized.set(normalizeIdentifier(raw), value);
      }
      names.forEach((name, i) => byColumn[i]?.push(normalized.get(name) ?? null));
    }

    const columns: ColumnSchema[] = names.map((name, i) => {
      const values = byColumn[i] ?? [];
      if (isDateLikeColumn(name)) {
        const coerced = coerceDateColumn(values);
        if (coerced.coerced) {
          byColumn[i] = coerced.values;
          return { name, type: 'DATETIME' };
        }
        if (values.some((v) => v !== null && v !== undefined)) {
          logger.debug({ table, column: name }, 'Date coercion failed, keeping original values');
        }
      }
      return { name, type: inferColumnType(values) };
    });

    const rows = nonEmpty.map((_, r) => names.map((_n, c) => byColumn[c]?.[r] ?? null));
    return { columns, rows };
  }
}
