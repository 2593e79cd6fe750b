import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { TabularLoader } from '../tabularLoader.js';
import { LoadError } from '../../shared/errors.js';

let db: Database.Database;
let loader: TabularLoader;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  loader = new TabularLoader(db);
});

afterEach(() => {
  db.close();
});

function rows(table: string): unknown[] {
  return db.prepare(`SELECT * FROM "${table}" ORDER BY rowid`).all();
}

function columnTypes(table: string): Record<string, string> {
  const info = db.prepare(`PRAGMA table_info("${table}")`).all() as Array<{ name: string; type: string }>;
  return Object.fromEntries(info.map((c) => [c.name, c.type]));
}

describe('TabularLoader.load', () => {
  it('creates a table with normalized columns and inferred types', () => {
    const result = loader.load(
      [
        { 'Product Name': 'Kettle', Price: 12.5, Stock: 3, 'Review Date': '2026-01-01' },
        { 'Product Name': 'Lamp', Price: 20, Stock: 0, 'Review Date': '2026-02-01' },
      ],
      'Competitor Products',
    );

    expect(result.table).toBe('competitor_products');
    expect(result.rowCount).toBe(2);
    expect(columnTypes('competitor_products')).toEqual({
      product_name: 'TEXT',
      price: 'REAL',
      stock: 'INTEGER',
      review_date: 'DATETIME',
    });
    expect(rows('competitor_products')).toEqual([
      { product_name: 'Kettle', price: 12.5, stock: 3, review_date: '2026-01-01T00:00:00.000Z' },
      { product_name: 'Lamp', price: 20, stock: 0, review_date: '2026-02-01T00:00:00.000Z' },
    ]);
  });

  it('fully replaces the previous contents', () => {
    loader.load([{ a: 1 }, { a: 2 }, { a: 3 }], 'items');
    loader.load([{ b: 'x' }], 'items');

    expect(columnTypes('items')).toEqual({ b: 'TEXT' });
    expect(rows('items')).toEqual([{ b: 'x' }]);
  });

  it('keeps the original text when a date column does not parse', () => {
    loader.load([{ review_date: '2026-01-01' }, { review_date: 'last week' }], 'reviews');
    expect(columnTypes('reviews')).toEqual({ review_date: 'TEXT' });
    expect(rows('reviews')).toEqual([{ review_date: '2026-01-01' }, { review_date: 'last week' }]);
  });

  it('drops rows where every value is empty', () => {
    const result = loader.load([{ a: 1, b: 'x' }, { a: null, b: '' }, { a: 2, b: 'y' }], 'partial');
    expect(result.rowCount).toBe(2);
  });

  it('fills columns missing from some records with null', () => {
    loader.load([{ a: 1 }, { b: 'x' }], 'sparse');
    expect(rows('sparse')).toEqual([
      { a: 1, b: null },
      { a: null, b: 'x' },
    ]);
  });

  it('rolls back and keeps the previous table when an insert fails', () => {
    loader.load([{ id: 1 }, { id: 2 }], 'ledger');

    expect(() => loader.load([{ id: 3 }, { id: 2n ** 70n }], 'ledger')).toThrow(LoadError);
    expect(rows('ledger')).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('rejects columns that collide after normalization', () => {
    expect(() => loader.load([{ 'Unit Price': 1, unit_price: 2 }], 'prices')).toThrow(
      'Columns "Unit Price" and "unit_price" both normalize to "unit_price"',
    );
  });

  it('rejects reserved table names', () => {
    expect(() => loader.load([{ a: 1 }], '_load_log')).toThrow(LoadError);
    expect(() => loader.load([{ a: 1 }], 'sqlite_master')).toThrow(LoadError);
    expect(() => loader.load([{ a: 1 }], '   ')).toThrow(LoadError);
  });

  it('creates an empty table from a column hint', () => {
    const result = loader.load([], 'product_reviews', { columns: ['product_url', 'rating'] });
    expect(result.rowCount).toBe(0);
    expect(Object.keys(columnTypes('product_reviews'))).toEqual(['product_url', 'rating']);
  });

  it('drops the table for an empty dataset without columns', () => {
    loader.load([{ a: 1 }], 'gone');
    const result = loader.load([], 'gone');
    expect(result).toEqual({ table: 'gone', rowCount: 0, columns: [] });
    expect(db.prepare("SELECT name FROM sqlite_master WHERE name = 'gone'").get()).toBeUndefined();
  });

  it('stores objects as JSON text and booleans as integers', () => {
    loader.load([{ meta: { tags: ['a'] }, active: true }], 'mixed');
    expect(rows('mixed')).toEqual([{ meta: '{"tags":["a"]}', active: 1 }]);
  });

  it('records each load in the load log', () => {
    loader.load([{ a: 1 }, { a: 2 }], 'logged');
    const log = db.prepare('SELECT table_name, row_count, columns FROM _load_log').all();
    expect(log).toEqual([
      { table_name: 'logged', row_count: 2, columns: JSON.stringify([{ name: 'a', type: 'INTEGER' }]) },
    ]);
  });
});

describe('TabularLoader.listTables', () => {
  it('lists user tables with counts and hides internal ones', () => {
    loader.load([{ a: 1 }, { a: 2 }], 'beta');
    loader.load([{ a: 1 }], 'alpha');

    const tables = loader.listTables();

    expect(tables.map((t) => [t.name, t.rowCount])).toEqual([
      ['alpha', 1],
      ['beta', 2],
    ]);
    expect(tables[0]?.lastLoadedAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });
});
