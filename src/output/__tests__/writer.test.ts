import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { collectColumns, ensureOutputDirs, writeDataset, writeJson } from '../writer.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shopharvest-out-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('ensureOutputDirs', () => {
  it('creates the raw, processed and staging folders', () => {
    const dirs = ensureOutputDirs(dir);
    expect(dirs.internal).toBe(path.join(dir, 'raw', 'internal'));
    expect(dirs.external).toBe(path.join(dir, 'raw', 'external'));
    for (const sub of [dirs.internal, dirs.external, dirs.processed, dirs.staging]) {
      expect(fs.statSync(sub).isDirectory()).toBe(true);
    }
  });
});

describe('collectColumns', () => {
  it('puts hinted columns first, then the rest in first-seen order', () => {
    expect(collectColumns([{ b: 1, c: 2 }, { d: 3 }], ['a', 'b'])).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('writeDataset', () => {
  it('writes matching CSV and JSON files', () => {
    const rows = [
      { name: 'Kettle, steel', price: 12.5, tags: ['home'] },
      { name: 'Lamp', price: 20, in_stock: true },
    ];

    const written = writeDataset(rows, 'products', dir);

    expect(written).toEqual({
      csvPath: path.join(dir, 'products.csv'),
      jsonPath: path.join(dir, 'products.json'),
      rows: 2,
    });
    expect(fs.readFileSync(written.csvPath, 'utf-8')).toBe(
      'name,price,tags,in_stock\n"Kettle, steel",12.5,"[""home""]",\nLamp,20,,true\n',
    );
    expect(JSON.parse(fs.readFileSync(written.jsonPath, 'utf-8'))).toEqual(rows);
  });

  it('writes a header-only CSV for an empty dataset with a column hint', () => {
    const written = writeDataset([], 'reviews', dir, ['product_url', 'rating']);
    expect(written.rows).toBe(0);
    expect(fs.readFileSync(written.csvPath, 'utf-8')).toBe('product_url,rating\n');
    expect(fs.readFileSync(written.jsonPath, 'utf-8')).toBe('[]');
  });
});

describe('writeJson', () => {
  it('pretty-prints the value', () => {
    const file = writeJson({ a: 1 }, 'summary', path.join(dir, 'nested'));
    expect(file).toBe(path.join(dir, 'nested', 'summary.json'));
    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "a": 1\n}');
  });
});
