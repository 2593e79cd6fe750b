export type TabularRow = Record<string, unknown>;

export type ColumnType = 'INTEGER' | 'REAL' | 'TEXT' | 'DATETIME';

export interface ColumnSchema {
  name: string;
  type: ColumnType;
}

export type SqlValue = string | number | bigint | null;

/**
 * Lowercase, trim, and collapse runs of spaces and hyphens to a single underscore.
 */
export function normalizeIdentifier(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const DATE_TOKENS = ['date', 'time', 'timestamp'];

export function isDateLikeColumn(name: string): boolean {
  const lower = name.toLowerCase();
  return DATE_TOKENS.some((t) => lower.includes(t)) || lower.endsWith('_at');
}

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

export function isEmptyRow(row: TabularRow): boolean {
  return Object.values(row).every(isEmptyValue);
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const NAMED_MONTH = /^(?:[A-Za-z]{3,9}\.? \d{1,2},? \d{4}|\d{1,2} [A-Za-z]{3,9}\.? \d{4})(?: \d{1,2}:\d{2}(?::\d{2})?)?$/;
const SLASHED = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

/**
 * Parse a date-like value to an ISO-8601 string, or null when it does not
 * look like a date.
 */
export function parseDateValue(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== 'string') return null;
  const text = value.trim();
  let ms = Number.NaN;
  if (ISO_DATE.test(text)) {
    ms = Date.parse(text.replace(' ', 'T'));
  } else if (NAMED_MONTH.test(text) || SLASHED.test(text)) {
    ms = Date.parse(text);
  }
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/**
 * Convert every non-empty value of a date-like column. If any value fails,
 * the column is left untouched.
 */
export function coerceDateColumn(values: unknown[]): { values: unknown[]; coerced: boolean } {
  const converted: unknown[] = [];
  let sawValue = false;
  for (const value of values) {
    if (isEmptyValue(value)) {
      converted.push(null);
      continue;
    }
    const iso = parseDateValue(value);
    if (iso === null) return { values, coerced: false };
    sawValue = true;
    converted.push(iso);
  }
  return sawValue ? { values: converted, coerced: true } : { values, coerced: false };
}

export function inferColumnType(values: unknown[]): Exclude<ColumnType, 'DATETIME'> {
  let type: Exclude<ColumnType, 'DATETIME'> | null = null;
  for (const value of values) {
    if (isEmptyValue(value)) continue;
    let next: Exclude<ColumnType, 'DATETIME'>;
    if (typeof value === 'boolean' || typeof value === 'bigint') {
      next = 'INTEGER';
    } else if (typeof value === 'number') {
      next = Number.isInteger(value) ? 'INTEGER' : 'REAL';
    } else {
      return 'TEXT';
    }
    if (type === null || type === next) {
      type = next;
    } else {
      type = 'REAL';
    }
  }
  return type ?? 'TEXT';
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'bigint') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return JSON.stringify(value);
}
