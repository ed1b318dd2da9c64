/**
 * Record normalization.
 *
 * Turns raw API rows into typed records. A malformed cell degrades to
 * `null`; normalization never fails for a single row.
 */

import { isValid, parse } from 'date-fns';
import type { Cell, Dataset, DisclosureRecord, RawRow, RawValue } from '../core/types.js';

/** Fields the feed sends as "15-Jan-2024 10:30" */
export const DATE_FIELDS: readonly string[] = ['date', 'acqfromDt', 'acqtoDt', 'intimDt'];

export const NUMERIC_FIELDS: readonly string[] = [
  'buyValue',
  'sellValue',
  'buyQuantity',
  'sellquantity',
  'secAcq',
  'befAcqSharesNo',
  'befAcqSharesPer',
  'secVal',
  'afterAcqSharesNo',
  'afterAcqSharesPer',
];

export const FEED_DATE_FORMAT = 'dd-MMM-yyyy HH:mm';

/** Raw values that mean "not reported" */
const MISSING_TOKENS: ReadonlySet<string> = new Set(['-', '']);

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const dateFields = new Set(DATE_FIELDS);
const numericFields = new Set(NUMERIC_FIELDS);

export function isMissing(value: RawValue): boolean {
  return value === null || value === undefined || (typeof value === 'string' && MISSING_TOKENS.has(value));
}

/** Parse a date in one of `formats`; null if none matches */
export function parseDateCell(value: RawValue, formats: readonly string[] = [FEED_DATE_FORMAT]): Date | null {
  if (typeof value !== 'string' || isMissing(value)) return null;
  const text = value.trim();
  for (const fmt of formats) {
    const parsed = parse(text, fmt, new Date(0));
    if (isValid(parsed)) return parsed;
  }
  return null;
}

export function parseNumberCell(value: RawValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!DECIMAL_PATTERN.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

function normalizeOther(value: RawValue): Cell {
  if (isMissing(value)) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function normalizeCell(field: string, value: RawValue): Cell {
  if (dateFields.has(field)) return parseDateCell(value);
  if (numericFields.has(field)) return parseNumberCell(value);
  return normalizeOther(value);
}

/**
 * Normalize a batch of rows. Output order matches input order;
 * `columns` is the union of row fields in first-seen order.
 */
export function normalizeRows(rows: readonly RawRow[]): Dataset {
  const columns: string[] = [];
  const seen = new Set<string>();
  const records: DisclosureRecord[] = [];

  for (const row of rows) {
    const record: Record<string, Cell> = {};
    for (const [field, value] of Object.entries(row)) {
      if (!seen.has(field)) {
        seen.add(field);
        columns.push(field);
      }
      record[field] = normalizeCell(field, value);
    }
    records.push(record);
  }

  return { columns, records };
}
