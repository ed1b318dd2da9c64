/**
 * Identity keys for de-duplicating disclosures across fetch cycles.
 *
 * The key is a heuristic: two records describe the same event when
 * symbol, company, insider name, date, security value and transaction
 * type all agree. Other fields may differ.
 */

import { format } from 'date-fns';
import type { Cell, DisclosureRecord } from '../core/types.js';

export const KEY_FIELDS: readonly string[] = ['symbol', 'company', 'name', 'date', 'secVal', 'tdpTransactionType'];

export const KEY_SEPARATOR = '|';
export const ABSENT_KEY_PART = 'NA';

/** Storage and key form of a date cell */
export const STORAGE_DATE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export function cellToString(value: Cell): string {
  if (value instanceof Date) return format(value, STORAGE_DATE_FORMAT);
  if (typeof value === 'number') return String(value);
  return value ?? '';
}

/**
 * Build the identity key of `record` within a table whose schema is `columns`.
 *
 * A key field the schema has but the record leaves absent contributes
 * "NA". A key field the schema lacks is skipped with no placeholder, so
 * the same event can key differently in tables with different schemas.
 */
export function identityKey(record: DisclosureRecord, columns: ReadonlySet<string>): string {
  const parts: string[] = [];
  for (const field of KEY_FIELDS) {
    if (!columns.has(field)) continue;
    const value = record[field] ?? null;
    parts.push(value === null ? ABSENT_KEY_PART : cellToString(value));
  }
  return parts.join(KEY_SEPARATOR);
}
