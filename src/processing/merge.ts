/**
 * Incremental merge of freshly fetched records into the stored dataset.
 *
 * Existing records are never removed or rewritten: key equality is the
 * only de-duplication criterion, and the first record seen with a key
 * is the one kept.
 */

import { identityKey } from './identity.js';
import type { Cell, Dataset, DisclosureRecord, MergeResult } from '../core/types.js';

export const SORT_FIELD = 'date';

/** Union of column lists, keeping first-seen order */
export function unionColumns(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const list of lists) {
    for (const col of list) {
      if (!seen.has(col)) {
        seen.add(col);
        out.push(col);
      }
    }
  }
  return out;
}

/** Drop later records whose key repeats an earlier one in the same batch */
export function dedupeBatch(dataset: Dataset, exclude: ReadonlySet<string> = new Set()): DisclosureRecord[] {
  const columns = new Set(dataset.columns);
  const seen = new Set(exclude);
  const out: DisclosureRecord[] = [];
  for (const record of dataset.records) {
    const key = identityKey(record, columns);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(record);
  }
  return out;
}

function dateValue(cell: Cell | undefined): number | null {
  return cell instanceof Date ? cell.getTime() : null;
}

/**
 * Sort by `date` descending. Records without a date go last; ties keep
 * their relative order.
 */
export function sortByDateDescending(records: readonly DisclosureRecord[]): DisclosureRecord[] {
  return [...records].sort((a, b) => {
    const da = dateValue(a[SORT_FIELD]);
    const db = dateValue(b[SORT_FIELD]);
    if (da === null && db === null) return 0;
    if (da === null) return 1;
    if (db === null) return -1;
    return db - da;
  });
}

function sortIfDated(columns: readonly string[], records: DisclosureRecord[]): DisclosureRecord[] {
  return columns.includes(SORT_FIELD) ? sortByDateDescending(records) : records;
}

/**
 * Merge `incoming` into `existing`.
 * With no existing dataset, the whole (de-duplicated) batch is new.
 */
export function mergeRecords(existing: Dataset | null, incoming: Dataset): MergeResult {
  if (existing === null) {
    const fresh = dedupeBatch(incoming);
    return {
      merged: { columns: [...incoming.columns], records: sortIfDated(incoming.columns, fresh) },
      new_records: fresh,
    };
  }

  const existingColumns = new Set(existing.columns);
  const existingKeys = new Set(existing.records.map(r => identityKey(r, existingColumns)));
  const newRecords = dedupeBatch(incoming, existingKeys);

  const columns = unionColumns(existing.columns, incoming.columns);

  return {
    merged: { columns, records: sortIfDated(columns, [...existing.records, ...newRecords]) },
    new_records: newRecords,
  };
}
