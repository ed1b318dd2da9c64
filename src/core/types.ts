/**
 * Core data model for the NSE insider trading tracker.
 *
 * Design principles:
 * - Rows are field-name -> cell mappings; the upstream schema is not fixed
 * - `null` is the only absent marker after normalization
 * - Stored records are append-only; once recorded, an event is never updated
 */

/** A raw JSON value as it arrives in one field of an API row */
export type RawValue = string | number | boolean | null | undefined | RawValue[] | { [key: string]: RawValue };

export type RawRow = Readonly<Record<string, RawValue>>;

/** A normalized field value. `null` means absent. */
export type Cell = string | number | Date | null;

/** One insider trading disclosure, keyed by upstream field name */
export type DisclosureRecord = Readonly<Record<string, Cell>>;

/**
 * An ordered table of records.
 * `columns` is the table schema: every field seen, in first-seen order.
 */
export interface Dataset {
  columns: string[];
  records: DisclosureRecord[];
}

/** A fetch window, inclusive on both ends */
export interface DateWindow {
  from: Date;
  to: Date;
  /** dd-mm-yyyy, as the API expects */
  from_param: string;
  to_param: string;
}

export interface MergeResult {
  merged: Dataset;
  new_records: DisclosureRecord[];
}

export interface DatasetSummary {
  total_records: number;
  unique_companies: number | null;
  unique_symbols: number | null;
  /** Count per `tdpTransactionType`, descending */
  transaction_types: Array<{ type: string; count: number }>;
  /** Sum of `secVal` over records that carry one */
  total_value: number | null;
  columns: string[];
}

export type CycleState = 'idle' | 'running';

export interface CycleResult {
  success: boolean;
  new_records: number;
  total_records: number;
  window: DateWindow | null;
  summary: DatasetSummary | null;
  started_at: Date;
  finished_at: Date;
}
