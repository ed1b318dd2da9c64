import { existsSync, readFileSync, renameSync, statSync, writeFileSync } from 'node:fs';
import { format } from 'date-fns';
import { PersistenceError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Cell, Dataset, DisclosureRecord } from '../core/types.js';
import { cellToString, STORAGE_DATE_FORMAT } from '../processing/identity.js';
import { DATE_FIELDS, FEED_DATE_FORMAT, NUMERIC_FIELDS, parseDateCell, parseNumberCell } from '../processing/normalizer.js';
import { defaultCheckpoint } from '../processing/window.js';
import { parseCsvRows, serializeCsvRows } from './csv.js';

/**
 * On-disk dataset: one CSV file plus timestamped backups beside it.
 *
 * All I/O is synchronous; this process is the file's only writer.
 * Backups are made by renaming the current file and are never removed.
 */

const BACKUP_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

const dateFields = new Set(DATE_FIELDS);
const numericFields = new Set(NUMERIC_FIELDS);

function readCell(column: string, text: string): Cell {
  if (text === '') return null;
  if (dateFields.has(column)) return parseDateCell(text, [STORAGE_DATE_FORMAT, FEED_DATE_FORMAT]);
  if (numericFields.has(column)) return parseNumberCell(text);
  return text;
}

/** Parse dataset CSV text. Throws PersistenceError on structural problems. */
export function parseDataset(text: string, path: string): Dataset {
  let rows: string[][];
  try {
    rows = parseCsvRows(text);
  } catch (err) {
    throw new PersistenceError(`Cannot parse ${path}: ${describeError(err)}`, path, 'read');
  }

  if (rows.length === 0) {
    return { columns: [], records: [] };
  }

  const [header, ...body] = rows;
  if (header.some(col => col === '')) {
    throw new PersistenceError(`Cannot parse ${path}: header has an empty column name`, path, 'read');
  }
  if (new Set(header).size !== header.length) {
    throw new PersistenceError(`Cannot parse ${path}: header has duplicate column names`, path, 'read');
  }

  const records: DisclosureRecord[] = body.map((fields, i) => {
    if (fields.length !== header.length) {
      throw new PersistenceError(
        `Cannot parse ${path}: row ${i + 2} has ${fields.length} fields, header has ${header.length}`,
        path,
        'read'
      );
    }
    const record: Record<string, Cell> = {};
    header.forEach((column, j) => {
      record[column] = readCell(column, fields[j]);
    });
    return record;
  });

  return { columns: header, records };
}

/** Load the dataset at `path`, or null if there is no file */
export function loadDataset(path: string): Dataset | null {
  if (!existsSync(path)) return null;

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new PersistenceError(`Cannot read ${path}: ${describeError(err)}`, path, 'read');
  }
  return parseDataset(text, path);
}

export function serializeDataset(dataset: Dataset): string {
  const rows: string[][] = [dataset.columns];
  for (const record of dataset.records) {
    rows.push(dataset.columns.map(col => cellToString(record[col] ?? null)));
  }
  return serializeCsvRows(rows);
}

/** Latest `date` in the dataset, or null if none is set */
export function latestDate(dataset: Dataset): Date | null {
  let latest: Date | null = null;
  for (const record of dataset.records) {
    const value = record['date'];
    if (value instanceof Date && (latest === null || value.getTime() > latest.getTime())) {
      latest = value;
    }
  }
  return latest;
}

/**
 * Where the next fetch window should start.
 *
 * Latest stored transaction date; the file's mtime when no record has a
 * date; now minus the default lookback when there is no usable file.
 */
export function readCheckpoint(path: string, logger: Logger, now: Date = new Date()): Date {
  if (!existsSync(path)) return defaultCheckpoint(now);

  try {
    const dataset = loadDataset(path);
    if (dataset === null || dataset.records.length === 0) return defaultCheckpoint(now);

    const latest = latestDate(dataset);
    if (latest !== null) return latest;

    return statSync(path).mtime;
  } catch (err) {
    logger.error({ err: describeError(err), path }, 'Error getting last update time');
    return defaultCheckpoint(now);
  }
}

/** First unused `<path>.backup_<timestamp>[_n]` name */
export function backupPathFor(path: string, now: Date = new Date()): string {
  const base = `${path}.backup_${format(now, BACKUP_TIMESTAMP_FORMAT)}`;
  let candidate = base;
  for (let n = 1; existsSync(candidate); n++) {
    candidate = `${base}_${n}`;
  }
  return candidate;
}

/** Write a dataset to `path` as-is, replacing any file there */
export function writeDatasetFile(path: string, dataset: Dataset): void {
  try {
    writeFileSync(path, serializeDataset(dataset), 'utf-8');
  } catch (err) {
    throw new PersistenceError(`Cannot write ${path}: ${describeError(err)}`, path, 'write');
  }
}

export interface SaveOptions {
  logger: Logger;
  now?: Date;
}

/**
 * Back up the current file (by rename) and write `dataset` in its place.
 *
 * Returns `newCount` on success and 0 on failure. A failed write leaves
 * the backup where it is; recovery is manual.
 */
export function saveDataset(path: string, dataset: Dataset, newCount: number, options: SaveOptions): number {
  const { logger } = options;
  try {
    if (existsSync(path)) {
      const backup = backupPathFor(path, options.now ?? new Date());
      try {
        renameSync(path, backup);
      } catch (err) {
        throw new PersistenceError(`Cannot back up ${path}: ${describeError(err)}`, path, 'write');
      }
      logger.info({ backup }, 'Created backup');
    }

    writeDatasetFile(path, dataset);
    logger.info({ path, new_records: newCount, total_records: dataset.records.length }, 'Dataset saved');
    return newCount;
  } catch (err) {
    logger.error({ err: describeError(err), path }, 'Error saving data');
    return 0;
  }
}
