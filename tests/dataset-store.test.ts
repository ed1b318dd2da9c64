import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PersistenceError } from '../src/core/errors.js';
import { createSilentLogger } from '../src/core/logger.js';
import type { Dataset } from '../src/core/types.js';
import {
  backupPathFor,
  latestDate,
  loadDataset,
  parseDataset,
  readCheckpoint,
  saveDataset,
  serializeDataset,
} from '../src/storage/dataset-store.js';

const logger = createSilentLogger();
const NOW = new Date(2024, 1, 1, 12, 0, 0);

const SAMPLE: Dataset = {
  columns: ['symbol', 'company', 'date', 'secVal', 'acqMode'],
  records: [
    { symbol: 'ABC', company: 'ABC, Ltd', date: new Date(2024, 0, 20, 10, 30), secVal: 1500.5, acqMode: null },
    { symbol: 'XYZ', company: 'XYZ Ltd', date: null, secVal: 42, acqMode: 'Market Sale' },
  ],
};

describe('dataset store', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nse-insider-store-'));
    file = join(dir, 'data.csv');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('serializeDataset / parseDataset', () => {
    it('writes a header row and empty fields for absent values', () => {
      expect(serializeDataset(SAMPLE)).toBe(
        'symbol,company,date,secVal,acqMode\n' +
        'ABC,"ABC, Ltd",2024-01-20 10:30:00,1500.5,\n' +
        'XYZ,XYZ Ltd,,42,Market Sale\n'
      );
    });

    it('restores typed cells', () => {
      expect(parseDataset(serializeDataset(SAMPLE), file)).toEqual(SAMPLE);
    });

    it('accepts feed-format dates in the date columns', () => {
      const parsed = parseDataset('symbol,date\nABC,15-Jan-2024 10:30\n', file);
      expect(parsed.records[0].date).toEqual(new Date(2024, 0, 15, 10, 30));
    });

    it('parses a header-only file as an empty dataset', () => {
      expect(parseDataset('symbol,date\n', file)).toEqual({ columns: ['symbol', 'date'], records: [] });
    });

    it('rejects rows whose width differs from the header', () => {
      expect(() => parseDataset('symbol,date\nABC\n', file)).toThrow(PersistenceError);
      expect(() => parseDataset('symbol,date\nABC\n', file)).toThrow('row 2 has 1 fields, header has 2');
    });

    it('rejects duplicate header columns', () => {
      expect(() => parseDataset('symbol,symbol\nA,B\n', file)).toThrow('duplicate column names');
    });

    it('wraps CSV syntax errors', () => {
      let caught: unknown;
      try {
        parseDataset('symbol\n"open\n', file);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(PersistenceError);
      expect(caught instanceof PersistenceError && caught.operation).toBe('read');
    });
  });

  describe('loadDataset', () => {
    it('returns null when there is no file', () => {
      expect(loadDataset(file)).toBeNull();
    });

    it('reads a saved file', () => {
      writeFileSync(file, serializeDataset(SAMPLE));
      expect(loadDataset(file)).toEqual(SAMPLE);
    });
  });

  describe('latestDate', () => {
    it('ignores records without a date', () => {
      expect(latestDate(SAMPLE)).toEqual(new Date(2024, 0, 20, 10, 30));
      expect(latestDate({ columns: ['date'], records: [{ date: null }] })).toBeNull();
    });
  });

  describe('readCheckpoint', () => {
    it('defaults to seven days back without a file', () => {
      expect(readCheckpoint(file, logger, NOW)).toEqual(new Date(2024, 0, 25, 12, 0, 0));
    });

    it('defaults to seven days back for an empty dataset', () => {
      writeFileSync(file, 'symbol,date\n');
      expect(readCheckpoint(file, logger, NOW)).toEqual(new Date(2024, 0, 25, 12, 0, 0));
    });

    it('uses the latest stored date', () => {
      writeFileSync(file, serializeDataset(SAMPLE));
      expect(readCheckpoint(file, logger, NOW)).toEqual(new Date(2024, 0, 20, 10, 30));
    });

    it('falls back to the file modification time when no record has a date', () => {
      writeFileSync(file, 'symbol,secVal\nABC,10\n');
      const mtime = new Date(2024, 0, 10, 8, 0, 0);
      utimesSync(file, mtime, mtime);
      expect(readCheckpoint(file, logger, NOW).getTime()).toBe(mtime.getTime());
    });

    it('defaults to seven days back when the file is unreadable', () => {
      writeFileSync(file, 'symbol,date\n"broken\n');
      expect(readCheckpoint(file, logger, NOW)).toEqual(new Date(2024, 0, 25, 12, 0, 0));
    });
  });

  describe('backupPathFor', () => {
    it('appends a timestamp', () => {
      expect(backupPathFor(file, new Date(2024, 1, 3, 4, 5, 6))).toBe(`${file}.backup_20240203_040506`);
    });

    it('never reuses an existing backup name', () => {
      const at = new Date(2024, 1, 3, 4, 5, 6);
      writeFileSync(`${file}.backup_20240203_040506`, 'old');
      writeFileSync(`${file}.backup_20240203_040506_1`, 'older');
      expect(backupPathFor(file, at)).toBe(`${file}.backup_20240203_040506_2`);
    });
  });

  describe('saveDataset', () => {
    it('creates the file when none exists, without a backup', () => {
      expect(saveDataset(file, SAMPLE, 2, { logger, now: NOW })).toBe(2);
      expect(readFileSync(file, 'utf-8')).toBe(serializeDataset(SAMPLE));
      expect(readdirSync(dir)).toEqual(['data.csv']);
    });

    it('renames the previous file to a backup before writing', () => {
      writeFileSync(file, 'previous contents\n');
      expect(saveDataset(file, SAMPLE, 1, { logger, now: NOW })).toBe(1);

      const backup = `${file}.backup_20240201_120000`;
      expect(readFileSync(backup, 'utf-8')).toBe('previous contents\n');
      expect(readFileSync(file, 'utf-8')).toBe(serializeDataset(SAMPLE));
    });

    it('reports zero when the write fails', () => {
      const unwritable = join(dir, 'missing-dir', 'data.csv');
      expect(saveDataset(unwritable, SAMPLE, 2, { logger, now: NOW })).toBe(0);
      expect(existsSync(unwritable)).toBe(false);
    });
  });
});
