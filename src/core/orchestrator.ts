/**
 * Update cycle orchestration.
 *
 * A cycle is: session cookies -> fetch window -> fetch -> normalize ->
 * merge -> persist -> summary. Every failure is caught at the cycle
 * boundary and reported through the result's `success` flag. Nothing
 * is written until the merge is complete, so a failed cycle leaves the
 * dataset file as it was.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { CookieError, FetchError, describeError } from './errors.js';
import { jitterMs, sleep } from './http.js';
import type { Logger } from './logger.js';
import { fetchInsiderData } from './nse-client.js';
import type { ExchangeSession } from './session.js';
import type { CycleResult, CycleState, Dataset, DatasetSummary } from './types.js';
import { mergeRecords } from '../processing/merge.js';
import { normalizeRows } from '../processing/normalizer.js';
import { summarizeDataset } from '../processing/summary.js';
import { computeWindow } from '../processing/window.js';
import { loadDataset, readCheckpoint, saveDataset } from '../storage/dataset-store.js';

export interface CycleDeps {
  session: ExchangeSession;
  dataFile: string;
  logger: Logger;
  now?: () => Date;
  /** Pacing delay between cookie bootstrap and the API call */
  delay?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Save non-JSON API answers here; omit to discard them */
  debugFile?: string;
}

export interface UpdateOutcome {
  new_records: number;
  /** Whether the data file was rewritten */
  written: boolean;
}

/**
 * Merge `incoming` into the dataset at `path` and persist the result.
 *
 * An unreadable existing file is treated as absent: the batch is
 * written on its own and the old file survives as a backup.
 */
export function updateDataFile(
  path: string,
  incoming: Dataset,
  options: { logger: Logger; now?: Date }
): UpdateOutcome {
  const { logger } = options;

  if (incoming.records.length === 0) {
    logger.info('No new data to update');
    return { new_records: 0, written: false };
  }

  let existing: Dataset | null = null;
  try {
    existing = loadDataset(path);
  } catch (err) {
    logger.warn({ err: describeError(err), path }, 'Error reading existing file; treating it as absent');
  }

  if (existing === null) {
    logger.info({ path }, 'Creating new data file');
  } else {
    logger.info({ records: existing.records.length }, 'Loaded existing data');
  }

  const { merged, new_records } = mergeRecords(existing, incoming);
  if (new_records.length === 0) {
    logger.info('No new unique records found');
    return { new_records: 0, written: false };
  }

  const saved = saveDataset(path, merged, new_records.length, { logger, now: options.now });
  return { new_records: saved, written: saved > 0 };
}

/**
 * Write the body of a non-JSON API answer to `path` for inspection.
 * Returns whether anything was written.
 */
export function saveResponseBody(err: unknown, path: string, logger: Logger): boolean {
  if (!(err instanceof FetchError) || err.body === undefined) return false;
  try {
    writeFileSync(path, err.body, 'utf-8');
  } catch (writeErr) {
    logger.warn({ err: describeError(writeErr), path }, 'Cannot save response for inspection');
    return false;
  }
  logger.warn({ path }, 'Response saved for inspection');
  return true;
}

function summarizeFile(path: string, logger: Logger): DatasetSummary | null {
  if (!existsSync(path)) return null;
  try {
    const dataset = loadDataset(path);
    return dataset ? summarizeDataset(dataset) : null;
  } catch (err) {
    logger.warn({ err: describeError(err), path }, 'Cannot summarize data file');
    return null;
  }
}

/** Run one update cycle. Never throws. */
export async function runCycle(deps: CycleDeps): Promise<CycleResult> {
  const { session, dataFile, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const delay = deps.delay ?? sleep;
  const random = deps.random ?? Math.random;

  const startedAt = now();
  logger.info({ started_at: startedAt.toISOString() }, 'Starting update cycle');

  const failed = (window: CycleResult['window']): CycleResult => ({
    success: false,
    new_records: 0,
    total_records: 0,
    window,
    summary: null,
    started_at: startedAt,
    finished_at: now(),
  });

  let window: CycleResult['window'] = null;
  try {
    try {
      await session.bootstrap();
    } catch (err) {
      if (!(err instanceof CookieError)) throw err;
      logger.warn({ err: err.message, status: err.statusCode }, 'Failed to get session cookies. Continuing anyway');
    }

    await delay(jitterMs(2000, 4000, random));

    const cycleNow = now();
    window = computeWindow(readCheckpoint(dataFile, logger, cycleNow), cycleNow);
    const { rows } = await fetchInsiderData(session, window, logger);

    logger.info({ rows: rows.length }, 'Cleaning data');
    const incoming = normalizeRows(rows);

    const outcome = updateDataFile(dataFile, incoming, { logger, now: cycleNow });
    const summary = summarizeFile(dataFile, logger);

    logger.info(
      { new_records: outcome.new_records, total_records: summary?.total_records ?? 0 },
      'Update cycle completed successfully'
    );

    return {
      success: true,
      new_records: outcome.new_records,
      total_records: summary?.total_records ?? 0,
      window,
      summary,
      started_at: startedAt,
      finished_at: now(),
    };
  } catch (err) {
    logger.error({ err: describeError(err), name: err instanceof Error ? err.name : undefined }, 'Update cycle failed');
    if (deps.debugFile) saveResponseBody(err, deps.debugFile, logger);
    return failed(window);
  }
}

/** Longest delay a single timer honours; Node fires longer ones after 1 ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 * Waits longer than MAX_TIMER_MS are split across several timers.
 */
export function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolve => {
    const deadline = Date.now() + ms;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const arm = () => {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        signal.removeEventListener('abort', onAbort);
        resolve();
        return;
      }
      timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_MS));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    arm();
  });
}

export interface SchedulerOptions {
  intervalMs: number;
  logger: Logger;
  cycle: () => Promise<CycleResult>;
  onCycleComplete?: (result: CycleResult) => void;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Fixed-interval loop with two states.
 *
 * idle -> running -> idle, with the same wait after a success or a
 * failure. An abort is honoured only while idle: a running cycle is
 * always allowed to finish.
 */
export class CycleScheduler {
  private _state: CycleState = 'idle';
  private _cycles = 0;
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: SchedulerOptions) {
    this.wait = options.wait ?? interruptibleSleep;
  }

  get state(): CycleState {
    return this._state;
  }

  get cyclesCompleted(): number {
    return this._cycles;
  }

  /** Run until `signal` aborts. Resolves with the number of cycles run. */
  async run(signal: AbortSignal): Promise<number> {
    const { intervalMs, logger } = this.options;
    const minutes = intervalMs / 60_000;
    logger.info({ interval_minutes: minutes }, 'Starting continuous monitoring');

    while (!signal.aborted) {
      const result = await this.runOnce(logger);
      this._cycles++;
      this.options.onCycleComplete?.(result);

      if (signal.aborted) break;
      if (result.success) {
        logger.info({ interval_minutes: minutes }, 'Sleeping until next cycle');
      } else {
        logger.warn({ interval_minutes: minutes }, 'Update failed. Retrying after interval');
      }
      await this.wait(intervalMs, signal);
    }

    logger.info({ cycles: this._cycles }, 'Continuous monitoring stopped');
    return this._cycles;
  }

  private async runOnce(logger: Logger): Promise<CycleResult> {
    this._state = 'running';
    const startedAt = new Date();
    try {
      return await this.options.cycle();
    } catch (err) {
      logger.error({ err: describeError(err) }, 'Unexpected error in continuous mode');
      return {
        success: false,
        new_records: 0,
        total_records: 0,
        window: null,
        summary: null,
        started_at: startedAt,
        finished_at: new Date(),
      };
    } finally {
      this._state = 'idle';
    }
  }
}

export interface ContinuousOptions {
  intervalMinutes: number;
  signal: AbortSignal;
  onCycleComplete?: (result: CycleResult) => void;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Run update cycles every `intervalMinutes` until `signal` aborts */
export function runContinuous(deps: CycleDeps, options: ContinuousOptions): Promise<number> {
  const scheduler = new CycleScheduler({
    intervalMs: options.intervalMinutes * 60_000,
    logger: deps.logger,
    cycle: () => runCycle(deps),
    onCycleComplete: options.onCycleComplete,
    wait: options.wait,
  });
  return scheduler.run(options.signal);
}
