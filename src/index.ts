#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { DEBUG_RESPONSE_FILE, DEFAULT_DATA_FILE, DEFAULT_INTERVAL_MINUTES, MAX_LOOKBACK_DAYS, loadConfig } from './core/config.js';
import { describeError } from './core/errors.js';
import { createLogger, type Logger } from './core/logger.js';
import { fetchInsiderData } from './core/nse-client.js';
import { runContinuous, runCycle, saveResponseBody, type CycleDeps } from './core/orchestrator.js';
import { ExchangeSession } from './core/session.js';
import { positiveInt } from './cli-args.js';
import type { RawRow } from './core/types.js';
import { renderCycleSummary, renderDatasetSummary, renderSummaryJson } from './output/summary-renderer.js';
import { dedupeBatch } from './processing/merge.js';
import { normalizeRows } from './processing/normalizer.js';
import { summarizeDataset } from './processing/summary.js';
import { windowForDays } from './processing/window.js';
import { loadDataset, writeDatasetFile } from './storage/dataset-store.js';

function setup(): { logger: Logger; session: ExchangeSession } {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, file: config.NSE_LOG_FILE });
  const session = new ExchangeSession({
    baseUrl: config.NSE_BASE_URL,
    timeoutMs: config.NSE_REQUEST_TIMEOUT_MS,
    logger,
  });
  return { logger, session };
}

async function runUpdates(options: { mode: 'once' | 'continuous'; interval: number; file: string }): Promise<void> {
  const { logger, session } = setup();
  const deps: CycleDeps = { session, dataFile: options.file, logger, debugFile: DEBUG_RESPONSE_FILE };

  if (options.mode === 'once') {
    console.log('Running single update...');
    const result = await runCycle(deps);
    console.log('');
    console.log(renderCycleSummary(result));
    console.log('');
    process.exitCode = result.success ? 0 : 1;
    return;
  }

  console.log(`Running continuous updates every ${options.interval} minutes...`);
  console.log(chalk.dim(`Data will be saved to: ${options.file}`));
  console.log(chalk.dim('Press Ctrl+C to stop'));

  const controller = new AbortController();
  const stop = () => {
    if (!controller.signal.aborted) {
      logger.info('Stop requested; exiting after the current cycle');
      controller.abort();
    }
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await runContinuous(deps, {
    intervalMinutes: options.interval,
    signal: controller.signal,
    onCycleComplete: result => {
      console.log('');
      console.log(renderCycleSummary(result));
      console.log('');
    },
  });
}

const program = new Command();

program
  .name('nse-insider-tracker')
  .description('Keep a deduplicated local history of NSE insider trading disclosures')
  .version('0.1.0')
  .enablePositionalOptions();

program
  .addOption(
    new Option('-m, --mode <mode>', 'once for a single update, continuous for auto-updates')
      .choices(['once', 'continuous'])
      .default('continuous')
  )
  .option('-i, --interval <minutes>', 'Update interval in minutes', positiveInt, DEFAULT_INTERVAL_MINUTES)
  .option('-f, --file <path>', 'Data file name', DEFAULT_DATA_FILE)
  .action(async (options: { mode: 'once' | 'continuous'; interval: number; file: string }) => {
    try {
      await runUpdates(options);
    } catch (err) {
      console.error(chalk.red(`Error: ${describeError(err)}`));
      process.exitCode = 1;
    }
  });

program
  .command('snapshot')
  .description('Fetch a date range once and save it to its own CSV file')
  .option('-d, --days <n>', `Days to look back (at most ${MAX_LOOKBACK_DAYS})`, positiveInt, MAX_LOOKBACK_DAYS)
  .option('-o, --out <path>', 'Output file (default: nse_insider_trading_<from>_to_<to>.csv)')
  .option('-j, --json', 'Print the summary as JSON')
  .action(async (options: { days: number; out?: string; json?: boolean }) => {
    try {
      const { logger, session } = setup();
      if (options.days > MAX_LOOKBACK_DAYS) {
        console.error(chalk.yellow(`Note: the API serves at most ${MAX_LOOKBACK_DAYS} days; clamping --days ${options.days}`));
      }

      try {
        await session.bootstrap();
      } catch (err) {
        console.error(chalk.yellow(`Failed to get session cookies (${describeError(err)}). Continuing anyway...`));
      }

      const window = windowForDays(options.days);
      let rows: RawRow[];
      try {
        ({ rows } = await fetchInsiderData(session, window, logger));
      } catch (err) {
        if (saveResponseBody(err, DEBUG_RESPONSE_FILE, logger)) {
          console.error(chalk.dim(`Response saved to ${DEBUG_RESPONSE_FILE} for inspection`));
        }
        throw err;
      }
      const normalized = normalizeRows(rows);
      const dataset = { columns: normalized.columns, records: dedupeBatch(normalized) };

      if (dataset.records.length === 0) {
        console.error(chalk.yellow('No insider trading data found for the specified date range'));
        return;
      }

      const out = options.out ?? `nse_insider_trading_${window.from_param}_to_${window.to_param}.csv`;
      writeDatasetFile(out, dataset);
      const summary = summarizeDataset(dataset);

      if (options.json) {
        console.log(renderSummaryJson(summary, { file: out, from: window.from_param, to: window.to_param }));
      } else {
        console.log('');
        console.log(chalk.green(`Data saved to: ${out}`));
        console.log(renderDatasetSummary(dataset, summary, { window }));
        console.log('');
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${describeError(err)}`));
      console.error(chalk.dim('The exchange may be blocking automated requests; try again later.'));
      process.exitCode = 1;
    }
  });

program
  .command('summary')
  .description('Summarize a stored data file without fetching')
  .option('-f, --file <path>', 'Data file name', DEFAULT_DATA_FILE)
  .option('-j, --json', 'Output as JSON')
  .action((options: { file: string; json?: boolean }) => {
    try {
      const dataset = loadDataset(options.file);
      if (dataset === null) {
        console.error(chalk.red(`No data file at ${options.file}`));
        process.exitCode = 1;
        return;
      }
      const summary = summarizeDataset(dataset);
      if (options.json) {
        console.log(renderSummaryJson(summary, { file: options.file }));
      } else {
        console.log('');
        console.log(renderDatasetSummary(dataset, summary));
        console.log('');
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${describeError(err)}`));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
