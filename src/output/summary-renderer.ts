/**
 * Renders cycle and dataset summaries for the terminal, and as JSON.
 */

import chalk from 'chalk';
import { format } from 'date-fns';
import type { CycleResult, Dataset, DatasetSummary, DateWindow } from '../core/types.js';
import { cellToString } from '../processing/identity.js';
import { formatCount, formatRupees, padRight, truncate } from './format-utils.js';

const RULE = '='.repeat(50);

function summaryLines(summary: DatasetSummary | null): string[] {
  const lines: string[] = [];
  lines.push(`Total records in file: ${formatCount(summary?.total_records ?? 0)}`);
  if (summary?.unique_companies != null) {
    lines.push(`Unique companies: ${formatCount(summary.unique_companies)}`);
  }
  if (summary?.unique_symbols != null) {
    lines.push(`Unique symbols: ${formatCount(summary.unique_symbols)}`);
  }
  return lines;
}

/** Report printed after each update cycle */
export function renderCycleSummary(result: CycleResult): string {
  const lines: string[] = [];
  lines.push(chalk.dim(RULE));
  lines.push(chalk.bold('DATA UPDATE SUMMARY'));
  lines.push(chalk.dim(RULE));
  lines.push(`Timestamp: ${format(result.finished_at, 'yyyy-MM-dd HH:mm:ss')}`);
  if (result.window) {
    lines.push(`Window: ${result.window.from_param} to ${result.window.to_param}`);
  }

  if (!result.success) {
    lines.push(chalk.red('Update failed; see log for details.'));
    return lines.join('\n');
  }

  const added = formatCount(result.new_records);
  lines.push(`New records added: ${result.new_records > 0 ? chalk.green(added) : added}`);
  lines.push(...summaryLines(result.summary));
  return lines.join('\n');
}

/**
 * Detailed report of a dataset: counts, transaction-type breakdown,
 * total value, columns and a few sample rows.
 */
export function renderDatasetSummary(
  dataset: Dataset,
  summary: DatasetSummary,
  options: { window?: DateWindow; sampleSize?: number } = {}
): string {
  const lines: string[] = [];
  lines.push(chalk.dim(RULE));
  lines.push(chalk.bold('DATA SUMMARY'));
  lines.push(chalk.dim(RULE));
  if (options.window) {
    lines.push(`Date range: ${options.window.from_param} to ${options.window.to_param}`);
  }
  lines.push(...summaryLines(summary));

  if (summary.transaction_types.length > 0) {
    lines.push('');
    lines.push('Transaction Types:');
    for (const { type, count } of summary.transaction_types) {
      lines.push(`  ${padRight(type + ':', 24)}${formatCount(count)}`);
    }
  }

  if (summary.total_value !== null) {
    lines.push('');
    lines.push(`Total transaction value: ${formatRupees(summary.total_value)}`);
  }

  if (summary.columns.length > 0) {
    lines.push('');
    lines.push(chalk.dim(`Columns available: ${summary.columns.join(', ')}`));
  }

  const sample = dataset.records.slice(0, options.sampleSize ?? 3);
  if (sample.length > 0) {
    const cols = ['date', 'symbol', 'name', 'tdpTransactionType', 'secVal'].filter(c => dataset.columns.includes(c));
    lines.push('');
    lines.push('Sample records:');
    lines.push('  ' + chalk.underline(cols.map(c => padRight(c, 22)).join('')));
    for (const record of sample) {
      lines.push('  ' + cols.map(c => padRight(truncate(cellToString(record[c] ?? null), 20), 22)).join(''));
    }
  }

  return lines.join('\n');
}

export function renderSummaryJson(summary: DatasetSummary, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...extra, ...summary }, null, 2);
}
