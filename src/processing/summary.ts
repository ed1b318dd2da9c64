/**
 * Dataset statistics for the post-cycle report.
 */

import type { Dataset, DatasetSummary } from '../core/types.js';
import { cellToString } from './identity.js';

function distinctCount(dataset: Dataset, field: string): number | null {
  if (!dataset.columns.includes(field)) return null;
  const values = new Set<string>();
  for (const record of dataset.records) {
    const value = record[field] ?? null;
    if (value !== null) values.add(cellToString(value));
  }
  return values.size;
}

export function summarizeDataset(dataset: Dataset): DatasetSummary {
  const typeCounts = new Map<string, number>();
  let totalValue: number | null = null;

  for (const record of dataset.records) {
    const type = record['tdpTransactionType'] ?? null;
    if (type !== null) {
      const label = cellToString(type);
      typeCounts.set(label, (typeCounts.get(label) ?? 0) + 1);
    }
    const value = record['secVal'];
    if (typeof value === 'number') {
      totalValue = (totalValue ?? 0) + value;
    }
  }

  const transactionTypes = Array.from(typeCounts, ([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count || a.type.localeCompare(b.type));

  return {
    total_records: dataset.records.length,
    unique_companies: distinctCount(dataset, 'company'),
    unique_symbols: distinctCount(dataset, 'symbol'),
    transaction_types: transactionTypes,
    total_value: totalValue,
    columns: [...dataset.columns],
  };
}
