import { describe, it, expect } from 'vitest';
import { summarizeDataset } from '../src/processing/summary.js';
import type { Dataset } from '../src/core/types.js';

describe('summarizeDataset', () => {
  it('counts distinct companies, symbols and transaction types', () => {
    const dataset: Dataset = {
      columns: ['symbol', 'company', 'tdpTransactionType', 'secVal'],
      records: [
        { symbol: 'AAA', company: 'Alpha', tdpTransactionType: 'Buy', secVal: 100 },
        { symbol: 'AAA', company: 'Alpha', tdpTransactionType: 'Sell', secVal: 50.5 },
        { symbol: 'BBB', company: 'Beta', tdpTransactionType: 'Buy', secVal: null },
        { symbol: null, company: 'Gamma', tdpTransactionType: 'Pledge', secVal: 10 },
      ],
    };

    expect(summarizeDataset(dataset)).toEqual({
      total_records: 4,
      unique_companies: 3,
      unique_symbols: 2,
      transaction_types: [
        { type: 'Buy', count: 2 },
        { type: 'Pledge', count: 1 },
        { type: 'Sell', count: 1 },
      ],
      total_value: 160.5,
      columns: ['symbol', 'company', 'tdpTransactionType', 'secVal'],
    });
  });

  it('reports null for columns the dataset lacks', () => {
    const summary = summarizeDataset({ columns: ['name'], records: [{ name: 'X' }] });
    expect(summary.unique_companies).toBeNull();
    expect(summary.unique_symbols).toBeNull();
    expect(summary.total_value).toBeNull();
    expect(summary.transaction_types).toEqual([]);
  });
});
