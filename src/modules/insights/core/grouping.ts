import { Decimal } from 'decimal.js';

import { sumAmounts } from './numbers.js';

import type { Transaction } from '../../dataset/index.js';

/**
 * Groups rows by key, keeping first-seen order. Rows whose key is null
 * (an unmatched customer reference) form no group.
 */
export const groupRows = <T, K extends string>(
  rows: readonly T[],
  keyOf: (row: T) => K | null
): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    const bucket = groups.get(key);
    if (bucket === undefined) {
      groups.set(key, [row]);
    } else {
      bucket.push(row);
    }
  }
  return groups;
};

type StatsRow = Pick<Transaction, 'amount' | 'isReturned' | 'customerId'>;

/**
 * The counters every metric family is built from.
 */
export interface RowStats {
  /** All rows, returns included */
  transactionCount: number;
  returnedCount: number;
  /** Rows not returned */
  keptCount: number;
  /** Sum over rows not returned */
  revenue: Decimal;
  /** Sum over returned rows */
  revenueLost: Decimal;
  /** Distinct customers over all rows */
  uniqueCustomers: number;
}

export const summarizeRows = (rows: readonly StatsRow[]): RowStats => {
  const kept = rows.filter((row) => !row.isReturned);
  const returned = rows.filter((row) => row.isReturned);

  return {
    transactionCount: rows.length,
    returnedCount: returned.length,
    keptCount: kept.length,
    revenue: sumAmounts(kept),
    revenueLost: sumAmounts(returned),
    uniqueCustomers: new Set(rows.map((row) => row.customerId)).size,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Deterministic Ranking
// ─────────────────────────────────────────────────────────────────────────────

export type SortDirection = 'asc' | 'desc';

/**
 * Returns a sorted copy: by metric (desc by default), ties broken by key
 * ascending.
 */
export const rankBy = <T>(
  rows: readonly T[],
  metric: (row: T) => Decimal.Value,
  keyOf: (row: T) => string,
  direction: SortDirection = 'desc'
): T[] => {
  const sign = direction === 'desc' ? -1 : 1;
  return [...rows].sort((a, b) => {
    const byMetric = new Decimal(metric(a)).comparedTo(metric(b)) * sign;
    if (byMetric !== 0) return byMetric;
    const keyA = keyOf(a);
    const keyB = keyOf(b);
    return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
  });
};
