import { err, ok, type Result } from 'neverthrow';

import { monthKey, type InsightsContext } from '../../../dataset/index.js';
import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy, summarizeRows } from '../grouping.js';
import { ZERO, formatMoney, safeDivide, sumAmounts, toMoney } from '../numbers.js';
import { CATEGORY_VOCABULARY, validateOptionalMember } from '../validation.js';

import type { CategoryFilterInput } from '../schemas/tools.js';
import type { MonthlyRevenue, RevenueTrend, RevenueTrendsPayload, ToolResult } from '../types.js';
import type { Decimal } from 'decimal.js';

/** Fewer monthly buckets than this always yields a stable trend */
export const MIN_MONTHS_FOR_TREND = 4;

/** Second-half change (percent) beyond which the trend is no longer stable */
export const REVENUE_TREND_THRESHOLD = 10;

const average = (values: readonly Decimal[]): Decimal =>
  safeDivide(
    values.reduce((total, value) => total.plus(value), ZERO),
    values.length
  );

/**
 * Compares average monthly revenue of the first `floor(n/2)` months with the
 * rest. Input is in chronological order.
 */
export const classifyRevenueTrend = (monthlyRevenue: readonly Decimal[]): RevenueTrend => {
  if (monthlyRevenue.length < MIN_MONTHS_FOR_TREND) return 'stable';

  const mid = Math.floor(monthlyRevenue.length / 2);
  const firstHalf = average(monthlyRevenue.slice(0, mid));
  const secondHalf = average(monthlyRevenue.slice(mid));

  if (firstHalf.lessThanOrEqualTo(0)) return 'stable';

  const change = secondHalf.minus(firstHalf).times(100).div(firstHalf);
  if (change.greaterThan(REVENUE_TREND_THRESHOLD)) return 'growing';
  if (change.lessThan(-REVENUE_TREND_THRESHOLD)) return 'declining';
  return 'stable';
};

/**
 * Monthly revenue buckets (non-returned transactions), oldest first.
 */
export function getRevenueTrends(
  context: InsightsContext,
  input: CategoryFilterInput
): Result<ToolResult<RevenueTrendsPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  const category = validateOptionalMember(input.category, CATEGORY_VOCABULARY);
  if (category.isErr()) return err(category.error);

  const rows = snapshot
    .transactions()
    .filter(
      (row) => !row.isReturned && (category.value === undefined || row.category === category.value)
    );

  if (rows.length === 0) {
    return err(noDataError('No transactions found matching the specified filters.'));
  }

  const months = [...groupRows(rows, (row) => monthKey(row.transactionDate))]
    .map(([month, members]) => ({ month, stats: summarizeRows(members) }))
    .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));

  const data: MonthlyRevenue[] = months.map(({ month, stats }) => ({
    month,
    revenue: toMoney(stats.revenue),
    transaction_count: stats.transactionCount,
    unique_customers: stats.uniqueCustomers,
    avg_transaction_value: toMoney(safeDivide(stats.revenue, stats.transactionCount)),
  }));

  // Ties go to the earliest month in both directions
  const [best] = rankBy(
    months,
    (entry) => entry.stats.revenue,
    (entry) => entry.month
  );
  const [worst] = rankBy(
    months,
    (entry) => entry.stats.revenue,
    (entry) => entry.month,
    'asc'
  );
  if (best === undefined || worst === undefined) return err(emptyGroupError('Revenue trends'));

  const total = sumAmounts(rows);
  const totalRevenue = toMoney(total);
  const averageMonthly = toMoney(safeDivide(total, months.length));
  const trend = classifyRevenueTrend(months.map((entry) => entry.stats.revenue));

  return ok({
    summary:
      `Revenue trend over ${String(months.length)} ${months.length === 1 ? 'month' : 'months'}. ` +
      `Total: ${formatMoney(totalRevenue)}, Average: ${formatMoney(averageMonthly)}/month. ` +
      `Best month: ${best.month} (${formatMoney(toMoney(best.stats.revenue))}). ` +
      `Overall trend: ${trend}.`,
    payload: {
      data,
      total_revenue: totalRevenue,
      best_month: best.month,
      worst_month: worst.month,
      avg_monthly_revenue: averageMonthly,
      overall_trend: trend,
    },
    metadata: buildMetadata(anchor, {
      filters: { category: category.value },
      recordCount: rows.length,
    }),
  });
}
