import { ok, type Result } from 'neverthrow';

import { isWithin, type DateWindow, type InsightsContext } from '../../../dataset/index.js';
import { buildMetadata } from '../envelope.js';
import { summarizeRows, type RowStats } from '../grouping.js';
import {
  formatCount,
  formatMoney,
  formatPercent,
  percentChange,
  safeDivide,
  toMoney,
  toPercent,
} from '../numbers.js';

import type { InsightsError } from '../errors.js';
import type {
  MonthOverMonthPayload,
  MonthOverMonthTrend,
  PeriodMetrics,
  ToolResult,
} from '../types.js';

/** Revenue change (percent) beyond which the trend is no longer stable */
export const MONTH_OVER_MONTH_DEADBAND = 5;

export const classifyMonthOverMonth = (revenueChangePercent: number): MonthOverMonthTrend => {
  if (revenueChangePercent > MONTH_OVER_MONTH_DEADBAND) return 'growth';
  if (revenueChangePercent < -MONTH_OVER_MONTH_DEADBAND) return 'decline';
  return 'stable';
};

const toPeriodMetrics = (
  label: PeriodMetrics['period_label'],
  window: DateWindow,
  stats: RowStats
): PeriodMetrics => ({
  period_label: label,
  start_date: window.start,
  end_date: window.end,
  revenue: toMoney(stats.revenue),
  transaction_count: stats.transactionCount,
  unique_customers: stats.uniqueCustomers,
  avg_transaction_value: toMoney(safeDivide(stats.revenue, stats.transactionCount)),
});

/**
 * Current calendar month (up to the anchor date) against the previous one.
 * Only non-returned transactions count. An empty window reports zeros.
 */
export function getMonthOverMonth(
  context: InsightsContext
): Result<ToolResult<MonthOverMonthPayload>, InsightsError> {
  const { snapshot, anchor } = context;
  const kept = snapshot.transactions().filter((row) => !row.isReturned);

  const currentStats = summarizeRows(
    kept.filter((row) => isWithin(row.transactionDate, anchor.currentMonth))
  );
  const previousStats = summarizeRows(
    kept.filter((row) => isWithin(row.transactionDate, anchor.previousMonth))
  );

  const current = toPeriodMetrics('current_month', anchor.currentMonth, currentStats);
  const previous = toPeriodMetrics('previous_month', anchor.previousMonth, previousStats);

  const revenueChange = toPercent(percentChange(currentStats.revenue, previousStats.revenue));
  const transactionChange = toPercent(
    percentChange(currentStats.transactionCount, previousStats.transactionCount)
  );
  const trend = classifyMonthOverMonth(revenueChange);
  const direction = revenueChange > 0 ? 'up' : revenueChange < 0 ? 'down' : 'flat';

  return ok({
    summary:
      `Revenue is ${direction} ${formatPercent(Math.abs(revenueChange))} month-over-month. ` +
      `Current month: ${formatMoney(current.revenue)} (${formatCount(current.transaction_count)} transactions). ` +
      `Previous month: ${formatMoney(previous.revenue)} (${formatCount(previous.transaction_count)} transactions). ` +
      `Trend: ${trend}.`,
    payload: {
      current_period: current,
      previous_period: previous,
      revenue_change_percent: revenueChange,
      transaction_change_percent: transactionChange,
      trend,
    },
    metadata: buildMetadata(anchor, {
      start: anchor.previousMonth.start,
      end: anchor.currentMonth.end,
      recordCount: current.transaction_count + previous.transaction_count,
    }),
  });
}
