import { err, ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy, summarizeRows } from '../grouping.js';
import {
  ZERO,
  formatCount,
  formatMoney,
  formatPercent,
  percentOf,
  safeDivide,
  toMoney,
  toPercent,
  toRatio,
} from '../numbers.js';
import { REGION_VOCABULARY, validateOptionalMember } from '../validation.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { SegmentComparisonInput } from '../schemas/tools.js';
import type { SegmentComparisonPayload, SegmentMetrics, ToolResult } from '../types.js';

/**
 * Cohort comparison across customer segments (new, regular, vip).
 */
export function getSegmentComparison(
  context: InsightsContext,
  input: SegmentComparisonInput
): Result<ToolResult<SegmentComparisonPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  const region = validateOptionalMember(input.region, REGION_VOCABULARY);
  if (region.isErr()) return err(region.error);

  const rows = snapshot
    .merged()
    .filter((row) => region.value === undefined || row.region === region.value);

  if (rows.length === 0) {
    return err(noDataError('No data found matching the specified filters.'));
  }

  const groups = [...groupRows(rows, (row) => row.segment)].map(([segment, members]) => {
    const stats = summarizeRows(members);
    return { segment, stats, average: safeDivide(stats.revenue, stats.keptCount) };
  });

  if (groups.length === 0) {
    return err(
      noDataError('No transactions could be matched to a customer segment.', [
        'Check that every transaction references a known customer',
      ])
    );
  }

  const totalRevenue = groups.reduce((total, group) => total.plus(group.stats.revenue), ZERO);
  const totalCustomers = groups.reduce((total, group) => total + group.stats.uniqueCustomers, 0);

  const data: SegmentMetrics[] = rankBy(
    groups,
    (group) => group.stats.revenue,
    (group) => group.segment
  ).map(({ segment, stats, average }) => ({
    segment,
    total_revenue: toMoney(stats.revenue),
    customer_count: stats.uniqueCustomers,
    transaction_count: stats.transactionCount,
    avg_transaction_value: toMoney(average),
    avg_transactions_per_customer: toRatio(safeDivide(stats.transactionCount, stats.uniqueCustomers)),
    return_rate_percent: toPercent(percentOf(stats.returnedCount, stats.transactionCount)),
    percentage_of_revenue: toPercent(percentOf(stats.revenue, totalRevenue)),
  }));

  const [highestAverage] = rankBy(
    groups,
    (group) => group.average,
    (group) => group.segment
  );

  const top = data[0];
  if (top === undefined || highestAverage === undefined) {
    return err(emptyGroupError('Segment comparison'));
  }

  return ok({
    summary:
      `${top.segment.toUpperCase()} customers lead in total revenue with ${formatMoney(top.total_revenue)} ` +
      `(${formatPercent(top.percentage_of_revenue)} of total). ` +
      `${highestAverage.segment.toUpperCase()} segment has the highest average transaction ` +
      `(${formatMoney(toMoney(highestAverage.average))}). ` +
      `Total customers: ${formatCount(totalCustomers)}.`,
    payload: {
      data,
      top_segment_by_revenue: top.segment,
      top_segment_by_avg_value: highestAverage.segment,
      total_customers: totalCustomers,
    },
    metadata: buildMetadata(anchor, {
      filters: { region: region.value },
      recordCount: rows.length,
    }),
  });
}
