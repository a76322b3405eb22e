import { err, ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy, summarizeRows } from '../grouping.js';
import {
  capitalize,
  formatCount,
  formatMoney,
  formatPercent,
  percentOf,
  safeDivide,
  toMoney,
  toPercent,
} from '../numbers.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { RegionComparisonPayload, RegionMetrics, ToolResult } from '../types.js';

/**
 * Business performance per customer region.
 *
 * Average transaction value is revenue over non-returned transactions; a
 * region whose transactions were all returned reports 0.
 */
export function compareRegions(
  context: InsightsContext
): Result<ToolResult<RegionComparisonPayload>, InsightsError> {
  const { snapshot, anchor } = context;
  const rows = snapshot.merged();

  const groups = [...groupRows(rows, (row) => row.region)].map(([region, members]) => {
    const stats = summarizeRows(members);
    return {
      region,
      stats,
      average: safeDivide(stats.revenue, stats.keptCount),
      returnRate: percentOf(stats.returnedCount, stats.transactionCount),
    };
  });

  if (groups.length === 0) {
    return err(
      noDataError('No transactions could be matched to a customer region.', [
        'Check that every transaction references a known customer',
      ])
    );
  }

  const byRevenue = rankBy(
    groups,
    (group) => group.stats.revenue,
    (group) => group.region
  );
  const [topByCustomers] = rankBy(
    groups,
    (group) => group.stats.uniqueCustomers,
    (group) => group.region
  );
  const [lowestReturns] = rankBy(
    groups,
    (group) => group.returnRate,
    (group) => group.region,
    'asc'
  );

  const data: RegionMetrics[] = byRevenue.map(({ region, stats, average, returnRate }) => ({
    region,
    total_revenue: toMoney(stats.revenue),
    customer_count: stats.uniqueCustomers,
    transaction_count: stats.transactionCount,
    avg_transaction_value: toMoney(average),
    return_rate_percent: toPercent(returnRate),
  }));

  const top = data[0];
  if (top === undefined || topByCustomers === undefined || lowestReturns === undefined) {
    return err(emptyGroupError('Regional comparison'));
  }

  return ok({
    summary:
      `${capitalize(top.region)} leads in revenue with ${formatMoney(top.total_revenue)}. ` +
      `${capitalize(topByCustomers.region)} has the most customers ` +
      `(${formatCount(topByCustomers.stats.uniqueCustomers)}). ` +
      `Lowest return rate: ${capitalize(lowestReturns.region)} ` +
      `(${formatPercent(toPercent(lowestReturns.returnRate))}).`,
    payload: {
      data,
      top_region_by_revenue: top.region,
      top_region_by_customers: topByCustomers.region,
      lowest_return_rate_region: lowestReturns.region,
    },
    metadata: buildMetadata(anchor, { recordCount: rows.length }),
  });
}
