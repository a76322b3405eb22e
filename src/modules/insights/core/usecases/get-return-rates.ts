import { err, ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy, summarizeRows } from '../grouping.js';
import {
  capitalize,
  formatMoney,
  formatPercent,
  percentOf,
  toMoney,
  toPercent,
} from '../numbers.js';
import { CATEGORY_VOCABULARY, validateOptionalMember } from '../validation.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { CategoryFilterInput } from '../schemas/tools.js';
import type { CategoryReturnRate, ReturnRatesPayload, ToolResult } from '../types.js';

/**
 * Return rate and revenue lost per category. This is the one metric that
 * sums the amounts of returned rows.
 */
export function getReturnRates(
  context: InsightsContext,
  input: CategoryFilterInput
): Result<ToolResult<ReturnRatesPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  const category = validateOptionalMember(input.category, CATEGORY_VOCABULARY);
  if (category.isErr()) return err(category.error);

  const rows = snapshot
    .transactions()
    .filter((row) => category.value === undefined || row.category === category.value);

  if (rows.length === 0) {
    return err(noDataError('No transactions found for the selected category.', ['Check category spelling']));
  }

  const groups = [...groupRows(rows, (row) => row.category)].map(([name, members]) => {
    const stats = summarizeRows(members);
    return { category: name, stats, rate: percentOf(stats.returnedCount, stats.transactionCount) };
  });

  const data: CategoryReturnRate[] = rankBy(
    groups,
    (group) => group.rate,
    (group) => group.category
  ).map(({ category: name, stats, rate }) => ({
    category: name,
    total_transactions: stats.transactionCount,
    returned_count: stats.returnedCount,
    return_rate_percent: toPercent(rate),
    revenue_lost_to_returns: toMoney(stats.revenueLost),
  }));

  const top = data[0];
  if (top === undefined) return err(emptyGroupError('Return rates'));

  const overall = summarizeRows(rows);
  const overallRate = toPercent(percentOf(overall.returnedCount, overall.transactionCount));
  const totalLost = toMoney(overall.revenueLost);

  return ok({
    summary:
      `Overall return rate is ${formatPercent(overallRate)}. ` +
      `${capitalize(top.category)} has the highest return rate at ${formatPercent(top.return_rate_percent)}. ` +
      `Total revenue lost to returns: ${formatMoney(totalLost)}.`,
    payload: {
      data,
      overall_return_rate: overallRate,
      highest_return_category: top.category,
      total_revenue_lost: totalLost,
    },
    metadata: buildMetadata(anchor, {
      filters: { category: category.value },
      recordCount: rows.length,
    }),
  });
}
