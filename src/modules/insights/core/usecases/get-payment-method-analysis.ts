import { err, ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy, summarizeRows } from '../grouping.js';
import {
  formatMoney,
  formatPercent,
  humanize,
  percentOf,
  safeDivide,
  toMoney,
  toPercent,
} from '../numbers.js';
import { CATEGORY_VOCABULARY, REGION_VOCABULARY, validateOptionalMember } from '../validation.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { PaymentMethodInput } from '../schemas/tools.js';
import type { PaymentMethodMetrics, PaymentMethodPayload, ToolResult } from '../types.js';

/**
 * Transaction patterns per payment method. Counts include returns; revenue
 * and average value do not.
 */
export function getPaymentMethodAnalysis(
  context: InsightsContext,
  input: PaymentMethodInput
): Result<ToolResult<PaymentMethodPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  const category = validateOptionalMember(input.category, CATEGORY_VOCABULARY);
  if (category.isErr()) return err(category.error);

  const region = validateOptionalMember(input.region, REGION_VOCABULARY);
  if (region.isErr()) return err(region.error);

  const rows = snapshot
    .merged()
    .filter(
      (row) =>
        (category.value === undefined || row.category === category.value) &&
        (region.value === undefined || row.region === region.value)
    );

  if (rows.length === 0) {
    return err(noDataError('No transactions found matching the specified filters.'));
  }

  const groups = [...groupRows(rows, (row) => row.paymentMethod)].map(([method, members]) => {
    const stats = summarizeRows(members);
    return { method, stats, average: safeDivide(stats.revenue, stats.keptCount) };
  });

  const data: PaymentMethodMetrics[] = rankBy(
    groups,
    (group) => group.stats.transactionCount,
    (group) => group.method
  ).map(({ method, stats, average }) => ({
    payment_method: method,
    transaction_count: stats.transactionCount,
    returned_count: stats.returnedCount,
    total_revenue: toMoney(stats.revenue),
    avg_transaction_value: toMoney(average),
    percentage_of_transactions: toPercent(percentOf(stats.transactionCount, rows.length)),
    return_rate_percent: toPercent(percentOf(stats.returnedCount, stats.transactionCount)),
  }));

  const [highestAverage] = rankBy(
    groups,
    (group) => group.average,
    (group) => group.method
  );

  const top = data[0];
  if (top === undefined || highestAverage === undefined) {
    return err(emptyGroupError('Payment method analysis'));
  }

  const totalRevenue = toMoney(summarizeRows(rows).revenue);

  return ok({
    summary:
      `Most popular payment method is ${humanize(top.payment_method)} ` +
      `with ${formatPercent(top.percentage_of_transactions)} of transactions. ` +
      `Highest average order value: ${humanize(highestAverage.method)} ` +
      `(${formatMoney(toMoney(highestAverage.average))}). ` +
      `Total revenue: ${formatMoney(totalRevenue)}.`,
    payload: {
      data,
      total_revenue: totalRevenue,
      most_popular_method: top.payment_method,
      highest_avg_value_method: highestAverage.method,
    },
    metadata: buildMetadata(anchor, {
      filters: { category: category.value, region: region.value },
      recordCount: rows.length,
    }),
  });
}
