import { err, ok, type Result } from 'neverthrow';

import { isWithin, type InsightsContext } from '../../../dataset/index.js';
import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy } from '../grouping.js';
import {
  capitalize,
  formatMoney,
  formatPercent,
  percentOf,
  pluralize,
  safeDivide,
  sumAmounts,
  toMoney,
  toPercent,
} from '../numbers.js';
import {
  CATEGORY_VOCABULARY,
  validateDateOrder,
  validateOptionalDate,
  validateOptionalMembers,
} from '../validation.js';

import type { RevenueByCategoryInput } from '../schemas/tools.js';
import type { CategoryRevenue, RevenueByCategoryPayload, ToolResult } from '../types.js';

/**
 * Revenue per product category over an optional date range and category
 * allow-list. Returned transactions are excluded.
 */
export function getRevenueByCategory(
  context: InsightsContext,
  input: RevenueByCategoryInput
): Result<ToolResult<RevenueByCategoryPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  // ─────────────────────────────────────────────────────────────────────────
  // Validate
  // ─────────────────────────────────────────────────────────────────────────

  const startDate = validateOptionalDate(input.start_date, 'start_date', '2024-01-01');
  if (startDate.isErr()) return err(startDate.error);

  const endDate = validateOptionalDate(input.end_date, 'end_date', '2024-12-31');
  if (endDate.isErr()) return err(endDate.error);

  const order = validateDateOrder(startDate.value, endDate.value);
  if (order.isErr()) return err(order.error);

  const categories = validateOptionalMembers(input.categories, CATEGORY_VOCABULARY);
  if (categories.isErr()) return err(categories.error);

  // ─────────────────────────────────────────────────────────────────────────
  // Filter
  // ─────────────────────────────────────────────────────────────────────────

  const window = {
    start: startDate.value ?? anchor.dataStart,
    end: endDate.value ?? anchor.dataEnd,
  };
  const allowed = categories.value === undefined ? null : new Set(categories.value);

  const rows = snapshot
    .transactions()
    .filter(
      (row) =>
        !row.isReturned &&
        isWithin(row.transactionDate, window) &&
        (allowed === null || allowed.has(row.category))
    );

  if (rows.length === 0) {
    return err(
      noDataError('No transactions found matching the specified filters.', [
        'Try a broader date range',
        'Check category spelling',
        'Use explain_capabilities to see valid options',
      ])
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Aggregate
  // ─────────────────────────────────────────────────────────────────────────

  const total = sumAmounts(rows);
  const groups = [...groupRows(rows, (row) => row.category)].map(([category, members]) => ({
    category,
    revenue: sumAmounts(members),
    count: members.length,
  }));

  const data: CategoryRevenue[] = rankBy(
    groups,
    (group) => group.revenue,
    (group) => group.category
  ).map((group) => ({
    category: group.category,
    total_revenue: toMoney(group.revenue),
    transaction_count: group.count,
    avg_transaction_value: toMoney(safeDivide(group.revenue, group.count)),
    percentage_of_total: toPercent(percentOf(group.revenue, total)),
  }));

  const top = data[0];
  if (top === undefined) return err(emptyGroupError('Revenue by category'));

  const totalRevenue = toMoney(total);

  return ok({
    summary:
      `Total revenue of ${formatMoney(totalRevenue)} across ${pluralize(data.length, 'category', 'categories')}. ` +
      `${capitalize(top.category)} is the top performer with ${formatMoney(top.total_revenue)} ` +
      `(${formatPercent(top.percentage_of_total)} of total).`,
    payload: {
      data,
      total_revenue: totalRevenue,
      top_category: top.category,
    },
    metadata: buildMetadata(anchor, {
      start: startDate.value,
      end: endDate.value,
      filters: { categories: categories.value },
      recordCount: rows.length,
    }),
  });
}
