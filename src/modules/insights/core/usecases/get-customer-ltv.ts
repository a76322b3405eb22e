import { err, ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';
import { emptyGroupError, noDataError, type InsightsError } from '../errors.js';
import { groupRows, rankBy } from '../grouping.js';
import { formatCount, formatMoney, safeDivide, sumAmounts, toMoney } from '../numbers.js';
import {
  REGION_VOCABULARY,
  SEGMENT_VOCABULARY,
  validateIntegerRange,
  validateOptionalMember,
} from '../validation.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { CustomerLtvInput } from '../schemas/tools.js';
import type { CustomerLtv, CustomerLtvPayload, ToolResult } from '../types.js';

export const DEFAULT_TOP_N = 10;
export const MIN_TOP_N = 1;
export const MAX_TOP_N = 50;

/**
 * Customers ranked by lifetime value (total non-returned spend).
 *
 * `average_ltv` and `total_customers_analyzed` describe the whole filtered
 * population, not just the rows returned.
 */
export function getCustomerLtv(
  context: InsightsContext,
  input: CustomerLtvInput
): Result<ToolResult<CustomerLtvPayload>, InsightsError> {
  const { snapshot, anchor } = context;

  const topN = validateIntegerRange(input.top_n ?? DEFAULT_TOP_N, 'top_n', MIN_TOP_N, MAX_TOP_N);
  if (topN.isErr()) return err(topN.error);

  const region = validateOptionalMember(input.region, REGION_VOCABULARY);
  if (region.isErr()) return err(region.error);

  const segment = validateOptionalMember(input.segment, SEGMENT_VOCABULARY);
  if (segment.isErr()) return err(segment.error);

  const rows = snapshot
    .merged()
    .filter(
      (row) =>
        !row.isReturned &&
        (region.value === undefined || row.region === region.value) &&
        (segment.value === undefined || row.segment === segment.value)
    );

  if (rows.length === 0) {
    return err(
      noDataError('No customers found matching the specified filters.', [
        'Try removing filters',
        'Check region/segment spelling',
      ])
    );
  }

  const customers = [...groupRows(rows, (row) => row.customerId)].map(([customerId, members]) => ({
    customerId,
    totalSpent: sumAmounts(members),
    count: members.length,
    region: members[0]?.region ?? null,
    segment: members[0]?.segment ?? null,
  }));

  const ranked = rankBy(
    customers,
    (customer) => customer.totalSpent,
    (customer) => customer.customerId
  );

  const data: CustomerLtv[] = ranked.slice(0, topN.value).map((customer, index) => ({
    customer_id: customer.customerId,
    total_spent: toMoney(customer.totalSpent),
    transaction_count: customer.count,
    avg_transaction_value: toMoney(safeDivide(customer.totalSpent, customer.count)),
    region: customer.region,
    segment: customer.segment,
    rank: index + 1,
  }));

  const top = data[0];
  if (top === undefined) return err(emptyGroupError('Customer lifetime value'));

  const averageLtv = toMoney(safeDivide(sumAmounts(rows), customers.length));

  return ok({
    summary:
      `Top ${formatCount(data.length)} customers by lifetime value. ` +
      `#1 is ${top.customer_id} with ${formatMoney(top.total_spent)} ` +
      `from ${formatCount(top.transaction_count)} transactions. ` +
      `Average LTV across ${formatCount(customers.length)} customers is ${formatMoney(averageLtv)}.`,
    payload: {
      data,
      average_ltv: averageLtv,
      total_customers_analyzed: customers.length,
    },
    metadata: buildMetadata(anchor, {
      filters: { region: region.value, segment: segment.value },
      recordCount: data.length,
    }),
  });
}
