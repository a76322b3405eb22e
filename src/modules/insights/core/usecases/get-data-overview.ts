import { ok, type Result } from 'neverthrow';

import {
  CATEGORIES,
  PAYMENT_METHODS,
  REGIONS,
  SEGMENTS,
  type InsightsContext,
} from '../../../dataset/index.js';
import { buildMetadata } from '../envelope.js';
import { formatCount } from '../numbers.js';

import type { DataOverviewPayload, ToolResult } from '../types.js';

/**
 * Dataset span, row counts and the known vocabularies. Cannot fail.
 */
export function getDataOverview(
  context: InsightsContext
): Result<ToolResult<DataOverviewPayload>, never> {
  const { snapshot, anchor } = context;

  return ok({
    summary:
      `Dataset contains ${formatCount(snapshot.transactionCount)} transactions from ` +
      `${formatCount(snapshot.customerCount)} customers, spanning ${anchor.dataStart} to ${anchor.dataEnd}.`,
    payload: {
      data_start: anchor.dataStart,
      data_end: anchor.dataEnd,
      transaction_count: snapshot.transactionCount,
      customer_count: snapshot.customerCount,
      categories: [...CATEGORIES],
      regions: [...REGIONS],
      segments: [...SEGMENTS],
      payment_methods: [...PAYMENT_METHODS],
    },
    metadata: buildMetadata(anchor, { recordCount: snapshot.transactionCount }),
  });
}
