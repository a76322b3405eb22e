import { ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { DateContextPayload, ToolResult } from '../types.js';

/**
 * The anchor dates every relative period is computed from.
 */
export function getDateContext(
  context: InsightsContext
): Result<ToolResult<DateContextPayload>, never> {
  const { anchor } = context;
  const { currentMonth, previousMonth } = anchor;

  return ok({
    summary:
      `Data runs from ${anchor.dataStart} to ${anchor.dataEnd}. ` +
      `The current month is ${currentMonth.start} to ${currentMonth.end}; ` +
      `the previous month is ${previousMonth.start} to ${previousMonth.end}.`,
    payload: {
      data_start: anchor.dataStart,
      data_end: anchor.dataEnd,
      current_month_start: currentMonth.start,
      current_month_end: currentMonth.end,
      prev_month_start: previousMonth.start,
      prev_month_end: previousMonth.end,
    },
    metadata: buildMetadata(anchor, { recordCount: 0 }),
  });
}
