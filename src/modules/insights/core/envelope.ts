/**
 * Response envelope: the one contract the natural-language layer reads.
 */

import type { InsightsError, InsightsErrorKind } from './errors.js';
import type { FilterValue, ToolMetadata, ToolPayload, ToolResult } from './types.js';
import type { DateAnchor } from '../../dataset/index.js';

export type SuccessEnvelope<P extends ToolPayload = ToolPayload> = {
  ok: true;
  tool_used: string;
  summary: string;
  metadata: ToolMetadata;
} & P;

export type ErrorEnvelope = {
  ok: false;
  error_type: InsightsErrorKind;
  message: string;
  suggestions: string[];
};

export type ToolEnvelope = SuccessEnvelope | ErrorEnvelope;

export const toSuccessEnvelope = <P extends ToolPayload>(
  toolName: string,
  result: ToolResult<P>
): SuccessEnvelope<P> => ({
  ok: true as const,
  tool_used: toolName,
  summary: result.summary,
  ...result.payload,
  metadata: result.metadata,
});

export const toErrorEnvelope = (error: InsightsError): ErrorEnvelope => ({
  ok: false,
  error_type: error.kind,
  message: error.message,
  suggestions: [...error.suggestions],
});

export interface MetadataInput {
  /** Defaults to the dataset span */
  start?: string | undefined;
  end?: string | undefined;
  filters?: Record<string, FilterValue | undefined>;
  recordCount: number;
}

/**
 * Builds `ToolMetadata`, dropping filters that were not supplied.
 */
export const buildMetadata = (anchor: DateAnchor, input: MetadataInput): ToolMetadata => {
  const filters: Record<string, FilterValue> = {};
  for (const [key, value] of Object.entries(input.filters ?? {})) {
    if (value !== undefined) filters[key] = value;
  }

  return {
    date_range_start: input.start ?? anchor.dataStart,
    date_range_end: input.end ?? anchor.dataEnd,
    filters_applied: filters,
    record_count: input.recordCount,
    data_as_of: anchor.dataEnd,
  };
};
