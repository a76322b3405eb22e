import { computeDateAnchor, type DateAnchor } from './date-anchor.js';
import { createSnapshot, type DatasetSnapshot } from './snapshot.js';

import type { DatasetLoadError } from './errors.js';
import type { DatasetTables } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Everything an analytics operation reads. Built once, never mutated, and
 * passed explicitly into every call.
 */
export interface InsightsContext {
  readonly snapshot: DatasetSnapshot;
  readonly anchor: DateAnchor;
}

export const createInsightsContext = (
  tables: DatasetTables
): Result<InsightsContext, DatasetLoadError> =>
  computeDateAnchor(tables.transactions).map((anchor) =>
    Object.freeze({ snapshot: createSnapshot(tables), anchor })
  );
