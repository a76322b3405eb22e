import type { InsightsContext } from './context.js';
import type { DatasetLoadError } from './errors.js';
import type { Result } from 'neverthrow';

/**
 * Produces a fully validated context (reads and parses the tables).
 */
export type ContextLoader = () => Promise<Result<InsightsContext, DatasetLoadError>>;

/**
 * One-time-init access to the shared context.
 */
export interface ContextProvider {
  /** Loads on first call; concurrent first callers share one load. Failures are not cached. */
  get(): Promise<Result<InsightsContext, DatasetLoadError>>;
  /** Drops the cached context so the next `get()` loads again */
  reset(): void;
  isLoaded(): boolean;
}
