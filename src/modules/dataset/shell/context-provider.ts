import { ok, ResultAsync, type Result } from 'neverthrow';

import { readError } from '../core/errors.js';

import type { InsightsContext } from '../core/context.js';
import type { DatasetLoadError } from '../core/errors.js';
import type { ContextLoader, ContextProvider } from '../core/ports.js';
import type { Logger } from 'pino';

export interface ContextProviderDeps {
  load: ContextLoader;
  logger: Logger;
  /** Where the loader reads from; names the source when the loader rejects */
  source?: string;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates the one-time-init holder for the shared analytics context.
 *
 * The first `get()` starts the load; callers arriving while it is in flight
 * await the same promise, so the tables are parsed once. A failed load is
 * dropped so the next call retries, including a loader that rejects.
 */
export const createContextProvider = (deps: ContextProviderDeps): ContextProvider => {
  const log = deps.logger.child({ component: 'ContextProvider' });

  let context: InsightsContext | null = null;
  let pending: Promise<Result<InsightsContext, DatasetLoadError>> | null = null;

  const loadOnce = async (): Promise<Result<InsightsContext, DatasetLoadError>> => {
    const startTime = Date.now();
    log.info('Loading dataset');

    const result = await ResultAsync.fromPromise(
      Promise.resolve().then(deps.load),
      (error) => readError(deps.source ?? 'dataset', errorMessage(error))
    ).andThen((loaded) => loaded);
    const durationMs = Date.now() - startTime;

    if (result.isOk()) {
      const { snapshot, anchor } = result.value;
      log.info(
        {
          transactions: snapshot.transactionCount,
          customers: snapshot.customerCount,
          dataStart: anchor.dataStart,
          dataEnd: anchor.dataEnd,
          durationMs,
        },
        'Dataset loaded'
      );
    } else {
      log.error({ error: result.error, durationMs }, 'Dataset load failed');
    }

    return result;
  };

  return {
    async get() {
      if (context !== null) {
        return ok(context);
      }

      pending ??= loadOnce();
      const inFlight = pending;
      const result = await inFlight;

      // A reset() during the load detaches this promise from the provider
      if (pending === inFlight) {
        if (result.isOk()) {
          context = result.value;
        } else {
          pending = null;
        }
      }

      return result;
    },

    reset() {
      context = null;
      pending = null;
    },

    isLoaded() {
      return context !== null;
    },
  };
};
