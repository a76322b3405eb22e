/**
 * Dataset readiness checker
 *
 * Nothing can be answered until both tables have loaded, so this check is
 * critical. Asking the provider triggers the load if it has not run yet.
 */

import type { ContextProvider } from '../../../dataset/index.js';
import type { HealthChecker } from '../../core/ports.js';

export interface DatasetHealthCheckerOptions {
  /** Name reported in readiness results (default: 'dataset') */
  name?: string;
}

export const makeDatasetHealthChecker = (
  provider: ContextProvider,
  options: DatasetHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'dataset' } = options;

  return async () => {
    const startTime = Date.now();
    const context = await provider.get();
    const latencyMs = Date.now() - startTime;

    if (context.isErr()) {
      return {
        name,
        status: 'unhealthy',
        message: context.error.message,
        latencyMs,
        critical: true,
      };
    }

    const { snapshot, anchor } = context.value;
    return {
      name,
      status: 'healthy',
      message: `${String(snapshot.transactionCount)} transactions through ${anchor.dataEnd}`,
      latencyMs,
      critical: true,
    };
  };
};
