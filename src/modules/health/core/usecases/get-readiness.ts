import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (settled: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  settled.status === 'fulfilled'
    ? settled.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: settled.reason instanceof Error ? settled.reason.message : 'Check failed',
        critical: true,
      };

/**
 * unhealthy: a critical check failed (critical unless marked false)
 * degraded:  only non-critical checks failed
 */
export const overallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'unhealthy');
  if (failed.length === 0) return 'ok';
  return failed.some((check) => check.critical !== false) ? 'unhealthy' : 'degraded';
};

/**
 * Runs every checker in parallel and folds the results into one response.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
