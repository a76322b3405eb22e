import type { HealthCheckResult } from './types.js';

/**
 * A readiness probe for one dependency. Rejections count as critical failures.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
