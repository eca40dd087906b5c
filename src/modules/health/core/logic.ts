import type { HealthCheckResult, ReadinessStatus } from './types.js';

/**
 * Maps settled checker promises to results. A checker that rejects counts as
 * unhealthy.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    };
  });
};

/**
 * Every checker guards the data source the API answers from, so any
 * unhealthy check makes the service unhealthy (503).
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus =>
  checks.some((c) => c.status === 'unhealthy') ? 'unhealthy' : 'ok';

export const httpStatusForReadiness = (status: ReadinessStatus): number =>
  status === 'unhealthy' ? 503 : 200;
