/**
 * Data source health checker
 *
 * Runs `SELECT 1` against the active backend under a timeout.
 */

import { sql } from 'kysely';

import { withQueryTimeout } from '../../../../infra/database/timeout.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { FiscalDataSource } from '@/infra/database/client.js';

/** Default timeout for the check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this source in health check results */
  name: string;
  timeoutMs?: number;
}

/**
 * @example
 * ```typescript
 * const checker = makeDbHealthChecker(source, { name: 'file' });
 * await checker();
 * // { name: 'file', status: 'healthy', latencyMs: 1 }
 * ```
 */
export const makeDbHealthChecker = (
  source: Pick<FiscalDataSource, 'db'>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      await withQueryTimeout(sql`select 1`.execute(source.db), timeoutMs, 'healthCheck');

      return {
        name,
        status: 'healthy',
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
      };
    }
  };
};
