/**
 * Caller-level query timeout.
 *
 * The file backend runs queries synchronously inside the driver and has no
 * statement timeout, so both backends share this race instead of
 * `SET LOCAL statement_timeout`.
 */

// ============================================================================
// Constants
// ============================================================================

/** Default query timeout in milliseconds (30 seconds) */
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

// ============================================================================
// Timeout Helper
// ============================================================================

/**
 * Raised when a query does not settle within its budget.
 */
export class QueryTimeoutError extends Error {
  override readonly name = 'QueryTimeoutError';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`Query timeout: ${operation} did not finish within ${String(timeoutMs)}ms`);
  }
}

/**
 * Resolves with the query result, or rejects with a QueryTimeoutError once
 * `timeoutMs` elapses. The timer is cleared as soon as the query settles.
 *
 * @example
 * ```typescript
 * const result = await withQueryTimeout(db.executeQuery(compiled), 5_000, 'getEntity');
 * ```
 */
export const withQueryTimeout = async <T>(
  query: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> => {
  const timeout = new Promise<never>((_resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new QueryTimeoutError(operation, timeoutMs));
    }, timeoutMs);

    void query.then(
      () => {
        clearTimeout(timer);
      },
      () => {
        clearTimeout(timer);
      }
    );
  });

  return Promise.race([query, timeout]);
};
