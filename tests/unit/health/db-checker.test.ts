/**
 * Unit tests for the data source health checker
 *
 * Runs against an in-memory file database; timing is only checked loosely.
 */

import { Kysely, SqliteDialect } from 'kysely';
import Database from 'better-sqlite3';
import { describe, it, expect } from 'vitest';

import { makeDbHealthChecker } from '@/modules/health/shell/checkers/db-checker.js';

import type { FiscalDatabase } from '@/infra/database/client.js';

const openMemoryDb = (): Kysely<FiscalDatabase> =>
  new Kysely<FiscalDatabase>({
    dialect: new SqliteDialect({ database: new Database(':memory:') }),
  });

describe('makeDbHealthChecker', () => {
  it('returns healthy when the check query succeeds', async () => {
    const db = openMemoryDb();
    const checker = makeDbHealthChecker({ db }, { name: 'file' });

    const result = await checker();
    await db.destroy();

    expect(result.name).toBe('file');
    expect(result.status).toBe('healthy');
    expect(result.message).toBeUndefined();
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('returns unhealthy with the driver message once the source is closed', async () => {
    const db = openMemoryDb();
    await db.destroy();
    const checker = makeDbHealthChecker({ db }, { name: 'warehouse' });

    const result = await checker();

    expect(result.name).toBe('warehouse');
    expect(result.status).toBe('unhealthy');
    expect(result.message).toEqual(expect.any(String));
  });
});
