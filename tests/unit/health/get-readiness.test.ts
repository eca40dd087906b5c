import { describe, it, expect } from 'vitest';

import { getReadiness } from '@/modules/health/core/usecases/get-readiness.js';

import type { HealthChecker } from '@/modules/health/core/ports.js';

describe('getReadiness', () => {
  const timestamp = '2024-01-01T00:00:00Z';
  const uptime = 42;

  it('aggregates healthy checks in checker order', async () => {
    const checkers: HealthChecker[] = [
      async () => ({ name: 'file', status: 'healthy', latencyMs: 1 }),
      async () => ({ name: 'warehouse', status: 'healthy' }),
    ];

    const result = await getReadiness({ checkers, version: '2.0.0' }, { uptime, timestamp });

    expect(result).toEqual({
      status: 'ok',
      timestamp,
      uptime,
      version: '2.0.0',
      checks: [
        { name: 'file', status: 'healthy', latencyMs: 1 },
        { name: 'warehouse', status: 'healthy' },
      ],
    });
  });

  it('omits the version when none is configured', async () => {
    const result = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(result).toEqual({ status: 'ok', timestamp, uptime, checks: [] });
  });

  it('is unhealthy when any source fails', async () => {
    const checkers: HealthChecker[] = [
      async () => ({ name: 'file', status: 'healthy' }),
      async () => ({ name: 'warehouse', status: 'unhealthy', message: 'Connection refused' }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
  });

  it('keeps running the other checkers when one throws', async () => {
    const checkers: HealthChecker[] = [
      async () => {
        throw new Error('database is locked');
      },
      async () => ({ name: 'warehouse', status: 'healthy' }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
    expect(result.checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'database is locked' },
      { name: 'warehouse', status: 'healthy' },
    ]);
  });
});
