/**
 * Integration tests for the fiscal REST API over a seeded file database.
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { createLogger } from '@/infra/logger/index.js';
import { createTimeoutError } from '@/modules/fiscal/core/errors.js';
import { makeFiscalRepo } from '@/modules/fiscal/shell/repo/fiscal-repo.js';

import { makeFakeFiscalRepo } from '../fixtures/fakes.js';
import { createSeededFileSource } from '../fixtures/fiscal-db.js';

import type { FiscalDataSource } from '@/infra/database/client.js';
import type { FastifyInstance } from 'fastify';

const NOW = new Date('2024-01-01T00:00:00.000Z');

describe('Fiscal REST API', () => {
  let source: FiscalDataSource;
  let app: FastifyInstance;

  beforeAll(async () => {
    source = await createSeededFileSource();
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        fiscalRepo: makeFiscalRepo(source),
        dataSource: { kind: source.kind, location: source.location },
        connectionTested: true,
        logger: createLogger({ level: 'silent' }),
      },
      version: '1.0.0-test',
      now: () => NOW,
    });
  });

  afterAll(async () => {
    await app.close();
    await source.destroy();
  });

  const get = (url: string) => app.inject({ method: 'GET', url });

  describe('GET /api/v1/health', () => {
    it('reports the data source', async () => {
      const response = await get('/api/v1/health');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'healthy',
        data_source: 'file',
        database_path: ':memory:',
        connection_tested: true,
        version: '1.0.0-test',
        timestamp: '2024-01-01T00:00:00.000Z',
      });
    });
  });

  describe('GET /api/v1/tables', () => {
    it('lists the seven fiscal tables', async () => {
      const response = await get('/api/v1/tables');

      expect(response.statusCode).toBe(200);
      expect(response.json().tables).toHaveLength(7);
    });
  });

  describe('GET /api/v1/entities/search', () => {
    it('returns matches', async () => {
      const response = await get('/api/v1/entities/search?q=Skokie');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'success',
        count: 1,
        entities: [
          { Code: '016/020/32', UnitName: 'Village of Skokie', EntityType: 'Village', County: 'Cook' },
        ],
      });
    });

    it('returns not_found when nothing matches', async () => {
      const response = await get('/api/v1/entities/search?q=zz-no-such-place');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'not_found',
        message: "No entities found matching 'zz-no-such-place'",
      });
    });

    it('returns 400 for a short term', async () => {
      const response = await get('/api/v1/entities/search?q=a');

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        status: 'error',
        error_message: 'Search term must be at least 2 characters',
      });
    });

    it('returns 400 for a non-numeric limit', async () => {
      const response = await get('/api/v1/entities/search?q=Skokie&limit=abc');

      expect(response.statusCode).toBe(400);
      expect(response.json().status).toBe('error');
      expect(response.json().error_message).toMatch(/^Invalid request: /);
    });
  });

  describe('GET /api/v1/entities/:code', () => {
    it('returns the entity', async () => {
      const response = await get('/api/v1/entities/016/020/32');

      expect(response.statusCode).toBe(200);
      expect(response.json().entity).toMatchObject({
        Code: '016/020/32',
        UnitName: 'Village of Skokie',
        Population: 1000,
      });
    });

    it('returns 404 for an unknown code', async () => {
      const response = await get('/api/v1/entities/999/999/99');

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        status: 'error',
        error_message: "Entity with code '999/999/99' not found",
      });
    });

    it('returns 400 for a malformed code', async () => {
      const response = await get('/api/v1/entities/016/020');

      expect(response.statusCode).toBe(400);
      expect(response.json().error_message).toBe(
        "Invalid entity code '016/020': expected three segments separated by '/', e.g. 016/020/32"
      );
    });

    it('treats an unknown sub-resource as part of the code', async () => {
      const response = await get('/api/v1/entities/016/020/32/budget');

      expect(response.statusCode).toBe(400);
    });
  });

  describe('entity sub-resources', () => {
    it('returns revenues by category', async () => {
      const response = await get('/api/v1/entities/016/020/32/revenues');
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.total_revenue).toBe(1555.75);
      expect(body.by_category).toHaveLength(3);
      expect(body.fund_type_legend.GN).toBe('General Fund');
    });

    it('returns expenditures by category', async () => {
      const response = await get('/api/v1/entities/016/020/32/expenditures');

      expect(response.json().total_expenditure).toBe(1400);
    });

    it('returns fund balances', async () => {
      const response = await get('/api/v1/entities/016/020/32/fund-balances');

      expect(response.statusCode).toBe(200);
      expect(response.json().fund_balances).toHaveLength(2);
    });

    it('accepts a trailing slash', async () => {
      const response = await get('/api/v1/entities/016/020/32/debt/');

      expect(response.statusCode).toBe(200);
      expect(response.json().total_debt).toBe(2_000_000);
    });

    it('returns pension systems', async () => {
      const response = await get('/api/v1/entities/016/020/32/pensions');

      expect(Object.keys(response.json().pension_systems)).toEqual(['IMRF', 'Police']);
    });

    it('scores fiscal health', async () => {
      const response = await get('/api/v1/entities/016/020/32/fiscal-health');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'success',
        entity_code: '016/020/32',
        entity_name: 'Village of Skokie',
        metrics: {
          operating_margin: { value: 10.01, unit: 'percent', rating: 'Excellent' },
          fund_balance_ratio: { value: 25, unit: 'percent', rating: 'Excellent' },
          debt_per_capita: { value: 2000, unit: 'dollars', rating: 'Moderate' },
          pension_funded_ratio: { value: 50, unit: 'percent', rating: 'Fair' },
        },
        raw_values: {
          total_revenue: 1555.75,
          total_expenditure: 1400,
          unassigned_fund_balance: 350,
          total_debt: 2_000_000,
          population: 1000,
        },
      });
    });

    it.each(['revenues', 'expenditures', 'fund-balances', 'debt', 'pensions', 'fiscal-health'])(
      'returns 404 for %s of an unknown entity',
      async (resource) => {
        const response = await get(`/api/v1/entities/999/999/99/${resource}`);

        expect(response.statusCode).toBe(404);
        expect(response.json()).toEqual({
          status: 'error',
          error_message: "Entity with code '999/999/99' not found",
        });
      }
    );

    it('keeps an empty statement for a known entity without rows', async () => {
      const response = await get('/api/v1/entities/016/030/32/expenditures');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ total_expenditure: 0, by_category: [] });
    });

    it('omits fiscal health indicators without data', async () => {
      const response = await get('/api/v1/entities/022/010/32/fiscal-health');

      expect(response.statusCode).toBe(200);
      expect(response.json().metrics).toEqual({});
    });

    it('finds peers with query options', async () => {
      const response = await get('/api/v1/entities/016/020/32/peers?same_type=false&limit=2');
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.peer_count).toBe(2);
      expect(body.peers.map((peer: { Code: string }) => peer.Code)).toEqual([
        '016/040/30',
        '016/032/32',
      ]);
    });

    it('rejects an out-of-range peer window', async () => {
      const response = await get('/api/v1/entities/016/020/32/peers?range_pct=5');

      expect(response.statusCode).toBe(400);
      expect(response.json().error_message).toBe(
        'range_pct must be a fraction greater than 0 and at most 1'
      );
    });
  });

  describe('GET /api/v1/entities/compare', () => {
    it('compares resolvable codes and reports the rest', async () => {
      const response = await get(
        '/api/v1/entities/compare?codes=016/020/32,999/999/99,016/032/32'
      );
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.entity_count).toBe(2);
      expect(body.unresolved_codes).toEqual(['999/999/99']);
      expect(body.comparison[0]).toMatchObject({
        code: '016/020/32',
        revenue_per_capita: 1.56,
        expenditure_per_capita: 1.4,
      });
      expect(body.comparison[1]).toMatchObject({ code: '016/032/32', total_revenue: 0, eav: null });
    });

    it('returns 400 for a single code', async () => {
      const response = await get('/api/v1/entities/compare?codes=016/020/32');

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/entities/rank', () => {
    it('ranks with shared ranks for ties', async () => {
      const response = await get('/api/v1/entities/rank?county=Kane&limit=3');
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.metric).toBe('population');
      expect(body.filters).toEqual({ entity_type: null, county: 'Kane' });
      expect(
        body.rankings.map((row: { Code: string; Rank: number }) => [row.Code, row.Rank])
      ).toEqual([
        ['045/002/01', 1],
        ['045/004/01', 1],
        ['045/003/01', 3],
      ]);
    });

    it('returns 400 for an unknown metric', async () => {
      const response = await get('/api/v1/entities/rank?metric=budget');

      expect(response.statusCode).toBe(400);
    });
  });

  describe('counties', () => {
    it('lists county entities with a type filter', async () => {
      const response = await get('/api/v1/counties/Cook/entities?entity_type=village');
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.entity_type_filter).toBe('village');
      expect(body.count).toBe(4);
    });

    it('summarizes a county', async () => {
      const response = await get('/api/v1/counties/cook/summary');

      expect(response.statusCode).toBe(200);
      expect(response.json().summary).toMatchObject({ County: 'Cook', EntityCount: 5 });
    });

    it('returns 404 for an unknown county summary', async () => {
      const response = await get('/api/v1/counties/Nowhere/summary');

      expect(response.statusCode).toBe(404);
      expect(response.json().error_message).toBe("County 'Nowhere' not found");
    });
  });

  describe('unknown routes', () => {
    it('returns 404 in the error envelope', async () => {
      const response = await get('/api/v1/nope');

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        status: 'error',
        error_message: 'Route GET /api/v1/nope not found',
      });
    });
  });
});

describe('Fiscal REST API backend failures', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        fiscalRepo: makeFakeFiscalRepo(
          {},
          { failWith: createTimeoutError('getEntity', 'select 1', new Error('Query timeout')) }
        ),
        dataSource: { kind: 'warehouse', location: 'localhost:5432/fiscal' },
        connectionTested: false,
        logger: createLogger({ level: 'silent' }),
      },
      version: '1.0.0-test',
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it('returns 500 with a generic message', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/entities/016/020/32' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      status: 'error',
      error_message: 'An error occurred while querying fiscal data',
    });
  });

  it('still reports liveness with the connection check outcome', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ connection_tested: false, data_source: 'warehouse' });
  });
});
