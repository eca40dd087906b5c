/**
 * Fiscal Module REST Routes
 *
 * - GET /api/v1/health, /api/v1/tables
 * - GET /api/v1/entities/search | compare | rank
 * - GET /api/v1/entities/{code}[/revenues|/expenditures|/fund-balances|/debt|/pensions|/fiscal-health|/peers]
 * - GET /api/v1/counties/{county}/entities | summary
 */

import {
  CompareQuerySchema,
  CountyEntitiesQuerySchema,
  CountyParamsSchema,
  EntityPathParamsSchema,
  EntityResourceQuerySchema,
  RankQuerySchema,
  SearchQuerySchema,
  type CompareQuery,
  type CountyEntitiesQuery,
  type CountyParams,
  type EntityPathParams,
  type EntityResourceQuery,
  type RankQuery,
  type SearchQuery,
} from './schemas.js';

import type { FiscalFacade } from '../facade/fiscal-facade.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeFiscalRoutesDeps {
  facade: FiscalFacade;
}

export const ENTITY_RESOURCES = [
  'revenues',
  'expenditures',
  'fund-balances',
  'debt',
  'pensions',
  'fiscal-health',
  'peers',
] as const;

export type EntityResource = (typeof ENTITY_RESOURCES)[number];

export interface EntityPath {
  code: string;
  resource: EntityResource | null;
}

const isEntityResource = (segment: string): segment is EntityResource =>
  ENTITY_RESOURCES.some((resource) => resource === segment);

/**
 * Splits `016/020/32/revenues` into the code and the sub-resource. A path
 * whose last segment is not a known resource is taken whole as a code.
 */
export const parseEntityPath = (path: string): EntityPath => {
  const trimmed = path.replace(/\/+$/, '');
  const slash = trimmed.lastIndexOf('/');
  const last = trimmed.slice(slash + 1);

  if (slash > 0 && isEntityResource(last)) {
    return { code: trimmed.slice(0, slash), resource: last };
  }
  return { code: trimmed, resource: null };
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeFiscalRoutes = (deps: MakeFiscalRoutesDeps): FastifyPluginAsync => {
  const { facade } = deps;

  return async (fastify) => {
    fastify.get('/api/v1/health', async (_request, reply) => {
      const response = facade.health();
      return reply.status(response.httpStatus).send(response.body);
    });

    fastify.get('/api/v1/tables', async (_request, reply) => {
      const response = facade.tables();
      return reply.status(response.httpStatus).send(response.body);
    });

    // ─────────────────────────────────────────────────────────────────────────
    // Entity collection routes (registered before the wildcard; static wins)
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Querystring: SearchQuery }>(
      '/api/v1/entities/search',
      { schema: { querystring: SearchQuerySchema } },
      async (request, reply) => {
        const { q, limit } = request.query;
        const response = await facade.search({ term: q, limit });
        return reply.status(response.httpStatus).send(response.body);
      }
    );

    fastify.get<{ Querystring: CompareQuery }>(
      '/api/v1/entities/compare',
      { schema: { querystring: CompareQuerySchema } },
      async (request, reply) => {
        const response = await facade.compare({ codes: request.query.codes });
        return reply.status(response.httpStatus).send(response.body);
      }
    );

    fastify.get<{ Querystring: RankQuery }>(
      '/api/v1/entities/rank',
      { schema: { querystring: RankQuerySchema } },
      async (request, reply) => {
        const { metric, entity_type, county, order, limit } = request.query;
        const response = await facade.rank({
          metric,
          entityType: entity_type,
          county,
          order,
          limit,
        });
        return reply.status(response.httpStatus).send(response.body);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Single entity and its sub-resources
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: EntityPathParams; Querystring: EntityResourceQuery }>(
      '/api/v1/entities/*',
      { schema: { params: EntityPathParamsSchema, querystring: EntityResourceQuerySchema } },
      async (request, reply) => {
        const { code, resource } = parseEntityPath(request.params['*']);
        const response = await (() => {
          switch (resource) {
            case null:
              return facade.entity(code);
            case 'revenues':
              return facade.revenues(code);
            case 'expenditures':
              return facade.expenditures(code);
            case 'fund-balances':
              return facade.fundBalances(code);
            case 'debt':
              return facade.debt(code);
            case 'pensions':
              return facade.pensions(code);
            case 'fiscal-health':
              return facade.fiscalHealth(code);
            case 'peers': {
              const { range_pct, same_type, limit } = request.query;
              return facade.peers({ code, rangePct: range_pct, sameType: same_type, limit });
            }
          }
        })();
        return reply.status(response.httpStatus).send(response.body);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Counties
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: CountyParams; Querystring: CountyEntitiesQuery }>(
      '/api/v1/counties/:county/entities',
      { schema: { params: CountyParamsSchema, querystring: CountyEntitiesQuerySchema } },
      async (request, reply) => {
        const response = await facade.countyEntities({
          county: request.params.county,
          entityType: request.query.entity_type,
        });
        return reply.status(response.httpStatus).send(response.body);
      }
    );

    fastify.get<{ Params: CountyParams }>(
      '/api/v1/counties/:county/summary',
      { schema: { params: CountyParamsSchema } },
      async (request, reply) => {
        const response = await facade.countySummary(request.params.county);
        return reply.status(response.httpStatus).send(response.body);
      }
    );
  };
};
