/**
 * Fiscal Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_LIMIT } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shared
// ─────────────────────────────────────────────────────────────────────────────

// Out-of-range limits are clamped rather than rejected
const LimitSchema = Type.Optional(
  Type.Integer({ description: `Maximum number of results (clamped to 1-${String(MAX_LIMIT)})` })
);

// ─────────────────────────────────────────────────────────────────────────────
// Querystrings
// ─────────────────────────────────────────────────────────────────────────────

export const SearchQuerySchema = Type.Object({
  q: Type.Optional(Type.String({ description: 'Name or county fragment, at least 2 characters' })),
  limit: LimitSchema,
});

export type SearchQuery = Static<typeof SearchQuerySchema>;

export const CompareQuerySchema = Type.Object({
  codes: Type.Optional(Type.String({ description: 'Comma-separated entity codes (2-10)' })),
});

export type CompareQuery = Static<typeof CompareQuerySchema>;

export const RankQuerySchema = Type.Object({
  metric: Type.Optional(Type.String({ description: 'population, eav or employees' })),
  entity_type: Type.Optional(Type.String()),
  county: Type.Optional(Type.String()),
  order: Type.Optional(Type.String({ description: 'top or bottom' })),
  limit: LimitSchema,
});

export type RankQuery = Static<typeof RankQuerySchema>;

/**
 * Query parameters of the entity sub-resources; only `peers` reads them.
 */
export const EntityResourceQuerySchema = Type.Object({
  range_pct: Type.Optional(Type.Number({ description: 'Population window, e.g. 0.25 for ±25%' })),
  same_type: Type.Optional(Type.Boolean()),
  limit: LimitSchema,
});

export type EntityResourceQuery = Static<typeof EntityResourceQuerySchema>;

export const CountyEntitiesQuerySchema = Type.Object({
  entity_type: Type.Optional(Type.String()),
});

export type CountyEntitiesQuery = Static<typeof CountyEntitiesQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Params
// ─────────────────────────────────────────────────────────────────────────────

export const CountyParamsSchema = Type.Object({
  county: Type.String({ minLength: 1 }),
});

export type CountyParams = Static<typeof CountyParamsSchema>;

/**
 * Entity codes contain '/', so entity routes capture the rest of the path.
 */
export const EntityPathParamsSchema = Type.Object({
  '*': Type.String(),
});

export type EntityPathParams = Static<typeof EntityPathParamsSchema>;
