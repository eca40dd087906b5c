/**
 * Rank Entities Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { assignRanks } from '../scoring.js';
import { clampLimit, optionalFilter, parseRankMetric, parseRankOrder } from '../validation.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { RankedEntity, RankQuery } from '../types.js';

export interface RankEntitiesDeps {
  fiscalRepo: FiscalRepository;
}

export interface RankEntitiesInput {
  metric?: string | undefined;
  order?: string | undefined;
  entityType?: string | undefined;
  county?: string | undefined;
  limit?: number | undefined;
}

export interface Rankings {
  query: RankQuery;
  rankings: RankedEntity[];
}

/**
 * Ranks entities by population, EAV or total employees. Ties share a rank.
 */
export async function rankEntities(
  deps: RankEntitiesDeps,
  input: RankEntitiesInput
): Promise<Result<Rankings, FiscalError>> {
  const metricResult = parseRankMetric(input.metric);
  if (metricResult.isErr()) {
    return err(metricResult.error);
  }

  const orderResult = parseRankOrder(input.order);
  if (orderResult.isErr()) {
    return err(orderResult.error);
  }

  const entityType = optionalFilter(input.entityType);
  const county = optionalFilter(input.county);
  const query: RankQuery = {
    metric: metricResult.value,
    order: orderResult.value,
    limit: clampLimit(input.limit),
    ...(entityType !== undefined && { entityType }),
    ...(county !== undefined && { county }),
  };

  const result = await deps.fiscalRepo.rankEntities(query);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ query, rankings: assignRanks(result.value) });
}
