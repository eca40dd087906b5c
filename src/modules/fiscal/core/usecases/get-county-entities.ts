/**
 * Get County Entities Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { optionalFilter, validateCounty } from '../validation.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { CountyEntity } from '../types.js';

export interface GetCountyEntitiesDeps {
  fiscalRepo: FiscalRepository;
}

export interface GetCountyEntitiesInput {
  county: string;
  entityType?: string | undefined;
}

export interface CountyEntities {
  county: string;
  entityType: string | null;
  entities: CountyEntity[];
}

/**
 * Lists every entity in a county, largest population first. A county with no
 * entities yields an empty list.
 */
export async function getCountyEntities(
  deps: GetCountyEntitiesDeps,
  input: GetCountyEntitiesInput
): Promise<Result<CountyEntities, FiscalError>> {
  const countyResult = validateCounty(input.county);
  if (countyResult.isErr()) {
    return err(countyResult.error);
  }

  const county = countyResult.value;
  const entityType = optionalFilter(input.entityType);
  const result = await deps.fiscalRepo.getEntitiesByCounty(county, entityType);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ county, entityType: entityType ?? null, entities: result.value });
}
