/**
 * Search Entities Use Case
 *
 * Finds entities whose name or county contains the search term.
 */

import { ok, err, type Result } from 'neverthrow';

import { clampLimit, validateSearchTerm } from '../validation.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { EntitySummary } from '../types.js';

export interface SearchEntitiesDeps {
  fiscalRepo: FiscalRepository;
}

export interface SearchEntitiesInput {
  term: string | undefined;
  limit?: number | undefined;
}

export interface SearchEntitiesResult {
  /** Trimmed term actually searched */
  term: string;
  entities: EntitySummary[];
}

/**
 * An empty match list is a result, not an error.
 */
export async function searchEntities(
  deps: SearchEntitiesDeps,
  input: SearchEntitiesInput
): Promise<Result<SearchEntitiesResult, FiscalError>> {
  const termResult = validateSearchTerm(input.term);
  if (termResult.isErr()) {
    return err(termResult.error);
  }

  const term = termResult.value;
  const result = await deps.fiscalRepo.searchEntities(term, clampLimit(input.limit));
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ term, entities: result.value });
}
