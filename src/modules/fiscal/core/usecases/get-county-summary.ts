/**
 * Get County Summary Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createCountyNotFoundError, type FiscalError } from '../errors.js';
import { validateCounty } from '../validation.js';

import type { FiscalRepository } from '../ports.js';
import type { CountySummary } from '../types.js';

export interface GetCountySummaryDeps {
  fiscalRepo: FiscalRepository;
}

/**
 * Aggregates a county's entities. A county no entity lists is not found.
 */
export async function getCountySummary(
  deps: GetCountySummaryDeps,
  input: { county: string }
): Promise<Result<CountySummary, FiscalError>> {
  const countyResult = validateCounty(input.county);
  if (countyResult.isErr()) {
    return err(countyResult.error);
  }

  const county = countyResult.value;
  const result = await deps.fiscalRepo.getCountySummary(county);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createCountyNotFoundError(county));
  }

  return ok(result.value);
}
