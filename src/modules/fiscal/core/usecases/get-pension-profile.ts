/**
 * Get Pension Profile Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { getEntity } from './get-entity.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { PensionSystems } from '../types.js';

export interface GetPensionProfileDeps {
  fiscalRepo: FiscalRepository;
}

export interface PensionProfile {
  code: string;
  systems: PensionSystems;
}

/**
 * Only systems with a positive total liability are reported.
 */
export async function getPensionProfile(
  deps: GetPensionProfileDeps,
  input: { code: string }
): Promise<Result<PensionProfile, FiscalError>> {
  const entityResult = await getEntity(deps, { code: input.code });
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }

  const code = entityResult.value.Code;
  const result = await deps.fiscalRepo.getPensions(code);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ code, systems: result.value });
}
