/**
 * Get Debt Profile Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { getEntity } from './get-entity.js';
import { totalDebt } from '../scoring.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { DebtDetails } from '../types.js';

export interface GetDebtProfileDeps {
  fiscalRepo: FiscalRepository;
}

export interface DebtProfile {
  code: string;
  totalDebt: number;
  details: DebtDetails;
}

export async function getDebtProfile(
  deps: GetDebtProfileDeps,
  input: { code: string }
): Promise<Result<DebtProfile, FiscalError>> {
  const entityResult = await getEntity(deps, { code: input.code });
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }

  const code = entityResult.value.Code;
  const result = await deps.fiscalRepo.getDebt(code);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({ code, totalDebt: totalDebt(result.value), details: result.value });
}
