/**
 * Calculate Fiscal Health Use Case
 *
 * Operating margin, fund balance ratio, debt per capita and pension funded
 * ratio for one entity, with the raw inputs used.
 */

import { ok, err, type Result } from 'neverthrow';

import { getEntity } from './get-entity.js';
import { buildFiscalHealthReport } from '../scoring.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { FiscalHealthReport } from '../types.js';

export interface CalculateFiscalHealthDeps {
  fiscalRepo: FiscalRepository;
}

/**
 * Flow:
 * 1. Load the entity (unknown code is terminal)
 * 2. Load revenues, expenditures, fund balances, debt and pensions concurrently
 * 3. Score; indicators whose inputs are missing are omitted
 */
export async function calculateFiscalHealth(
  deps: CalculateFiscalHealthDeps,
  input: { code: string }
): Promise<Result<FiscalHealthReport, FiscalError>> {
  const { fiscalRepo } = deps;

  const entityResult = await getEntity(deps, input);
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }

  const entity = entityResult.value;
  const [revenues, expenditures, fundBalances, debt, pensions] = await Promise.all([
    fiscalRepo.getLineItems('revenues', entity.Code),
    fiscalRepo.getLineItems('expenditures', entity.Code),
    fiscalRepo.getLineItems('fundBalances', entity.Code),
    fiscalRepo.getDebt(entity.Code),
    fiscalRepo.getPensions(entity.Code),
  ]);

  if (revenues.isErr()) return err(revenues.error);
  if (expenditures.isErr()) return err(expenditures.error);
  if (fundBalances.isErr()) return err(fundBalances.error);
  if (debt.isErr()) return err(debt.error);
  if (pensions.isErr()) return err(pensions.error);

  return ok(
    buildFiscalHealthReport({
      entity,
      revenues: revenues.value,
      expenditures: expenditures.value,
      fundBalances: fundBalances.value,
      debt: debt.value,
      pensions: pensions.value,
    })
  );
}
