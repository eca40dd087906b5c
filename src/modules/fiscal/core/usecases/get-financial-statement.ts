/**
 * Get Financial Statement Use Case
 *
 * Revenues, expenditures or fund balances of one entity, by category.
 */

import { ok, err, type Result } from 'neverthrow';

import { getEntity } from './get-entity.js';
import { categoryTotal } from '../scoring.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { FinancialLineItem, LineItemKind } from '../types.js';

export interface GetFinancialStatementDeps {
  fiscalRepo: FiscalRepository;
}

export interface GetFinancialStatementInput {
  kind: LineItemKind;
  code: string;
}

export interface FinancialStatement {
  code: string;
  kind: LineItemKind;
  /** Sum of every category's Total */
  total: number;
  items: FinancialLineItem[];
}

/**
 * Unknown codes are EntityNotFoundError. A known entity without rows of this
 * kind yields an empty statement with total 0.
 */
export async function getFinancialStatement(
  deps: GetFinancialStatementDeps,
  input: GetFinancialStatementInput
): Promise<Result<FinancialStatement, FiscalError>> {
  const entityResult = await getEntity(deps, { code: input.code });
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }

  const code = entityResult.value.Code;
  const result = await deps.fiscalRepo.getLineItems(input.kind, code);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok({
    code,
    kind: input.kind,
    total: categoryTotal(result.value),
    items: result.value,
  });
}
