/**
 * Compare Entities Use Case
 *
 * Side-by-side size and finance figures for 2-10 entities.
 */

import { ok, err, type Result } from 'neverthrow';

import { buildComparisonRow } from '../scoring.js';
import { isValidEntityCode, parseCompareCodes } from '../validation.js';

import type { FiscalError } from '../errors.js';
import type { FiscalRepository } from '../ports.js';
import type { Comparison, ComparisonRow } from '../types.js';

export interface CompareEntitiesDeps {
  fiscalRepo: FiscalRepository;
}

export interface CompareEntitiesInput {
  codes: string | readonly string[] | undefined;
}

/**
 * Loads one entity's comparison row; null when the code does not resolve.
 */
const loadComparisonRow = async (
  fiscalRepo: FiscalRepository,
  code: string
): Promise<Result<ComparisonRow | null, FiscalError>> => {
  if (!isValidEntityCode(code)) {
    return ok(null);
  }

  const [entityResult, revenuesResult, expendituresResult] = await Promise.all([
    fiscalRepo.getEntity(code),
    fiscalRepo.getLineItems('revenues', code),
    fiscalRepo.getLineItems('expenditures', code),
  ]);

  if (entityResult.isErr()) return err(entityResult.error);
  if (revenuesResult.isErr()) return err(revenuesResult.error);
  if (expendituresResult.isErr()) return err(expendituresResult.error);

  if (entityResult.value === null) {
    return ok(null);
  }

  return ok(buildComparisonRow(entityResult.value, revenuesResult.value, expendituresResult.value));
};

/**
 * Rows follow the input order. Codes that do not resolve (unknown or
 * malformed) are left out of the rows and reported in `unresolvedCodes`.
 * Any backend failure fails the whole comparison.
 */
export async function compareEntities(
  deps: CompareEntitiesDeps,
  input: CompareEntitiesInput
): Promise<Result<Comparison, FiscalError>> {
  const codesResult = parseCompareCodes(input.codes);
  if (codesResult.isErr()) {
    return err(codesResult.error);
  }

  const codes = codesResult.value;
  const results = await Promise.all(codes.map((code) => loadComparisonRow(deps.fiscalRepo, code)));

  const rows: ComparisonRow[] = [];
  const unresolvedCodes: string[] = [];
  for (const [index, result] of results.entries()) {
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value === null) {
      unresolvedCodes.push(codes[index] ?? '');
    } else {
      rows.push(result.value);
    }
  }

  return ok({ rows, unresolvedCodes });
}
