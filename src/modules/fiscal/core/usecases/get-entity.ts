/**
 * Get Entity Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createEntityNotFoundError, type FiscalError } from '../errors.js';
import { validateEntityCode } from '../validation.js';

import type { FiscalRepository } from '../ports.js';
import type { EntityDetail } from '../types.js';

export interface GetEntityDeps {
  fiscalRepo: FiscalRepository;
}

export interface GetEntityInput {
  code: string;
}

/**
 * Loads one entity with its statistics.
 *
 * @returns The entity, or EntityNotFoundError for an unknown code
 */
export async function getEntity(
  deps: GetEntityDeps,
  input: GetEntityInput
): Promise<Result<EntityDetail, FiscalError>> {
  const codeResult = validateEntityCode(input.code);
  if (codeResult.isErr()) {
    return err(codeResult.error);
  }

  const code = codeResult.value;
  const result = await deps.fiscalRepo.getEntity(code);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createEntityNotFoundError(code));
  }

  return ok(result.value);
}
