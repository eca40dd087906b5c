/**
 * Find Peer Entities Use Case
 *
 * Entities whose population lies within ±rangePct of the target's.
 */

import { ok, err, type Result } from 'neverthrow';

import { createEntityNotFoundError, type FiscalError } from '../errors.js';
import { clampLimit, validateEntityCode, validateRangePct } from '../validation.js';

import type { FiscalRepository } from '../ports.js';
import type { PeerEntity } from '../types.js';

export interface FindPeerEntitiesDeps {
  fiscalRepo: FiscalRepository;
}

export interface FindPeerEntitiesInput {
  code: string;
  rangePct?: number | undefined;
  sameType?: boolean | undefined;
  limit?: number | undefined;
}

export interface PeerSet {
  code: string;
  peers: PeerEntity[];
}

/**
 * A target without a known population has no peers.
 */
export async function findPeerEntities(
  deps: FindPeerEntitiesDeps,
  input: FindPeerEntitiesInput
): Promise<Result<PeerSet, FiscalError>> {
  const codeResult = validateEntityCode(input.code);
  if (codeResult.isErr()) {
    return err(codeResult.error);
  }

  const rangeResult = validateRangePct(input.rangePct);
  if (rangeResult.isErr()) {
    return err(rangeResult.error);
  }

  const code = codeResult.value;
  const result = await deps.fiscalRepo.getPeerEntities({
    code,
    rangePct: rangeResult.value,
    sameType: input.sameType ?? true,
    limit: clampLimit(input.limit),
  });
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createEntityNotFoundError(code));
  }

  return ok({ code, peers: result.value });
}
