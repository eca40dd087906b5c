/**
 * Input validation for fiscal operations.
 *
 * Each validator returns the normalized value or a ValidationError; nothing
 * that fails here reaches a backend.
 */

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import {
  DEFAULT_LIMIT,
  DEFAULT_PEER_RANGE_PCT,
  MAX_COMPARE_CODES,
  MAX_LIMIT,
  MIN_COMPARE_CODES,
  MIN_SEARCH_TERM_LENGTH,
  RANK_METRICS,
  type RankMetric,
  type RankOrder,
} from './types.js';

const ENTITY_CODE_SEGMENTS = 3;

/**
 * Entity codes are exactly three non-empty segments separated by '/'.
 */
export const isValidEntityCode = (code: string): boolean => {
  const segments = code.split('/');
  return (
    segments.length === ENTITY_CODE_SEGMENTS && segments.every((segment) => segment.trim() !== '')
  );
};

export const validateEntityCode = (code: string): Result<string, ValidationError> => {
  const trimmed = code.trim();
  if (!isValidEntityCode(trimmed)) {
    return err(
      createValidationError(
        'code',
        `Invalid entity code '${code}': expected three segments separated by '/', e.g. 016/020/32`
      )
    );
  }
  return ok(trimmed);
};

export const validateSearchTerm = (term: string | undefined): Result<string, ValidationError> => {
  const trimmed = term?.trim() ?? '';
  if (trimmed.length < MIN_SEARCH_TERM_LENGTH) {
    return err(
      createValidationError(
        'q',
        `Search term must be at least ${String(MIN_SEARCH_TERM_LENGTH)} characters`
      )
    );
  }
  return ok(trimmed);
};

export const validateCounty = (county: string | undefined): Result<string, ValidationError> => {
  const trimmed = county?.trim() ?? '';
  if (trimmed === '') {
    return err(createValidationError('county', 'County name is required'));
  }
  return ok(trimmed);
};

/**
 * Accepts a comma-separated list or an array; blanks are dropped.
 */
export const parseCompareCodes = (
  codes: string | readonly string[] | undefined
): Result<string[], ValidationError> => {
  const raw = typeof codes === 'string' ? codes.split(',') : (codes ?? []);
  const parsed = raw.map((code) => code.trim()).filter((code) => code !== '');

  if (parsed.length < MIN_COMPARE_CODES || parsed.length > MAX_COMPARE_CODES) {
    return err(
      createValidationError(
        'codes',
        `Provide between ${String(MIN_COMPARE_CODES)} and ${String(MAX_COMPARE_CODES)} entity codes, got ${String(parsed.length)}`
      )
    );
  }
  return ok(parsed);
};

/**
 * Clamps a limit to [1, MAX_LIMIT]; missing or non-numeric values take the default.
 */
export const clampLimit = (limit: number | undefined, fallback: number = DEFAULT_LIMIT): number => {
  if (limit === undefined || !Number.isFinite(limit)) {
    return fallback;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_LIMIT);
};

/**
 * Case-insensitive; defaults to population.
 */
export const parseRankMetric = (metric: string | undefined): Result<RankMetric, ValidationError> => {
  const wanted = (metric ?? 'population').trim().toLowerCase();
  const found = RANK_METRICS.find((candidate) => candidate === wanted);
  if (found === undefined) {
    return err(
      createValidationError(
        'metric',
        `Unknown metric: ${metric ?? ''}. Expected one of ${RANK_METRICS.join(', ')}`
      )
    );
  }
  return ok(found);
};

/**
 * Case-insensitive; defaults to top.
 */
export const parseRankOrder = (order: string | undefined): Result<RankOrder, ValidationError> => {
  const wanted = (order ?? 'top').trim().toLowerCase();
  if (wanted === 'top' || wanted === 'bottom') {
    return ok(wanted);
  }
  return err(createValidationError('order', `Unknown order: ${order ?? ''}. Expected top or bottom`));
};

/**
 * Peer range as a fraction in (0, 1]; defaults to 0.25.
 */
export const validateRangePct = (rangePct: number | undefined): Result<number, ValidationError> => {
  const value = rangePct ?? DEFAULT_PEER_RANGE_PCT;
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    return err(
      createValidationError('range_pct', 'range_pct must be a fraction greater than 0 and at most 1')
    );
  }
  return ok(value);
};

/**
 * Blank optional filters are treated as absent.
 */
export const optionalFilter = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
};
