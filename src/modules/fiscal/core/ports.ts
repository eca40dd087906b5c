/**
 * Port interfaces for Fiscal module.
 *
 * Defines the repository contract that both backends satisfy.
 */

import type { FiscalError } from './errors.js';
import type {
  CountyEntity,
  CountySummary,
  DebtDetails,
  EntityDetail,
  EntitySummary,
  FinancialLineItem,
  LineItemKind,
  MetricRow,
  PeerEntity,
  PeerQuery,
  PensionSystems,
  RankQuery,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Fiscal Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only access to the fiscal tables.
 *
 * Numeric aggregates come back as 0 where the source holds null; descriptive
 * fields keep null. Backend failures are returned, never thrown.
 */
export interface FiscalRepository {
  /**
   * Case-insensitive substring match on name or county.
   * Exact name matches first, then prefix matches, then the rest.
   */
  searchEntities(term: string, limit: number): Promise<Result<EntitySummary[], FiscalError>>;

  /**
   * @returns The entity, or null if the code is unknown
   */
  getEntity(code: string): Promise<Result<EntityDetail | null, FiscalError>>;

  /**
   * One row per category, ordered by category code.
   */
  getLineItems(
    kind: LineItemKind,
    code: string
  ): Promise<Result<FinancialLineItem[], FiscalError>>;

  /**
   * All-zero details when the entity has no debt row.
   */
  getDebt(code: string): Promise<Result<DebtDetails, FiscalError>>;

  getPensions(code: string): Promise<Result<PensionSystems, FiscalError>>;

  /**
   * Population descending (unknown last), then name.
   */
  getEntitiesByCounty(
    county: string,
    entityType?: string
  ): Promise<Result<CountyEntity[], FiscalError>>;

  /**
   * Entities of comparable population, closest first.
   *
   * @returns Peers, or null if the target entity is unknown
   */
  getPeerEntities(query: PeerQuery): Promise<Result<PeerEntity[] | null, FiscalError>>;

  /**
   * Entities ordered by the metric; rows where the metric is unknown are excluded.
   */
  rankEntities(query: RankQuery): Promise<Result<MetricRow[], FiscalError>>;

  /**
   * @returns The summary, or null if no entity lists this county
   */
  getCountySummary(county: string): Promise<Result<CountySummary | null, FiscalError>>;

  /**
   * Row count of the entity master; used as the start-up connection check.
   */
  countEntities(): Promise<Result<number, FiscalError>>;
}
