import { ok, err, type Result } from 'neverthrow';

import { DEFAULT_QUERY_TIMEOUT_MS, withQueryTimeout } from '../../../../infra/database/timeout.js';
import { truncateQuery } from '../../../../infra/logger/index.js';
import { expenditureCategoryName, fundBalanceCategoryName, revenueCategoryName } from '../../../categories/index.js';
import {
  createDatabaseError,
  createTimeoutError,
  isTimeoutError,
  type FiscalError,
} from '../../core/errors.js';
import { populationBounds } from '../../core/scoring.js';
import { dialectTraitsFor } from './dialect-traits.js';
import {
  isRecord,
  toAmount,
  toCountyEntity,
  toCountySummary,
  toDebtDetails,
  toEntityDetail,
  toEntitySummary,
  toLineItem,
  toMetricRow,
  toPeerEntity,
  toPensionSystems,
  type Row,
} from './normalize.js';
import { makeQueryRenderer, type QueryRenderer } from './query-renderer.js';
import { LINE_ITEM_TABLES, type PeerTypeFilter, type QueryOperation, type QuerySpec } from './query-spec.js';

import type { FiscalRepository } from '../../core/ports.js';
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
} from '../../core/types.js';
import type { FiscalDataSource } from '@/infra/database/client.js';

// ============================================================================
// Types
// ============================================================================

export interface FiscalRepoOptions {
  /** Caller-level timeout applied to every backend call */
  queryTimeoutMs?: number;
}

const CATEGORY_NAMES: Readonly<Record<LineItemKind, (code: string) => string>> = {
  revenues: revenueCategoryName,
  expenditures: expenditureCategoryName,
  fundBalances: fundBalanceCategoryName,
};

/**
 * Same-type peers match on the entity type code; the label is the fallback
 * for entities without one.
 */
const peerTypeFilter = (target: EntityDetail): PeerTypeFilter | undefined => {
  const code = target.EntityTypeCode?.trim();
  if (code !== undefined && code !== '') {
    return { column: 'code', value: code };
  }
  const label = target.EntityType?.trim();
  if (label !== undefined && label !== '') {
    return { column: 'label', value: label };
  }
  return undefined;
};

// ============================================================================
// Repository Implementation
// ============================================================================

/**
 * Kysely-based implementation of FiscalRepository.
 *
 * Works unchanged against both backends: the renderer is picked from the data
 * source kind, and rows are normalized before they leave the repository.
 */
export class KyselyFiscalRepo implements FiscalRepository {
  private readonly renderer: QueryRenderer;
  private readonly timeoutMs: number;

  constructor(
    private readonly source: FiscalDataSource,
    options: FiscalRepoOptions = {}
  ) {
    this.renderer = makeQueryRenderer(source.db, dialectTraitsFor(source.kind), source.schema);
    this.timeoutMs = options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
  }

  async searchEntities(term: string, limit: number): Promise<Result<EntitySummary[], FiscalError>> {
    const rows = await this.run({ op: 'searchEntities', term, limit });
    return rows.map((items) => items.map(toEntitySummary));
  }

  async getEntity(code: string): Promise<Result<EntityDetail | null, FiscalError>> {
    const rows = await this.run({ op: 'getEntity', code });
    return rows.map((items) => {
      const first = items[0];
      return first !== undefined ? toEntityDetail(first) : null;
    });
  }

  async getLineItems(
    kind: LineItemKind,
    code: string
  ): Promise<Result<FinancialLineItem[], FiscalError>> {
    const rows = await this.run({ op: 'getLineItems', table: LINE_ITEM_TABLES[kind], code });
    const nameOf = CATEGORY_NAMES[kind];
    return rows.map((items) => items.map((row) => toLineItem(row, nameOf)));
  }

  async getDebt(code: string): Promise<Result<DebtDetails, FiscalError>> {
    const rows = await this.run({ op: 'getDebt', code });
    return rows.map((items) => toDebtDetails(items[0]));
  }

  async getPensions(code: string): Promise<Result<PensionSystems, FiscalError>> {
    const rows = await this.run({ op: 'getPensions', code });
    return rows.map((items) => toPensionSystems(items[0]));
  }

  async getEntitiesByCounty(
    county: string,
    entityType?: string
  ): Promise<Result<CountyEntity[], FiscalError>> {
    const rows = await this.run({
      op: 'getEntitiesByCounty',
      county,
      ...(entityType !== undefined && { entityType }),
    });
    return rows.map((items) => items.map(toCountyEntity));
  }

  /**
   * Two round trips: the target first (for its population and type), then
   * the window around it.
   */
  async getPeerEntities(query: PeerQuery): Promise<Result<PeerEntity[] | null, FiscalError>> {
    const targetResult = await this.getEntity(query.code);
    if (targetResult.isErr()) {
      return err(targetResult.error);
    }

    const target = targetResult.value;
    if (target === null) {
      return ok(null);
    }

    const population = target.Population;
    if (population === null || population <= 0) {
      return ok([]);
    }

    const bounds = populationBounds(population, query.rangePct);
    const typeFilter = query.sameType ? peerTypeFilter(target) : undefined;

    const rows = await this.run({
      op: 'getPeerEntities',
      code: target.Code,
      targetPopulation: population,
      minPopulation: bounds.min,
      maxPopulation: bounds.max,
      ...(typeFilter !== undefined && { typeFilter }),
      limit: query.limit,
    });
    return rows.map((items) => items.map((row) => toPeerEntity(row, population)));
  }

  async rankEntities(query: RankQuery): Promise<Result<MetricRow[], FiscalError>> {
    const rows = await this.run({
      op: 'rankEntities',
      metric: query.metric,
      order: query.order,
      ...(query.entityType !== undefined && { entityType: query.entityType }),
      ...(query.county !== undefined && { county: query.county }),
      limit: query.limit,
    });
    return rows.map((items) => items.map(toMetricRow));
  }

  async getCountySummary(county: string): Promise<Result<CountySummary | null, FiscalError>> {
    const rows = await this.run({ op: 'getCountySummary', county });
    return rows.map((items) => {
      const first = items[0];
      // An aggregate over zero rows still yields one row in some engines
      if (first === undefined || toAmount(first['EntityCount']) === 0) {
        return null;
      }
      return toCountySummary(first);
    });
  }

  async countEntities(): Promise<Result<number, FiscalError>> {
    const rows = await this.run({ op: 'countEntities' });
    return rows.map((items) => toAmount(items[0]?.['EntityCount']));
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private async run(spec: QuerySpec): Promise<Result<Row[], FiscalError>> {
    const compiled = this.renderer.render(spec);

    try {
      const result = await withQueryTimeout(
        this.source.db.executeQuery(compiled),
        this.timeoutMs,
        spec.op
      );
      return ok(result.rows.filter(isRecord));
    } catch (error) {
      return this.handleQueryError(error, spec.op, compiled.sql);
    }
  }

  private handleQueryError(
    error: unknown,
    operation: QueryOperation,
    query: string
  ): Result<never, FiscalError> {
    const text = truncateQuery(query);

    if (isTimeoutError(error)) {
      return err(createTimeoutError(operation, text, error));
    }

    return err(createDatabaseError(operation, text, error));
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates a FiscalRepository over the given data source.
 */
export const makeFiscalRepo = (
  source: FiscalDataSource,
  options: FiscalRepoOptions = {}
): FiscalRepository => {
  return new KyselyFiscalRepo(source, options);
};
