/**
 * Entity/Financial Facade
 *
 * The single entry point the HTTP layer talks to. Each operation runs a use
 * case and turns its Result into an envelope plus HTTP status. Nothing is
 * thrown past this layer; backend failures are logged here and reported to
 * the caller with a generic message.
 */

import { FISCAL_TABLES } from '../../../../infra/database/fiscal/types.js';
import {
  DEBT_TYPE_DESCRIPTIONS,
  FUND_BALANCE_CATEGORY_DESCRIPTIONS,
  FUND_TYPE_LEGEND,
  type CategoryLegend,
} from '../../../categories/index.js';
import { isBackendError, type FiscalError } from '../../core/errors.js';
import { PENSION_FUNDED_RATIO_THRESHOLDS } from '../../core/scoring.js';
import { calculateFiscalHealth } from '../../core/usecases/calculate-fiscal-health.js';
import { compareEntities, type CompareEntitiesInput } from '../../core/usecases/compare-entities.js';
import { findPeerEntities, type FindPeerEntitiesInput } from '../../core/usecases/find-peer-entities.js';
import { getCountyEntities, type GetCountyEntitiesInput } from '../../core/usecases/get-county-entities.js';
import { getCountySummary } from '../../core/usecases/get-county-summary.js';
import { getDebtProfile } from '../../core/usecases/get-debt-profile.js';
import { getEntity } from '../../core/usecases/get-entity.js';
import { getFinancialStatement } from '../../core/usecases/get-financial-statement.js';
import { getPensionProfile } from '../../core/usecases/get-pension-profile.js';
import { rankEntities, type RankEntitiesInput } from '../../core/usecases/rank-entities.js';
import { searchEntities, type SearchEntitiesInput } from '../../core/usecases/search-entities.js';
import { failure, notFound, success, type FacadeResponse } from './envelope.js';

import type { FiscalRepository } from '../../core/ports.js';
import type {
  ComparisonRow,
  CountyEntity,
  CountySummary,
  DebtDetails,
  EntityDetail,
  EntitySummary,
  FinancialLineItem,
  FiscalHealthReport,
  PeerEntity,
  PensionSystems,
  RankedEntity,
  RankMetric,
  RankOrder,
} from '../../core/types.js';
import type { DataSourceKind, FiscalTableName } from '@/infra/database/client.js';
import type { Logger } from 'pino';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Payloads
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Liveness payload; reports the configured source whether or not the
 * start-up connection check succeeded.
 */
export interface HealthPayload {
  status: 'healthy';
  data_source: DataSourceKind;
  database_path: string;
  connection_tested: boolean;
  version: string;
  timestamp: string;
}

export interface TablesPayload {
  data_source: DataSourceKind;
  tables: FiscalTableName[];
}

export interface SearchPayload {
  count: number;
  entities: EntitySummary[];
}

export interface EntityPayload {
  entity: EntityDetail;
}

export interface RevenuesPayload {
  code: string;
  total_revenue: number;
  by_category: FinancialLineItem[];
  fund_type_legend: CategoryLegend;
}

export interface ExpendituresPayload {
  code: string;
  total_expenditure: number;
  by_category: FinancialLineItem[];
  fund_type_legend: CategoryLegend;
}

export interface FundBalancesPayload {
  code: string;
  fund_balances: FinancialLineItem[];
  category_descriptions: CategoryLegend;
}

export interface DebtPayload {
  code: string;
  total_debt: number;
  details: DebtDetails;
  debt_type_descriptions: CategoryLegend;
}

export interface PensionsPayload {
  code: string;
  pension_systems: PensionSystems;
  funded_ratio_thresholds: typeof PENSION_FUNDED_RATIO_THRESHOLDS;
}

export interface PeersPayload {
  entity_code: string;
  peer_count: number;
  peers: PeerEntity[];
}

export interface ComparePayload {
  entity_count: number;
  comparison: ComparisonRow[];
  unresolved_codes: string[];
}

export interface RankPayload {
  metric: RankMetric;
  order: RankOrder;
  filters: { entity_type: string | null; county: string | null };
  count: number;
  rankings: RankedEntity[];
}

export interface CountyEntitiesPayload {
  county: string;
  entity_type_filter: string | null;
  count: number;
  entities: CountyEntity[];
}

export interface CountySummaryPayload {
  summary: CountySummary;
}

// ─────────────────────────────────────────────────────────────────────────────
// Facade
// ─────────────────────────────────────────────────────────────────────────────

export interface FiscalFacade {
  health(): { httpStatus: number; body: HealthPayload };
  tables(): FacadeResponse<TablesPayload>;
  search(input: SearchEntitiesInput): Promise<FacadeResponse<SearchPayload>>;
  entity(code: string): Promise<FacadeResponse<EntityPayload>>;
  revenues(code: string): Promise<FacadeResponse<RevenuesPayload>>;
  expenditures(code: string): Promise<FacadeResponse<ExpendituresPayload>>;
  fundBalances(code: string): Promise<FacadeResponse<FundBalancesPayload>>;
  debt(code: string): Promise<FacadeResponse<DebtPayload>>;
  pensions(code: string): Promise<FacadeResponse<PensionsPayload>>;
  fiscalHealth(code: string): Promise<FacadeResponse<FiscalHealthReport>>;
  peers(input: FindPeerEntitiesInput): Promise<FacadeResponse<PeersPayload>>;
  compare(input: CompareEntitiesInput): Promise<FacadeResponse<ComparePayload>>;
  rank(input: RankEntitiesInput): Promise<FacadeResponse<RankPayload>>;
  countyEntities(input: GetCountyEntitiesInput): Promise<FacadeResponse<CountyEntitiesPayload>>;
  countySummary(county: string): Promise<FacadeResponse<CountySummaryPayload>>;
}

export interface MakeFiscalFacadeDeps {
  fiscalRepo: FiscalRepository;
  logger: Logger;
  dataSource: { kind: DataSourceKind; location: string };
  /** Outcome of the start-up connection check */
  connectionTested: boolean;
  version: string;
  now?: () => Date;
}

export const makeFiscalFacade = (deps: MakeFiscalFacadeDeps): FiscalFacade => {
  const { fiscalRepo, logger, dataSource } = deps;
  const now = deps.now ?? (() => new Date());

  const respond = <T, P extends object>(
    result: Result<T, FiscalError>,
    toPayload: (value: T) => P
  ): FacadeResponse<P> => {
    if (result.isOk()) {
      return success(toPayload(result.value));
    }

    const error = result.error;
    if (isBackendError(error)) {
      logger.error(
        { operation: error.operation, query: error.query, err: error.cause },
        error.message
      );
    }
    return failure(error);
  };

  return {
    health: () => ({
      httpStatus: 200,
      body: {
        status: 'healthy',
        data_source: dataSource.kind,
        database_path: dataSource.location,
        connection_tested: deps.connectionTested,
        version: deps.version,
        timestamp: now().toISOString(),
      },
    }),

    tables: () => success({ data_source: dataSource.kind, tables: [...FISCAL_TABLES] }),

    async search(input) {
      const result = await searchEntities({ fiscalRepo }, input);
      if (result.isOk() && result.value.entities.length === 0) {
        return notFound<SearchPayload>(`No entities found matching '${result.value.term}'`);
      }
      return respond(result, ({ entities }) => ({ count: entities.length, entities }));
    },

    async entity(code) {
      const result = await getEntity({ fiscalRepo }, { code });
      return respond(result, (entity) => ({ entity }));
    },

    async revenues(code) {
      const result = await getFinancialStatement({ fiscalRepo }, { kind: 'revenues', code });
      return respond(result, (statement) => ({
        code: statement.code,
        total_revenue: statement.total,
        by_category: statement.items,
        fund_type_legend: FUND_TYPE_LEGEND,
      }));
    },

    async expenditures(code) {
      const result = await getFinancialStatement({ fiscalRepo }, { kind: 'expenditures', code });
      return respond(result, (statement) => ({
        code: statement.code,
        total_expenditure: statement.total,
        by_category: statement.items,
        fund_type_legend: FUND_TYPE_LEGEND,
      }));
    },

    async fundBalances(code) {
      const result = await getFinancialStatement({ fiscalRepo }, { kind: 'fundBalances', code });
      return respond(result, (statement) => ({
        code: statement.code,
        fund_balances: statement.items,
        category_descriptions: FUND_BALANCE_CATEGORY_DESCRIPTIONS,
      }));
    },

    async debt(code) {
      const result = await getDebtProfile({ fiscalRepo }, { code });
      return respond(result, (profile) => ({
        code: profile.code,
        total_debt: profile.totalDebt,
        details: profile.details,
        debt_type_descriptions: DEBT_TYPE_DESCRIPTIONS,
      }));
    },

    async pensions(code) {
      const result = await getPensionProfile({ fiscalRepo }, { code });
      return respond(result, (profile) => ({
        code: profile.code,
        pension_systems: profile.systems,
        funded_ratio_thresholds: PENSION_FUNDED_RATIO_THRESHOLDS,
      }));
    },

    async fiscalHealth(code) {
      const result = await calculateFiscalHealth({ fiscalRepo }, { code });
      return respond(result, (report) => report);
    },

    async peers(input) {
      const result = await findPeerEntities({ fiscalRepo }, input);
      return respond(result, ({ code, peers }) => ({
        entity_code: code,
        peer_count: peers.length,
        peers,
      }));
    },

    async compare(input) {
      const result = await compareEntities({ fiscalRepo }, input);
      return respond(result, ({ rows, unresolvedCodes }) => ({
        entity_count: rows.length,
        comparison: rows,
        unresolved_codes: unresolvedCodes,
      }));
    },

    async rank(input) {
      const result = await rankEntities({ fiscalRepo }, input);
      return respond(result, ({ query, rankings }) => ({
        metric: query.metric,
        order: query.order,
        filters: { entity_type: query.entityType ?? null, county: query.county ?? null },
        count: rankings.length,
        rankings,
      }));
    },

    async countyEntities(input) {
      const result = await getCountyEntities({ fiscalRepo }, input);
      return respond(result, ({ county, entityType, entities }) => ({
        county,
        entity_type_filter: entityType,
        count: entities.length,
        entities,
      }));
    },

    async countySummary(county) {
      const result = await getCountySummary({ fiscalRepo }, { county });
      return respond(result, (summary) => ({ summary }));
    },
  };
};
