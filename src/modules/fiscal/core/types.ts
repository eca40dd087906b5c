/**
 * Fiscal module domain types.
 *
 * Record field names follow the public API payloads, which in turn follow the
 * column names of the published data files.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const MIN_SEARCH_TERM_LENGTH = 2;
export const MIN_COMPARE_CODES = 2;
export const MAX_COMPARE_CODES = 10;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 50;
export const DEFAULT_PEER_RANGE_PCT = 0.25;

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Search hit.
 */
export interface EntitySummary {
  Code: string;
  UnitName: string | null;
  EntityType: string | null;
  County: string | null;
}

/**
 * Entity master joined with its statistics. Statistics are null when the
 * entity has no statistics row: unknown, not zero.
 */
export interface EntityDetail {
  Code: string;
  UnitName: string | null;
  EntityType: string | null;
  EntityTypeCode: string | null;
  County: string | null;
  CEOFName: string | null;
  CEOLName: string | null;
  CEOTitle: string | null;
  CFOFName: string | null;
  CFOLName: string | null;
  CFOTitle: string | null;
  Population: number | null;
  EquitalizedAssessedValue: number | null;
  FullTimeEmployees: number | null;
  PartTimeEmployees: number | null;
  HomeRule: string | null;
  HasDebt: string | null;
  HasBondedDebt: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Financial line items
// ─────────────────────────────────────────────────────────────────────────────

export type LineItemKind = 'revenues' | 'expenditures' | 'fundBalances';

/**
 * Amount columns of a line item, keyed by payload name.
 */
export interface FundAmounts {
  GeneralFund: number;
  SpecialRevenue: number;
  CapitalProjects: number;
  DebtService: number;
  Enterprise: number;
  Trust: number;
  Fiduciary: number;
  DebtPrincipal: number;
}

/**
 * One category row. `Total` is the sum of the eight fund amounts.
 */
export interface FinancialLineItem extends FundAmounts {
  Category: string;
  Total: number;
  CategoryName: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Debt
// ─────────────────────────────────────────────────────────────────────────────

export type DebtType = 'GOBonds' | 'RevenueBonds' | 'AltRevenueBonds' | 'Contractual' | 'OtherDebt';

export type DebtMovement = 'Beginning' | 'Additions' | 'Retirements';

/**
 * Debt schedule for one entity. All zero when the entity reports no debt.
 */
export type DebtDetails = Record<`${DebtType}_${DebtMovement}`, number> & {
  TotalDebt_Ending_LongTerm: number;
  TotalDebt_Ending_ShortTerm: number;
};

// ─────────────────────────────────────────────────────────────────────────────
// Pensions
// ─────────────────────────────────────────────────────────────────────────────

export type PensionSystemName = 'IMRF' | 'Police' | 'Fire' | 'OPEB';

export const PENSION_SYSTEMS: readonly PensionSystemName[] = ['IMRF', 'Police', 'Fire', 'OPEB'];

export interface PensionSystem {
  /** ISO date (YYYY-MM-DD) */
  measurement_date: string | null;
  total_liability: number;
  plan_assets: number;
  net_position: number;
  /** Percentage, 0-100 */
  funded_ratio: number;
}

/**
 * Only systems with a strictly positive total liability are present.
 */
export type PensionSystems = Partial<Record<PensionSystemName, PensionSystem>>;

// ─────────────────────────────────────────────────────────────────────────────
// Geography, peers and rankings
// ─────────────────────────────────────────────────────────────────────────────

export interface CountyEntity {
  Code: string;
  UnitName: string | null;
  EntityType: string | null;
  Population: number | null;
  EquitalizedAssessedValue: number | null;
}

export interface CountySummary {
  County: string | null;
  EntityCount: number;
  EntityTypeCount: number;
  TotalPopulation: number;
  TotalEAV: number;
  TotalFullTimeEmployees: number;
  TotalPartTimeEmployees: number;
  HomeRuleCount: number;
  EntitiesWithDebt: number;
}

export interface PeerEntity {
  Code: string;
  UnitName: string | null;
  EntityType: string | null;
  County: string | null;
  Population: number;
  PopulationDifference: number;
}

export interface PeerQuery {
  code: string;
  /** Fraction of the target population, e.g. 0.25 for ±25% */
  rangePct: number;
  sameType: boolean;
  limit: number;
}

export type RankMetric = 'population' | 'eav' | 'employees';

export const RANK_METRICS: readonly RankMetric[] = ['population', 'eav', 'employees'];

export type RankOrder = 'top' | 'bottom';

export interface RankQuery {
  metric: RankMetric;
  order: RankOrder;
  entityType?: string;
  county?: string;
  limit: number;
}

/**
 * Ranking row as read from the source, before ranks are assigned.
 */
export interface MetricRow {
  Code: string;
  UnitName: string | null;
  EntityType: string | null;
  County: string | null;
  MetricValue: number;
}

export interface RankedEntity extends MetricRow {
  Rank: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Derived metrics
// ─────────────────────────────────────────────────────────────────────────────

export type Rating =
  | 'Excellent'
  | 'Good'
  | 'Fair'
  | 'Poor'
  | 'Critical'
  | 'Low'
  | 'Moderate'
  | 'High'
  | 'Very High';

export interface HealthIndicator {
  value: number;
  unit: 'percent' | 'dollars';
  rating: Rating;
}

export interface FiscalHealthMetrics {
  operating_margin?: HealthIndicator;
  fund_balance_ratio?: HealthIndicator;
  debt_per_capita?: HealthIndicator;
  pension_funded_ratio?: HealthIndicator;
}

export interface FiscalHealthRawValues {
  total_revenue: number;
  total_expenditure: number;
  unassigned_fund_balance: number;
  total_debt: number;
  population: number | null;
}

export interface FiscalHealthReport {
  entity_code: string;
  entity_name: string | null;
  metrics: FiscalHealthMetrics;
  raw_values: FiscalHealthRawValues;
}

export interface ComparisonRow {
  code: string;
  name: string | null;
  type: string | null;
  county: string | null;
  population: number | null;
  eav: number | null;
  total_revenue: number;
  total_expenditure: number;
  revenue_per_capita: number;
  expenditure_per_capita: number;
}

export interface Comparison {
  rows: ComparisonRow[];
  unresolvedCodes: string[];
}
