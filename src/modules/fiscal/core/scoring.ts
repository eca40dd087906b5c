/**
 * Aggregation & health-scoring engine.
 *
 * Pure functions over normalized records. Money is summed with decimal.js so
 * that a line item's Total equals the sum of its fund amounts exactly.
 */

import { Decimal } from 'decimal.js';

import type {
  ComparisonRow,
  DebtDetails,
  EntityDetail,
  FinancialLineItem,
  FiscalHealthMetrics,
  FiscalHealthReport,
  FundAmounts,
  HealthIndicator,
  MetricRow,
  PensionSystems,
  RankedEntity,
  Rating,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Rating Scales
// ─────────────────────────────────────────────────────────────────────────────

export interface RatingBand {
  threshold: number;
  rating: Rating;
}

/**
 * Ordered bands; the first band the value reaches wins.
 * `higher`: value >= threshold. `lower`: value <= threshold.
 */
export interface RatingScale {
  direction: 'higher' | 'lower';
  bands: readonly RatingBand[];
  fallback: Rating;
}

export const OPERATING_MARGIN_SCALE: RatingScale = {
  direction: 'higher',
  bands: [
    { threshold: 0.05, rating: 'Excellent' },
    { threshold: 0, rating: 'Good' },
    { threshold: -0.05, rating: 'Fair' },
  ],
  fallback: 'Poor',
};

export const FUND_BALANCE_RATIO_SCALE: RatingScale = {
  direction: 'higher',
  bands: [
    { threshold: 0.25, rating: 'Excellent' },
    { threshold: 0.15, rating: 'Good' },
    { threshold: 0.08, rating: 'Fair' },
  ],
  fallback: 'Poor',
};

export const PENSION_FUNDED_RATIO_SCALE: RatingScale = {
  direction: 'higher',
  bands: [
    { threshold: 0.8, rating: 'Excellent' },
    { threshold: 0.6, rating: 'Good' },
    { threshold: 0.4, rating: 'Fair' },
  ],
  fallback: 'Critical',
};

export const DEBT_PER_CAPITA_SCALE: RatingScale = {
  direction: 'lower',
  bands: [
    { threshold: 1000, rating: 'Low' },
    { threshold: 2500, rating: 'Moderate' },
    { threshold: 5000, rating: 'High' },
  ],
  fallback: 'Very High',
};

/**
 * Pension thresholds as published alongside pension data (fractions of 1).
 */
export const PENSION_FUNDED_RATIO_THRESHOLDS = {
  excellent: 0.8,
  good: 0.6,
  fair: 0.4,
  critical: 0,
} as const;

/**
 * Classifies a value against a scale. Boundaries are inclusive.
 */
export const rate = (value: number, scale: RatingScale): Rating => {
  const band = scale.bands.find((b) =>
    scale.direction === 'higher' ? value >= b.threshold : value <= b.threshold
  );
  return band?.rating ?? scale.fallback;
};

// ─────────────────────────────────────────────────────────────────────────────
// Totals
// ─────────────────────────────────────────────────────────────────────────────

const sum = (values: readonly number[]): Decimal =>
  values.reduce((acc, value) => acc.plus(value), new Decimal(0));

const round2 = (value: Decimal): number => value.toDecimalPlaces(2).toNumber();

/**
 * Sum of the eight fund amounts.
 */
export const lineItemTotal = (amounts: FundAmounts): number =>
  sum([
    amounts.GeneralFund,
    amounts.SpecialRevenue,
    amounts.CapitalProjects,
    amounts.DebtService,
    amounts.Enterprise,
    amounts.Trust,
    amounts.Fiduciary,
    amounts.DebtPrincipal,
  ]).toNumber();

/**
 * Sum of line-item totals.
 */
export const categoryTotal = (items: readonly FinancialLineItem[]): number =>
  sum(items.map((item) => item.Total)).toNumber();

/**
 * General-fund amount of the Unassigned classification (307t); 0 if absent.
 */
export const unassignedFundBalance = (items: readonly FinancialLineItem[]): number =>
  items.find((item) => item.Category === '307t')?.GeneralFund ?? 0;

/**
 * Ending long-term plus ending short-term debt.
 */
export const totalDebt = (details: DebtDetails): number =>
  sum([details.TotalDebt_Ending_LongTerm, details.TotalDebt_Ending_ShortTerm]).toNumber();

// ─────────────────────────────────────────────────────────────────────────────
// Ratios
// ─────────────────────────────────────────────────────────────────────────────

/**
 * (revenue - expenditure) / revenue; undefined without positive revenue.
 */
export const operatingMargin = (revenue: number, expenditure: number): number | undefined =>
  revenue > 0 ? new Decimal(revenue).minus(expenditure).dividedBy(revenue).toNumber() : undefined;

/**
 * unassigned / expenditure; undefined without positive expenditure.
 */
export const fundBalanceRatio = (unassigned: number, expenditure: number): number | undefined =>
  expenditure > 0 ? new Decimal(unassigned).dividedBy(expenditure).toNumber() : undefined;

/**
 * Undefined when population is unknown or not positive.
 */
export const debtPerCapita = (debt: number, population: number | null): number | undefined =>
  population !== null && population > 0
    ? new Decimal(debt).dividedBy(population).toNumber()
    : undefined;

/**
 * Weakest funded ratio (percent) among systems with a positive ratio.
 */
export const pensionFundedRatioIndicator = (systems: PensionSystems): number | undefined => {
  const ratios = Object.values(systems).flatMap((system) =>
    system !== undefined && system.funded_ratio > 0 ? [system.funded_ratio] : []
  );
  return ratios.length > 0 ? Math.min(...ratios) : undefined;
};

/**
 * Amount per resident rounded to cents; 0 when population is unknown or not positive.
 */
export const perCapita = (amount: number, population: number | null): number =>
  population !== null && population > 0
    ? round2(new Decimal(amount).dividedBy(population))
    : 0;

/**
 * Inclusive population window of ±rangePct around a target population.
 * Populations are whole counts, so the bounds are rounded inward to integers;
 * the warehouse binds them against a BIGINT column.
 */
export const populationBounds = (
  population: number,
  rangePct: number
): { min: number; max: number } => {
  const spread = new Decimal(population).times(rangePct);
  return {
    min: new Decimal(population).minus(spread).ceil().toNumber(),
    max: new Decimal(population).plus(spread).floor().toNumber(),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Rankings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Standard competition ranking over rows already in metric order:
 * equal values share a rank and the next rank skips (1, 1, 3).
 */
export const assignRanks = (rows: readonly MetricRow[]): RankedEntity[] => {
  const ranked: RankedEntity[] = [];
  rows.forEach((row, index) => {
    const previous = ranked[index - 1];
    const rank =
      previous !== undefined && previous.MetricValue === row.MetricValue ? previous.Rank : index + 1;
    ranked.push({ ...row, Rank: rank });
  });
  return ranked;
};

// ─────────────────────────────────────────────────────────────────────────────
// Composite Reports
// ─────────────────────────────────────────────────────────────────────────────

export interface FiscalHealthInputs {
  entity: EntityDetail;
  revenues: readonly FinancialLineItem[];
  expenditures: readonly FinancialLineItem[];
  fundBalances: readonly FinancialLineItem[];
  debt: DebtDetails;
  pensions: PensionSystems;
}

const percentIndicator = (ratio: number, scale: RatingScale): HealthIndicator => ({
  value: round2(new Decimal(ratio).times(100)),
  unit: 'percent',
  rating: rate(ratio, scale),
});

const dollarIndicator = (amount: number, scale: RatingScale): HealthIndicator => ({
  value: round2(new Decimal(amount)),
  unit: 'dollars',
  rating: rate(amount, scale),
});

// Funded ratios are stored as percentages; the scale is in fractions of 1
const fundedRatioIndicator = (percent: number): HealthIndicator => ({
  value: round2(new Decimal(percent)),
  unit: 'percent',
  rating: rate(percent / 100, PENSION_FUNDED_RATIO_SCALE),
});

/**
 * Computes the four indicators; any whose precondition fails is omitted.
 * Ratings use the unrounded ratio.
 */
export const buildFiscalHealthReport = (inputs: FiscalHealthInputs): FiscalHealthReport => {
  const { entity } = inputs;
  const revenue = categoryTotal(inputs.revenues);
  const expenditure = categoryTotal(inputs.expenditures);
  const unassigned = unassignedFundBalance(inputs.fundBalances);
  const debt = totalDebt(inputs.debt);
  const population = entity.Population;

  const margin = operatingMargin(revenue, expenditure);
  const balanceRatio = fundBalanceRatio(unassigned, expenditure);
  const perResidentDebt = debtPerCapita(debt, population);
  const fundedRatio = pensionFundedRatioIndicator(inputs.pensions);

  const metrics: FiscalHealthMetrics = {
    ...(margin !== undefined && {
      operating_margin: percentIndicator(margin, OPERATING_MARGIN_SCALE),
    }),
    ...(balanceRatio !== undefined && {
      fund_balance_ratio: percentIndicator(balanceRatio, FUND_BALANCE_RATIO_SCALE),
    }),
    ...(perResidentDebt !== undefined && {
      debt_per_capita: dollarIndicator(perResidentDebt, DEBT_PER_CAPITA_SCALE),
    }),
    ...(fundedRatio !== undefined && {
      pension_funded_ratio: fundedRatioIndicator(fundedRatio),
    }),
  };

  return {
    entity_code: entity.Code,
    entity_name: entity.UnitName,
    metrics,
    raw_values: {
      total_revenue: revenue,
      total_expenditure: expenditure,
      unassigned_fund_balance: unassigned,
      total_debt: debt,
      population,
    },
  };
};

/**
 * One side-by-side comparison row.
 */
export const buildComparisonRow = (
  entity: EntityDetail,
  revenues: readonly FinancialLineItem[],
  expenditures: readonly FinancialLineItem[]
): ComparisonRow => {
  const revenue = categoryTotal(revenues);
  const expenditure = categoryTotal(expenditures);

  return {
    code: entity.Code,
    name: entity.UnitName,
    type: entity.EntityType,
    county: entity.County,
    population: entity.Population,
    eav: entity.EquitalizedAssessedValue,
    total_revenue: revenue,
    total_expenditure: expenditure,
    revenue_per_capita: perCapita(revenue, entity.Population),
    expenditure_per_capita: perCapita(expenditure, entity.Population),
  };
};
