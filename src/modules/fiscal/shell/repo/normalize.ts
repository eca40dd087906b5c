/**
 * Row normalization.
 *
 * Both backends hand back loosely typed rows: the warehouse returns numeric
 * and bigint columns as strings and DATE columns as Date objects, the file
 * database returns numbers and text. Everything is mapped to the domain
 * records here, straight after execution.
 */

import { Decimal } from 'decimal.js';

import { entityTypeName } from '../../../categories/index.js';
import { lineItemTotal } from '../../core/scoring.js';
import {
  PENSION_SYSTEMS,
  type CountyEntity,
  type CountySummary,
  type DebtDetails,
  type EntityDetail,
  type EntitySummary,
  type FinancialLineItem,
  type MetricRow,
  type PeerEntity,
  type PensionSystems,
} from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Scalars
// ─────────────────────────────────────────────────────────────────────────────

export type Row = Record<string, unknown>;

export const isRecord = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Numbers, bigints and numeric strings become numbers; anything else is null.
 */
export const toNumberOrNull = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Amount with null treated as zero.
 */
export const toAmount = (value: unknown): number => toNumberOrNull(value) ?? 0;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * ISO calendar date (YYYY-MM-DD). pg parses DATE columns as local midnight,
 * so the local calendar fields are the stored date.
 */
export const toIsoDate = (value: unknown): string | null => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return `${String(value.getFullYear())}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  if (typeof value === 'string') {
    const match = /^\d{4}-\d{2}-\d{2}/.exec(value);
    return match !== null ? match[0] : value;
  }
  return null;
};

/**
 * Descriptive text; binary values are decoded as UTF-8.
 */
export const toText = (value: unknown): string | null => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  if (value instanceof Date) {
    return toIsoDate(value);
  }
  return null;
};

const addAmounts = (...values: unknown[]): number =>
  values.reduce<Decimal>((acc, value) => acc.plus(toAmount(value)), new Decimal(0)).toNumber();

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Entity type label, falling back to the type code's name when the master
 * row has no description.
 */
const toEntityType = (row: Row): string | null => {
  const label = toText(row['EntityType']);
  if (label !== null && label.trim() !== '') {
    return label;
  }
  const code = toText(row['EntityTypeCode']);
  return code === null || code.trim() === '' ? label : entityTypeName(code.trim());
};

export const toEntitySummary = (row: Row): EntitySummary => ({
  Code: toText(row['Code']) ?? '',
  UnitName: toText(row['UnitName']),
  EntityType: toEntityType(row),
  County: toText(row['County']),
});

export const toEntityDetail = (row: Row): EntityDetail => ({
  Code: toText(row['Code']) ?? '',
  UnitName: toText(row['UnitName']),
  EntityType: toEntityType(row),
  EntityTypeCode: toText(row['EntityTypeCode']),
  County: toText(row['County']),
  CEOFName: toText(row['CEOFName']),
  CEOLName: toText(row['CEOLName']),
  CEOTitle: toText(row['CEOTitle']),
  CFOFName: toText(row['CFOFName']),
  CFOLName: toText(row['CFOLName']),
  CFOTitle: toText(row['CFOTitle']),
  Population: toNumberOrNull(row['Population']),
  EquitalizedAssessedValue: toNumberOrNull(row['EquitalizedAssessedValue']),
  FullTimeEmployees: toNumberOrNull(row['FullTimeEmployees']),
  PartTimeEmployees: toNumberOrNull(row['PartTimeEmployees']),
  HomeRule: toText(row['HomeRule']),
  HasDebt: toText(row['HasDebt']),
  HasBondedDebt: toText(row['HasBondedDebt']),
});

export const toCountyEntity = (row: Row): CountyEntity => ({
  Code: toText(row['Code']) ?? '',
  UnitName: toText(row['UnitName']),
  EntityType: toText(row['EntityType']),
  Population: toNumberOrNull(row['Population']),
  EquitalizedAssessedValue: toNumberOrNull(row['EquitalizedAssessedValue']),
});

export const toPeerEntity = (row: Row, targetPopulation: number): PeerEntity => {
  const population = toAmount(row['Population']);
  return {
    Code: toText(row['Code']) ?? '',
    UnitName: toText(row['UnitName']),
    EntityType: toText(row['EntityType']),
    County: toText(row['County']),
    Population: population,
    PopulationDifference: Math.abs(population - targetPopulation),
  };
};

export const toMetricRow = (row: Row): MetricRow => ({
  Code: toText(row['Code']) ?? '',
  UnitName: toText(row['UnitName']),
  EntityType: toText(row['EntityType']),
  County: toText(row['County']),
  MetricValue: toAmount(row['MetricValue']),
});

export const toCountySummary = (row: Row): CountySummary => ({
  County: toText(row['County']),
  EntityCount: toAmount(row['EntityCount']),
  EntityTypeCount: toAmount(row['EntityTypeCount']),
  TotalPopulation: toAmount(row['TotalPopulation']),
  TotalEAV: toAmount(row['TotalEAV']),
  TotalFullTimeEmployees: toAmount(row['TotalFullTimeEmployees']),
  TotalPartTimeEmployees: toAmount(row['TotalPartTimeEmployees']),
  HomeRuleCount: toAmount(row['HomeRuleCount']),
  EntitiesWithDebt: toAmount(row['EntitiesWithDebt']),
});

// ─────────────────────────────────────────────────────────────────────────────
// Financial statements
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps a line-item row (fund columns GN..DP) to a named, totalled record.
 */
export const toLineItem = (row: Row, categoryName: (code: string) => string): FinancialLineItem => {
  const category = toText(row['Category']) ?? '';
  const amounts = {
    GeneralFund: toAmount(row['GN']),
    SpecialRevenue: toAmount(row['SR']),
    CapitalProjects: toAmount(row['CP']),
    DebtService: toAmount(row['DS']),
    Enterprise: toAmount(row['EP']),
    Trust: toAmount(row['TS']),
    Fiduciary: toAmount(row['FD']),
    DebtPrincipal: toAmount(row['DP']),
  };

  return {
    Category: category,
    ...amounts,
    Total: lineItemTotal(amounts),
    CategoryName: categoryName(category),
  };
};

// Column letter of each debt type in the debt schedule
const debtMovements = (row: Row | undefined, letter: string) => ({
  beginning: addAmounts(row?.[`${letter}401`], row?.[`${letter}400`]),
  additions: addAmounts(row?.[`${letter}407`], row?.[`${letter}406`]),
  retirements: addAmounts(row?.[`${letter}413`], row?.[`${letter}412`]),
});

/**
 * All zero when the entity has no debt row.
 */
export const toDebtDetails = (row: Row | undefined): DebtDetails => {
  const goBonds = debtMovements(row, 'a');
  const revenueBonds = debtMovements(row, 'b');
  const altRevenueBonds = debtMovements(row, 'c');
  const contractual = debtMovements(row, 'd');
  const otherDebt = debtMovements(row, 'e');

  return {
    GOBonds_Beginning: goBonds.beginning,
    GOBonds_Additions: goBonds.additions,
    GOBonds_Retirements: goBonds.retirements,
    RevenueBonds_Beginning: revenueBonds.beginning,
    RevenueBonds_Additions: revenueBonds.additions,
    RevenueBonds_Retirements: revenueBonds.retirements,
    AltRevenueBonds_Beginning: altRevenueBonds.beginning,
    AltRevenueBonds_Additions: altRevenueBonds.additions,
    AltRevenueBonds_Retirements: altRevenueBonds.retirements,
    Contractual_Beginning: contractual.beginning,
    Contractual_Additions: contractual.additions,
    Contractual_Retirements: contractual.retirements,
    OtherDebt_Beginning: otherDebt.beginning,
    OtherDebt_Additions: otherDebt.additions,
    OtherDebt_Retirements: otherDebt.retirements,
    TotalDebt_Ending_LongTerm: toAmount(row?.['t404']),
    TotalDebt_Ending_ShortTerm: toAmount(row?.['t410']),
  };
};

/**
 * Systems without a positive total liability are left out.
 */
export const toPensionSystems = (row: Row | undefined): PensionSystems => {
  const systems: PensionSystems = {};
  if (row === undefined) {
    return systems;
  }

  for (const system of PENSION_SYSTEMS) {
    const liability = toAmount(row[`${system}_t501_3`]);
    if (liability > 0) {
      systems[system] = {
        measurement_date: toIsoDate(row[`${system}_t500_3`]),
        total_liability: liability,
        plan_assets: toAmount(row[`${system}_t502_3`]),
        net_position: toAmount(row[`${system}_t503_3`]),
        funded_ratio: toAmount(row[`${system}_t504_3`]),
      };
    }
  }
  return systems;
};
