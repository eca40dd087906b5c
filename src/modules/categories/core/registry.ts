/**
 * Category Registry
 *
 * Maps the short codes used by the fiscal data files to human-readable names.
 * Unknown codes are returned unchanged so callers can always display something.
 */

import tables from './category-tables.json' with { type: 'json' };

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type CategoryLegend = Readonly<Record<string, string>>;

/**
 * The registry's tables, one per code family.
 */
export type CategoryFamily =
  | 'revenue'
  | 'expenditure'
  | 'fundBalance'
  | 'fundType'
  | 'entityType'
  | 'debtType';

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

const LEGENDS: Readonly<Record<CategoryFamily, CategoryLegend>> = {
  revenue: tables.revenue,
  expenditure: tables.expenditure,
  fundBalance: tables.fundBalance,
  fundType: tables.fundType,
  entityType: tables.entityType,
  debtType: tables.debtType,
};

// Maps, so that codes such as "constructor" never resolve to prototype members
const FAMILIES: readonly CategoryFamily[] = [
  'revenue',
  'expenditure',
  'fundBalance',
  'fundType',
  'entityType',
  'debtType',
];

const LOOKUPS: ReadonlyMap<CategoryFamily, ReadonlyMap<string, string>> = new Map(
  FAMILIES.map((family) => [family, new Map(Object.entries(LEGENDS[family]))] as const)
);

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolves a code within one family, falling back to the code itself.
 */
export const categoryName = (family: CategoryFamily, code: string): string =>
  LOOKUPS.get(family)?.get(code) ?? code;

export const revenueCategoryName = (code: string): string => categoryName('revenue', code);

export const expenditureCategoryName = (code: string): string =>
  categoryName('expenditure', code);

export const fundBalanceCategoryName = (code: string): string =>
  categoryName('fundBalance', code);

export const fundTypeName = (code: string): string => categoryName('fundType', code);

export const entityTypeName = (code: string): string => categoryName('entityType', code);

// ─────────────────────────────────────────────────────────────────────────────
// Legends (carried whole in API payloads)
// ─────────────────────────────────────────────────────────────────────────────

export const FUND_TYPE_LEGEND: CategoryLegend = LEGENDS.fundType;

export const FUND_BALANCE_CATEGORY_DESCRIPTIONS: CategoryLegend = LEGENDS.fundBalance;

export const DEBT_TYPE_DESCRIPTIONS: CategoryLegend = LEGENDS.debtType;
