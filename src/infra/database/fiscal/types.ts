// Ignore naming conventions for database tables: column names follow the published data files.

/**
 * Numeric columns come back as numbers from the file backend and as strings
 * (numeric / bigint) from the warehouse backend.
 */
export type NumericColumn = number | string | null;

/**
 * Dates are stored as DATE in the warehouse and as ISO text in the file database.
 */
export type DateColumn = Date | string | null;

// Entity master
export interface UnitData {
  Code: string;
  UnitName: string | null;
  /** Entity type label, e.g. "Village" */
  Description: string | null;
  /** Entity type code, e.g. "32" */
  C4: string | null;
  County: string | null;
  CEOFName: string | null;
  CEOLName: string | null;
  CEOTitle: string | null;
  CFOFName: string | null;
  CFOLName: string | null;
  CFOTitle: string | null;
}

// Entity statistics ('Y' / 'N' flags)
export interface UnitStats {
  Code: string;
  Pop: NumericColumn;
  EAV: NumericColumn;
  FULL_EMP: NumericColumn;
  PART_EMP: NumericColumn;
  HomeRule: string | null;
  Utilities: string | null;
  TIF_District: string | null;
  AccountingMethod: string | null;
  Debt: string | null;
  BondedDebt: string | null;
}

// Revenues, Expenditures and FundBalances share one layout: one row per (Code, Category)
export interface LineItems {
  Code: string;
  Category: string;
  GN: NumericColumn;
  SR: NumericColumn;
  CP: NumericColumn;
  DS: NumericColumn;
  EP: NumericColumn;
  TS: NumericColumn;
  FD: NumericColumn;
  DP: NumericColumn;
}

// Debt schedule: letters a-e are debt types; 400/401 beginning, 406/407 additions, 412/413 retirements
export interface Indebtedness {
  Code: string;
  a400: NumericColumn;
  a401: NumericColumn;
  a406: NumericColumn;
  a407: NumericColumn;
  a412: NumericColumn;
  a413: NumericColumn;
  b400: NumericColumn;
  b401: NumericColumn;
  b406: NumericColumn;
  b407: NumericColumn;
  b412: NumericColumn;
  b413: NumericColumn;
  c400: NumericColumn;
  c401: NumericColumn;
  c406: NumericColumn;
  c407: NumericColumn;
  c412: NumericColumn;
  c413: NumericColumn;
  d400: NumericColumn;
  d401: NumericColumn;
  d406: NumericColumn;
  d407: NumericColumn;
  d412: NumericColumn;
  d413: NumericColumn;
  e400: NumericColumn;
  e401: NumericColumn;
  e406: NumericColumn;
  e407: NumericColumn;
  e412: NumericColumn;
  e413: NumericColumn;
  /** Total long-term debt, end of year */
  t404: NumericColumn;
  /** Total short-term debt, end of year */
  t410: NumericColumn;
}

// Pension systems: _t500_3 measurement date, _t501_3 liability, _t502_3 assets,
// _t503_3 net position, _t504_3 funded ratio (percent)
export interface Pensions {
  Code: string;
  IMRF_t500_3: DateColumn;
  IMRF_t501_3: NumericColumn;
  IMRF_t502_3: NumericColumn;
  IMRF_t503_3: NumericColumn;
  IMRF_t504_3: NumericColumn;
  Police_t500_3: DateColumn;
  Police_t501_3: NumericColumn;
  Police_t502_3: NumericColumn;
  Police_t503_3: NumericColumn;
  Police_t504_3: NumericColumn;
  Fire_t500_3: DateColumn;
  Fire_t501_3: NumericColumn;
  Fire_t502_3: NumericColumn;
  Fire_t503_3: NumericColumn;
  Fire_t504_3: NumericColumn;
  OPEB_t500_3: DateColumn;
  OPEB_t501_3: NumericColumn;
  OPEB_t502_3: NumericColumn;
  OPEB_t503_3: NumericColumn;
  OPEB_t504_3: NumericColumn;
}

export interface FiscalDatabase {
  UnitData: UnitData;
  UnitStats: UnitStats;
  Revenues: LineItems;
  Expenditures: LineItems;
  FundBalances: LineItems;
  Indebtedness: Indebtedness;
  Pensions: Pensions;
}

export type FiscalTableName = keyof FiscalDatabase;

/**
 * Every table the service reads, in catalogue order.
 */
export const FISCAL_TABLES: readonly FiscalTableName[] = [
  'UnitData',
  'UnitStats',
  'Revenues',
  'Expenditures',
  'FundBalances',
  'Indebtedness',
  'Pensions',
];
