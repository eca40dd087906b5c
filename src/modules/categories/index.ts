/**
 * Categories module exports
 */

export {
  categoryName,
  revenueCategoryName,
  expenditureCategoryName,
  fundBalanceCategoryName,
  fundTypeName,
  entityTypeName,
  FUND_TYPE_LEGEND,
  FUND_BALANCE_CATEGORY_DESCRIPTIONS,
  DEBT_TYPE_DESCRIPTIONS,
  type CategoryFamily,
  type CategoryLegend,
} from './core/registry.js';
