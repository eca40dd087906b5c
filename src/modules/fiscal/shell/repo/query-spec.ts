/**
 * Logical query specifications.
 *
 * Every read the repository performs is one of these. A renderer turns a spec
 * into parameterized SQL for the active backend; user input only ever travels
 * as a parameter.
 */

import type { LineItemKind, RankMetric, RankOrder } from '../../core/types.js';

export type LineItemTableName = 'Revenues' | 'Expenditures' | 'FundBalances';

export const LINE_ITEM_TABLES: Readonly<Record<LineItemKind, LineItemTableName>> = {
  revenues: 'Revenues',
  expenditures: 'Expenditures',
  fundBalances: 'FundBalances',
};

/**
 * Same-type filter for peers: by entity type code when the target has one,
 * otherwise by the (case-insensitive) type label.
 */
export type PeerTypeFilter =
  | { readonly column: 'code'; readonly value: string }
  | { readonly column: 'label'; readonly value: string };

export type QuerySpec =
  | { readonly op: 'searchEntities'; readonly term: string; readonly limit: number }
  | { readonly op: 'getEntity'; readonly code: string }
  | { readonly op: 'getLineItems'; readonly table: LineItemTableName; readonly code: string }
  | { readonly op: 'getDebt'; readonly code: string }
  | { readonly op: 'getPensions'; readonly code: string }
  | {
      readonly op: 'getEntitiesByCounty';
      readonly county: string;
      readonly entityType?: string;
    }
  | {
      readonly op: 'getPeerEntities';
      /** Target entity, excluded from its own peers */
      readonly code: string;
      readonly targetPopulation: number;
      readonly minPopulation: number;
      readonly maxPopulation: number;
      readonly typeFilter?: PeerTypeFilter;
      readonly limit: number;
    }
  | {
      readonly op: 'rankEntities';
      readonly metric: RankMetric;
      readonly order: RankOrder;
      readonly entityType?: string;
      readonly county?: string;
      readonly limit: number;
    }
  | { readonly op: 'getCountySummary'; readonly county: string }
  | { readonly op: 'countEntities' };

export type QueryOperation = QuerySpec['op'];

/**
 * Escapes LIKE wildcards so the term matches literally; the escape character is '\'.
 */
export const escapeLikePattern = (term: string): string => term.replace(/[\\%_]/g, '\\$&');
