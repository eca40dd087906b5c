/**
 * Backend-specific SQL fragments.
 *
 * Kysely's dialect compilers already take care of identifier quoting and
 * placeholder syntax ($1 vs ?); these traits cover what differs beyond that.
 */

import { sql, type Expression, type RawBuilder, type SqlBool } from 'kysely';

import type { DataSourceKind } from '@/infra/database/client.js';

export interface DialectTraits {
  readonly kind: DataSourceKind;
  /**
   * Case-insensitive LIKE. The pattern must already have its wildcards
   * escaped with '\'.
   */
  likeInsensitive(column: Expression<unknown>, pattern: string): RawBuilder<SqlBool>;
}

/**
 * Desktop database file (SQLite): no ILIKE, so both sides are lowered.
 */
export const FILE_DIALECT_TRAITS: DialectTraits = {
  kind: 'file',
  likeInsensitive: (column, pattern) =>
    sql<SqlBool>`lower(${column}) like lower(${pattern}) escape '\\'`,
};

/**
 * Warehouse (PostgreSQL).
 */
export const WAREHOUSE_DIALECT_TRAITS: DialectTraits = {
  kind: 'warehouse',
  likeInsensitive: (column, pattern) => sql<SqlBool>`${column} ilike ${pattern} escape '\\'`,
};

export const dialectTraitsFor = (kind: DataSourceKind): DialectTraits =>
  kind === 'file' ? FILE_DIALECT_TRAITS : WAREHOUSE_DIALECT_TRAITS;

/**
 * Case-insensitive equality; portable across both backends.
 */
export const equalsInsensitive = (column: Expression<unknown>, value: string): RawBuilder<SqlBool> =>
  sql<SqlBool>`lower(${column}) = lower(${value})`;
