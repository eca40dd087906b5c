import Database from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import pg from 'pg';

import type { FiscalDatabase } from './fiscal/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type FiscalDbClient = Kysely<FiscalDatabase>;

/**
 * The two interchangeable tabular sources.
 * - `file`: a desktop database file opened read-only
 * - `warehouse`: a PostgreSQL warehouse, optionally schema-qualified
 */
export type DataSourceKind = 'file' | 'warehouse';

/**
 * A connected data source. Created once at start-up and injected into the
 * repository; `destroy` releases the underlying connection or pool.
 */
export interface FiscalDataSource {
  readonly kind: DataSourceKind;
  readonly db: FiscalDbClient;
  /** File path or `host/database[.schema]`, for diagnostics only */
  readonly location: string;
  /** Schema that qualifies every table (warehouse only) */
  readonly schema?: string;
  destroy(): Promise<void>;
}

/**
 * Opens a desktop database file. Writes are rejected by the driver.
 */
export const createFileDataSource = (filePath: string): FiscalDataSource => {
  const db = new Kysely<FiscalDatabase>({
    dialect: new SqliteDialect({
      database: new Database(filePath, { readonly: true, fileMustExist: true }),
    }),
  });

  return {
    kind: 'file',
    db,
    location: filePath,
    destroy: () => db.destroy(),
  };
};

/**
 * Describes a connection string without its credentials.
 */
const describeConnection = (connectionString: string, schema: string | undefined): string => {
  // key=value connection strings keep the generic label
  let base = 'warehouse';
  if (URL.canParse(connectionString)) {
    const url = new URL(connectionString);
    base = `${url.host}${url.pathname}`;
  }
  return schema !== undefined ? `${base}.${schema}` : base;
};

/**
 * Connects to the warehouse through a pg pool.
 */
export const createWarehouseDataSource = (
  connectionString: string,
  schema?: string
): FiscalDataSource => {
  const db = new Kysely<FiscalDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });

  return {
    kind: 'warehouse',
    db,
    location: describeConnection(connectionString, schema),
    ...(schema !== undefined && { schema }),
    destroy: () => db.destroy(),
  };
};

/**
 * Initialize the configured data source
 */
export const initDataSource = (config: AppConfig): FiscalDataSource => {
  const { dataSource } = config;

  if (dataSource.kind === 'file') {
    return createFileDataSource(dataSource.filePath);
  }

  if (dataSource.warehouseUrl === undefined || dataSource.warehouseUrl === '') {
    throw new Error('Missing configuration for the warehouse (WAREHOUSE_DATABASE_URL)');
  }

  return createWarehouseDataSource(dataSource.warehouseUrl, dataSource.warehouseSchema);
};

// Re-export types
export * from './fiscal/types.js';
