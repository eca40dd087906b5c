/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  APP_VERSION: Type.String({ default: '1.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Data source
  DATA_SOURCE: Type.Union([Type.Literal('file'), Type.Literal('warehouse')], {
    default: 'file',
  }),
  FILE_DATABASE_PATH: Type.String({ minLength: 1, default: './data/fiscal.sqlite' }),
  WAREHOUSE_DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  WAREHOUSE_SCHEMA: Type.Optional(Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' })),
  QUERY_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 100, maximum: 300_000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    APP_VERSION: env['APP_VERSION'] ?? '1.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_SOURCE: env['DATA_SOURCE'] ?? 'file',
    FILE_DATABASE_PATH: env['FILE_DATABASE_PATH'] ?? './data/fiscal.sqlite',
    WAREHOUSE_DATABASE_URL: emptyToUndefined(env['WAREHOUSE_DATABASE_URL']),
    WAREHOUSE_SCHEMA: emptyToUndefined(env['WAREHOUSE_SCHEMA']),
    QUERY_TIMEOUT_MS: parseInteger(env['QUERY_TIMEOUT_MS'], 30_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.DATA_SOURCE === 'warehouse' && rawEnv.WAREHOUSE_DATABASE_URL === undefined) {
    throw new Error(
      'Invalid environment configuration: WAREHOUSE_DATABASE_URL is required when DATA_SOURCE=warehouse'
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    version: env.APP_VERSION,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  dataSource: {
    kind: env.DATA_SOURCE,
    /** Desktop database file, opened read-only */
    filePath: env.FILE_DATABASE_PATH,
    warehouseUrl: env.WAREHOUSE_DATABASE_URL,
    /** Schema that qualifies every warehouse table (the warehouse "dataset") */
    warehouseSchema: env.WAREHOUSE_SCHEMA,
  },
  query: {
    timeoutMs: env.QUERY_TIMEOUT_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
