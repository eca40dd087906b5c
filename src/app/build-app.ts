/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createChildLogger } from '../infra/logger/index.js';
import { makeFiscalFacade } from '../modules/fiscal/shell/facade/fiscal-facade.js';
import { makeFiscalRoutes } from '../modules/fiscal/shell/rest/routes.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';

import type { DataSourceKind } from '../infra/database/client.js';
import type { FiscalRepository } from '../modules/fiscal/core/ports.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  fiscalRepo: FiscalRepository;
  /** Active backend, as reported by the health endpoint */
  dataSource: { kind: DataSourceKind; location: string };
  /** Outcome of the start-up connection check */
  connectionTested: boolean;
  logger: Logger;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version: string;
  now?: () => Date;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;

  const app = fastifyLib(fastifyOptions);

  // Set before any plugin so every route inherits it.
  // Framework errors (schema validation, malformed requests) use the fiscal envelope
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation != null) {
      return reply.status(400).send({
        status: 'error',
        error_message: `Invalid request: ${error.message}`,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        status: 'error',
        error_message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      status: 'error',
      error_message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      status: 'error',
      error_message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      version,
      checkers: deps.healthCheckers ?? [],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Fiscal data
  // ─────────────────────────────────────────────────────────────────────────────
  const facade = makeFiscalFacade({
    fiscalRepo: deps.fiscalRepo,
    logger: createChildLogger(deps.logger, { module: 'fiscal' }),
    dataSource: deps.dataSource,
    connectionTested: deps.connectionTested,
    version,
    ...(options.now !== undefined && { now: options.now }),
  });

  await app.register(makeFiscalRoutes({ facade }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
