/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDataSource } from './infra/database/client.js';
import { createLogger, prettyTransport } from './infra/logger/index.js';
import { makeFiscalRepo } from './modules/fiscal/shell/repo/fiscal-repo.js';
import { makeDbHealthChecker } from './modules/health/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, dataSource: config.dataSource.kind } },
    'Starting API server'
  );

  // Created once and injected; closed on shutdown
  const dataSource = initDataSource(config);
  const fiscalRepo = makeFiscalRepo(dataSource, { queryTimeoutMs: config.query.timeoutMs });

  // Start-up connection check. A failure is logged and reported by /api/v1/health, but
  // does not stop the server.
  const connectionCheck = await fiscalRepo.countEntities();
  const connectionTested = connectionCheck.isOk();
  if (connectionCheck.isOk()) {
    logger.info(
      {
        dataSource: dataSource.kind,
        location: dataSource.location,
        entityCount: connectionCheck.value,
      },
      'Data source connection successful'
    );
  } else {
    logger.error(
      {
        dataSource: dataSource.kind,
        location: dataSource.location,
        err: connectionCheck.error.cause,
      },
      `Data source connection failed: ${connectionCheck.error.message}`
    );
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      fiscalRepo,
      dataSource: { kind: dataSource.kind, location: dataSource.location },
      connectionTested,
      logger,
      healthCheckers: [makeDbHealthChecker(dataSource, { name: dataSource.kind })],
    },
    version: config.server.version,
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await dataSource.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await dataSource.destroy();
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
