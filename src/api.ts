/**
 * API server entry point
 * Loads the dataset, then starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, prettyTransport } from './infra/logger/index.js';
import { createContextProvider, loadDataset } from './modules/dataset/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, dataset: config.dataset } },
    'Starting API server'
  );

  const contextProvider = createContextProvider({
    load: () => loadDataset(config.dataset.dataDir),
    logger,
    source: config.dataset.dataDir,
  });

  // Refuse to serve until the dataset is valid
  const context = await contextProvider.get();
  if (context.isErr()) {
    logger.fatal({ error: context.error }, 'Cannot start without a valid dataset');
    process.exit(1);
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport() }),
      },
      disableRequestLogging: false,
    },
    deps: { contextProvider },
    version: config.version,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
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

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
