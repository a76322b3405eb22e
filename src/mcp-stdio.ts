/**
 * MCP stdio entry point
 * stdout carries protocol frames, so every log line goes to stderr
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { createContextProvider, loadDataset } from './modules/dataset/index.js';
import { runMcpServerStdio } from './modules/insights/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
    destination: 'stderr',
  });

  const contextProvider = createContextProvider({
    load: () => loadDataset(config.dataset.dataDir),
    logger,
    source: config.dataset.dataDir,
  });

  const context = await contextProvider.get();
  if (context.isErr()) {
    logger.fatal({ error: context.error }, 'Cannot start without a valid dataset');
    process.exit(1);
  }

  const server = await runMcpServerStdio({ contextProvider, logger, version: config.version });
  logger.info('MCP server listening on stdio');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await server.close();
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
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
