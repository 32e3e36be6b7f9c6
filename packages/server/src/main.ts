// Process entry point
//
// Starts the tRPC HTTP server at /trpc and the expiry sweeper, and shuts
// both down on SIGINT/SIGTERM.

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { ExpirySweeper, consoleLogger, errorMessage, type Logger } from '@bhr/runtime';
import { loadConfig } from './config.js';
import { closeDb, getRepositoryContext, storageKind } from './db.js';
import { closeServer, listen } from './http.js';
import { createContextFactory, createServices } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

async function main(logger: Logger): Promise<void> {
  const config = loadConfig();
  const storage = storageKind(config);
  const repos = getRepositoryContext(config);

  if (storage === 'memory' && config.env === 'production') {
    logger.warn('DATABASE_URL is not set; blocks will not survive a restart');
  }

  const services = createServices({ repos, logger, storage });
  const sweeper = new ExpirySweeper({
    repos,
    intervalMs: config.sweepIntervalMs,
    logger,
  });

  const server = createHTTPServer({
    basePath: '/trpc/',
    router: appRouter,
    createContext: createContextFactory(services, {
      devMode: config.env !== 'production',
      tokens: config.apiTokens,
    }),
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        logger.error('Unhandled error in procedure', { path, error: errorMessage(error.cause ?? error) });
      }
    },
  });

  try {
    await listen(server, config.port, config.host);
  } catch (error) {
    await closeDb();
    throw error;
  }
  sweeper.start();
  logger.info('Server listening', {
    host: config.host,
    port: config.port,
    storage,
    env: config.env,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    await sweeper.stop();
    await closeServer(server);
    await closeDb();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exitCode = 1;
      });
    });
  }
}

main(consoleLogger).catch((error: unknown) => {
  consoleLogger.error('Failed to start', { error: errorMessage(error) });
  process.exit(1);
});
