import { createApp } from './api/server';
import { loadConfig, resolveFromBackend } from './config/env';
import { initDatabase, healthCheck, closeDatabase } from './db/connection';
import { ensureSchema } from './db/init';
import { getOcrService } from './services/ocr/OcrService';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10000;
const EXIT_SUCCESS = 0;
const EXIT_ERROR = 1;

function buildServerUrls(port: number): { base: string; api: string; health: string } {
  const base = `http://localhost:${port}`;
  return {
    base,
    api: `${base}/api`,
    health: `${base}/api/health`,
  };
}

async function start(): Promise<void> {
  const config = loadConfig();
  logger.info(`Starting server in ${config.NODE_ENV} mode...`);

  await initDatabase({
    path: resolveFromBackend(config.DATABASE_PATH),
    verbose: config.NODE_ENV === 'development',
  });

  if (!(await healthCheck())) {
    throw new Error('Database health check failed');
  }
  logger.info('Database connected and healthy');

  await ensureSchema();

  const app = createApp();

  const server = app.listen(config.PORT, () => {
    const urls = buildServerUrls(config.PORT);
    logger.info(`Server running on ${urls.base}`);
    logger.info(`API available at ${urls.api}`);
    logger.info(`Health check: ${urls.health}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');

      Promise.all([getOcrService().terminate(), closeDatabase()])
        .then(() => process.exit(EXIT_SUCCESS))
        .catch((err: unknown) => {
          logger.error('Error during shutdown:', err);
          process.exit(EXIT_ERROR);
        });
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(EXIT_ERROR);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  logger.error('Failed to start server:', err);
  process.exit(EXIT_ERROR);
});
