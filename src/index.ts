/**
 * index.ts
 * Process entry point: load configuration, build the context, serve HTTP
 */

import 'dotenv/config';

import { createApp } from './app.js';
import { ConfigManager } from './config/config.js';
import { createAppContext, startMaintenance } from './context.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const configManager = new ConfigManager();
  const configFile = process.env.DISPATCH_CONFIG_FILE;
  if (configFile) {
    await configManager.loadFromFile(configFile);
  }
  const config = configManager.getConfig();
  logger.setLevel(config.logLevel);

  const context = createAppContext(config);
  const stopMaintenance = startMaintenance(context);
  const app = createApp(context);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Inference dispatch listening on ${config.host}:${config.port}`);
    logger.info(`API endpoints:`);
    logger.info(`  - Tasks:      GET    /api/tasks, /api/tasks/:taskId`);
    logger.info(`  - Tasks:      POST   /api/tasks/:taskId/cancel`);
    logger.info(`  - Tasks:      DELETE /api/tasks/:taskId`);
    logger.info(`  - Inference:  GET    /api/inference/models`);
    logger.info(`  - Inference:  POST   /api/inference/:modelType/tasks`);
    logger.info(`  - Inference:  POST   /api/inference/:modelType/invoke`);
    logger.info(`  - Health:     GET    /api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`);
    stopMaintenance();

    // Force exit after timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    // Stop accepting new connections, then let running jobs settle
    server.close(() => {
      logger.info('HTTP server closed');
      void context.jobs.drain().then(() => {
        process.exit(0);
      });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start', { error: getErrorMessage(error) });
  process.exit(1);
});
