import "reflect-metadata";
import { Server } from 'http';
import { createApp } from './app.js';
import { config } from './config/env.js';
import { AppDataSource, initializeDatabase } from './database.js';
import { seedSampleData } from './services/sampleData.js';
import * as logger from './utils/logger.js';

async function start(): Promise<Server> {
  await initializeDatabase(AppDataSource);

  if (config.SEED_SAMPLE_DATA) {
    await seedSampleData(AppDataSource);
  }

  const app = createApp(AppDataSource);
  const server = app.listen(config.PORT, () => {
    logger.info(`Server listening on port ${config.PORT}`, { context: 'server' });
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal} signal`, { context: 'server' });
    server.close(() => {
      AppDataSource.destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error closing database connection', { context: 'server', error });
          process.exit(1);
        });
    });
  };

  // Handle graceful shutdown
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

start().catch((error: unknown) => {
  logger.fatal('Failed to start server', { context: 'server', error });
  process.exit(1);
});
