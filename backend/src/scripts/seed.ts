import "reflect-metadata";
import { AppDataSource, initializeDatabase } from '../database.js';
import { seedSampleData } from '../services/sampleData.js';
import * as logger from '../utils/logger.js';

async function seed(): Promise<void> {
  try {
    await initializeDatabase(AppDataSource);
    const created = await seedSampleData(AppDataSource);
    logger.info('Seeding finished', { context: 'seed', data: created });
  } finally {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
  }
}

seed().catch((error: unknown) => {
  logger.fatal('Seeding failed', { context: 'seed', error });
  process.exit(1);
});
