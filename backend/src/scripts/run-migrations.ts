import "reflect-metadata";
import { AppDataSource } from '../database.js';
import * as logger from '../utils/logger.js';

const EXPECTED_TABLES = ['categories', 'menu_items', 'dining_tables', 'orders', 'order_items'];

export async function runMigrations(): Promise<void> {
  try {
    if (!AppDataSource.isInitialized) {
      await AppDataSource.initialize();
    }

    const migrations = await AppDataSource.runMigrations();
    if (migrations.length === 0) {
      logger.info('No pending migrations to run', { context: 'migrations' });
    } else {
      logger.info(`Ran ${migrations.length} migrations`, {
        context: 'migrations',
        data: migrations.map((migration) => migration.name)
      });
    }

    const queryRunner = AppDataSource.createQueryRunner();
    try {
      const missing: string[] = [];
      for (const table of EXPECTED_TABLES) {
        if (!(await queryRunner.hasTable(table))) missing.push(table);
      }
      if (missing.length > 0) {
        throw new Error(`Missing required tables: ${missing.join(', ')}`);
      }
    } finally {
      await queryRunner.release();
    }
  } finally {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
  }
}

// Run migrations if this script is executed directly
if (require.main === module) {
  runMigrations().catch((error: unknown) => {
    logger.fatal('Migration failed', { context: 'migrations', error });
    process.exit(1);
  });
}
