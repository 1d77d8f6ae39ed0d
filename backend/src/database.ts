import "reflect-metadata";
import { DataSource, DataSourceOptions, EntityManager } from "typeorm";
import { config, AppConfig } from "./config/env.js";
import { entities } from "./entities/index.js";
import { InitialSchema1000000000000 } from "./migrations/1000000000000-InitialSchema.js";
import { AddValidationConstraints1000000000001 } from "./migrations/1000000000001-AddValidationConstraints.js";
import * as logger from "./utils/logger.js";

/**
 * Build DataSource options from config. Postgres runs migrations;
 * SQLite (local development) synchronises the schema from the entities.
 */
export function buildDataSourceOptions(appConfig: AppConfig): DataSourceOptions {
  if (appConfig.DB_TYPE === "postgres") {
    return {
      type: "postgres",
      url: appConfig.DATABASE_URL,
      ssl: appConfig.NODE_ENV === "production" ? { rejectUnauthorized: false } : false,
      synchronize: false,
      logging: appConfig.DB_LOGGING,
      entities,
      migrations: [InitialSchema1000000000000, AddValidationConstraints1000000000001],
      migrationsRun: appConfig.NODE_ENV === "production",
      migrationsTableName: "migrations"
    };
  }

  return {
    type: "better-sqlite3",
    database: appConfig.SQLITE_PATH,
    synchronize: true,
    logging: appConfig.DB_LOGGING,
    entities
  };
}

export function createDataSource(options: DataSourceOptions): DataSource {
  return new DataSource(options);
}

export const AppDataSource = createDataSource(buildDataSourceOptions(config));

// Maximum number of retries for database initialisation
const MAX_RETRIES = 3;
// Delay between retries in milliseconds (exponential backoff)
const RETRY_DELAY_BASE = 500;

/**
 * Initialize the database connection with retry logic.
 * Rethrows the last error once retries are exhausted.
 */
export async function initializeDatabase(dataSource: DataSource = AppDataSource): Promise<DataSource> {
  let retries = 0;

  while (true) {
    if (dataSource.isInitialized) {
      logger.debug("Database already initialized", { context: "database" });
      return dataSource;
    }

    try {
      await dataSource.initialize();
      logger.info("Database connection established", {
        context: "database",
        data: { type: dataSource.options.type }
      });
      return dataSource;
    } catch (error) {
      retries++;
      logger.error(`Error connecting to database (attempt ${retries}/${MAX_RETRIES})`, {
        context: "database",
        error
      });

      if (retries >= MAX_RETRIES) {
        throw error;
      }

      const delay = RETRY_DELAY_BASE * Math.pow(2, retries - 1);
      logger.info(`Retrying database initialization in ${delay}ms`, { context: "database" });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

/**
 * Check if the database connection is healthy
 */
export async function isDatabaseHealthy(dataSource: DataSource = AppDataSource): Promise<boolean> {
  try {
    if (!dataSource.isInitialized) {
      logger.warn("Database not initialized, health check failed", { context: "database" });
      return false;
    }

    await dataSource.query("SELECT 1");
    return true;
  } catch (error) {
    logger.error("Database health check failed", { context: "database", error });
    return false;
  }
}

// Pending work per SQLite DataSource; every caller shares one connection there
const sqliteQueues = new WeakMap<DataSource, Promise<void>>();

function usesSharedConnection(dataSource: DataSource): boolean {
  return dataSource.options.type === "better-sqlite3" || dataSource.options.type === "sqlite";
}

/**
 * Run `work` once earlier work on the same SQLite DataSource has settled.
 * Other drivers pool connections and run it straight away.
 */
async function runExclusive<T>(dataSource: DataSource, work: () => Promise<T>): Promise<T> {
  if (!usesSharedConnection(dataSource)) {
    return work();
  }

  const previous = sqliteQueues.get(dataSource) ?? Promise.resolve();
  const run = previous.then(() => work());
  sqliteQueues.set(
    dataSource,
    run.then(
      () => undefined,
      () => undefined
    )
  );
  return run;
}

/**
 * Read through the DataSource manager. On SQLite the read waits for open
 * transactions, so it never sees uncommitted rows.
 */
export async function withManager<T>(
  dataSource: DataSource,
  work: (manager: EntityManager) => Promise<T>
): Promise<T> {
  return runExclusive(dataSource, () => work(dataSource.manager));
}

/**
 * Run `work` inside one transaction. Everything written through the
 * provided manager commits together or is rolled back. Must not be
 * nested inside withManager or another withTransaction.
 */
export async function withTransaction<T>(
  dataSource: DataSource,
  work: (manager: EntityManager) => Promise<T>
): Promise<T> {
  return runExclusive(dataSource, async () => {
    const queryRunner = dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  });
}
