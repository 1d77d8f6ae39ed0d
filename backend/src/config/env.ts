import * as dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";

const envPath = path.resolve(process.cwd(), ".env.local");

// Load environment variables
if (process.env.NODE_ENV !== "production") {
  dotenv.config({ path: envPath });
}

const booleanFlag = z
  .enum(["true", "false"])
  .optional()
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),

  DB_TYPE: z.enum(["postgres", "better-sqlite3"]).default("better-sqlite3"),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default("restaurant.db"),
  DB_LOGGING: booleanFlag,

  SEED_SAMPLE_DATA: booleanFlag,
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL", "silent"]).default("INFO"),
  CORS_ORIGIN: z.string().default("*"),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate process environment into a typed config.
 * Throws when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const config = parsed.data;
  if (config.DB_TYPE === "postgres" && !config.DATABASE_URL) {
    throw new Error("DATABASE_URL is required when DB_TYPE is postgres");
  }
  return config;
}

export const config = loadConfig();
