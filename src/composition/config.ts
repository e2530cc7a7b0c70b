import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

const booleanFlag = z.preprocess((val) => val === 'true' || val === true, z.boolean());

// Environment validation schema
const environmentSchema = z.enum(['development', 'test', 'production']).default('development');

// Database configuration schema
const databaseSchema = z.object({
  host: z.string().min(1, 'Database host is required').default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  name: z.string().min(1, 'Database name is required').default('app_db'),
  user: z.string().min(1, 'Database user is required').default('postgres'),
  password: z.string().min(1, 'Database password is required').default('postgres'),
  maxConnections: z.coerce.number().int().min(1).max(100).default(20),
  connectionTimeout: z.coerce.number().int().min(1000).default(30000),
  idleTimeout: z.coerce.number().int().min(1000).default(30000),
  ssl: booleanFlag.default(false),
});

// Logging configuration schema
const logSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: booleanFlag.default(false),
});

// Application configuration schema
const appConfigSchema = z.object({
  name: z.string().default('typed-unit-of-work'),
  environment: environmentSchema,
});

// Complete configuration schema
const configSchema = z.object({
  app: appConfigSchema,
  log: logSchema,
  database: databaseSchema,
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type DatabaseConfig = z.infer<typeof databaseSchema>;
export type LogConfig = z.infer<typeof logSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Validates and parses environment variables into a typed configuration object
 * @throws {Error} If validation fails with detailed error messages
 */
export function createConfig(env: NodeJS.ProcessEnv): Config {
  try {
    const rawConfig = {
      app: {
        name: env.APP_NAME,
        environment: env.NODE_ENV,
      },
      log: {
        level: env.LOG_LEVEL,
        pretty: env.PRETTY_LOGS,
      },
      database: {
        host: env.DB_HOST,
        port: env.DB_PORT,
        name: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        maxConnections: env.DB_MAX_CONNECTIONS,
        connectionTimeout: env.DB_CONNECTION_TIMEOUT,
        idleTimeout: env.DB_IDLE_TIMEOUT,
        ssl: env.DB_SSL,
      },
    };

    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errorMessages = error.errors.map(err => {
        const path = err.path.join('.');
        return `${path}: ${err.message}`;
      }).join('\n');

      throw new Error(`Configuration validation failed:\n${errorMessages}`);
    }
    throw error;
  }
}

/**
 * Loads `.env` into the process environment, then validates it
 */
export function loadConfig(): Config {
  loadEnv();
  return createConfig(process.env);
}

export function isTest(config: AppConfig): boolean {
  return config.environment === 'test';
}
