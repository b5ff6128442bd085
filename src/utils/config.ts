import { z } from 'zod';
import { paths } from './paths.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const STORAGE_DRIVERS = ['memory', 'file', 'mongo'] as const;
export type StorageDriver = (typeof STORAGE_DRIVERS)[number];

export interface ServiceConfig {
  port: number;
  host: string;
  storage: StorageDriver;
  mongoUri: string;
  mongoDb: string;
  dataDir: string;
  repositoryTimeoutMs: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: { variable: string; message: string }[]) {
    super(`Invalid configuration: ${issues.map(i => `${i.variable} ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  TASKS_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  TASKS_HOST: z.string().min(1).default('0.0.0.0'),
  TASKS_STORAGE: z.enum(STORAGE_DRIVERS).default('mongo'),
  TASKS_MONGO_URI: z.string().min(1).default('mongodb://127.0.0.1:27017'),
  TASKS_MONGO_DB: z.string().min(1).default('tasks'),
  TASKS_DATA_DIR: z.string().optional(),
  TASKS_REPOSITORY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(LOG_LEVELS).default('info'),
  ),
});

/**
 * Build the service configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => ({
      variable: issue.path.join('.'),
      message: issue.message,
    })));
  }

  const parsed = result.data;
  return {
    port: parsed.TASKS_PORT,
    host: parsed.TASKS_HOST,
    storage: parsed.TASKS_STORAGE,
    mongoUri: parsed.TASKS_MONGO_URI,
    mongoDb: parsed.TASKS_MONGO_DB,
    dataDir: paths.resolveDataDir(parsed.TASKS_DATA_DIR),
    repositoryTimeoutMs: parsed.TASKS_REPOSITORY_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
