import { appendFile, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { paths } from './paths.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const levelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

let configured: { level?: LogLevel; dataDir?: string } = {};

/** Override the LOG_LEVEL / TASKS_DATA_DIR defaults, e.g. from loaded config. */
export function configureLogger(options: { level?: LogLevel; dataDir?: string }): void {
  configured = { ...configured, ...options };
}

function getLogLevel(): LogLevel {
  if (configured.level) return configured.level;
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function getLogDir(): string {
  return join(configured.dataDir ?? paths.dataDir, 'logs');
}

function getLogFile(): string {
  const date = new Date().toISOString().split('T')[0];
  return join(getLogDir(), `task-service-${date}.log`);
}

/** Error values don't survive JSON.stringify, so flatten them first. */
function serialize(data?: LogData): LogData {
  if (!data) return {};
  const out: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return out;
}

function write(level: LogLevel, message: string, data?: LogData): void {
  if (levelPriority[level] < levelPriority[getLogLevel()]) return;

  const logDir = getLogDir();
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const entry = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...serialize(data),
  });

  appendFile(getLogFile(), entry + '\n', (err) => {
    if (err) {
      process.stderr.write(`Logger error: ${err.message}\n`);
    }
  });
}

export const logger: Logger = {
  debug: (message, data) => write('debug', message, data),
  info: (message, data) => write('info', message, data),
  warn: (message, data) => write('warn', message, data),
  error: (message, data) => write('error', message, data),
};
