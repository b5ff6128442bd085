import { describe, it, expect, vi, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { configureLogger, isLogLevel, logger } from '../utils/logger.js';

const LOG_DIR = '/tmp/logger-test/logs';

function readEntries(): Record<string, unknown>[] {
  const [file] = readdirSync(LOG_DIR).map(String);
  return readFileSync(join(LOG_DIR, file), 'utf-8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

describe('logger', () => {
  afterEach(() => {
    configureLogger({ level: undefined, dataDir: undefined });
  });

  it('recognizes the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('appends JSON lines to a dated file and drops entries below the level', async () => {
    configureLogger({ level: 'info', dataDir: '/tmp/logger-test' });

    logger.debug('hidden');
    logger.info('Task created', { task_id: 'abc' });
    logger.error('Failed to create task in repository', { error: new Error('boom') });

    await vi.waitFor(() => {
      expect(existsSync(LOG_DIR)).toBe(true);
      expect(readEntries()).toHaveLength(2);
    });

    expect(readdirSync(LOG_DIR).map(String)).toEqual([
      `task-service-${new Date().toISOString().split('T')[0]}.log`,
    ]);

    const [info, error] = readEntries();
    expect(info).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      message: 'Task created',
      task_id: 'abc',
    });
    expect(error).toEqual({
      timestamp: expect.any(String),
      level: 'error',
      message: 'Failed to create task in repository',
      error: { name: 'Error', message: 'boom', stack: expect.any(String) },
    });
  });
});
