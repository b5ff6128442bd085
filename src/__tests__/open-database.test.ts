import { describe, it, expect, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { FileDatabase, MemoryDatabase, openDatabase } from '../storage/index.js';
import { FileTaskRepository } from '../storage/file-repository.js';

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const base = {
  mongoUri: 'mongodb://127.0.0.1:27017',
  mongoDb: 'tasks',
  dataDir: '/tmp/open-database',
  repositoryTimeoutMs: 100,
};

describe('openDatabase', () => {
  it('opens the in-memory registry', async () => {
    const db = await openDatabase({ ...base, storage: 'memory' }, logger);
    expect(db).toBeInstanceOf(MemoryDatabase);
  });

  it('opens file storage and prepares its directory', async () => {
    const db = await openDatabase({ ...base, storage: 'file' }, logger);

    expect(db).toBeInstanceOf(FileDatabase);
    expect(db.getTaskRepository()).toBeInstanceOf(FileTaskRepository);
    expect(existsSync('/tmp/open-database/tasks')).toBe(true);
  });
});
