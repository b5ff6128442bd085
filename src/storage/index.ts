import type { ServiceConfig } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import { FileDatabase } from './file-repository.js';
import { MongoDatabase } from './mongo-repository.js';
import { MemoryDatabase } from './task-registry.js';
import type { Database } from './task-repository.js';

export type { Database, OperationContext, TaskRepository } from './task-repository.js';
export { TaskRegistry, MemoryDatabase } from './task-registry.js';
export { FileTaskRepository, FileDatabase } from './file-repository.js';
export { MongoTaskRepository, MongoDatabase } from './mongo-repository.js';

/** Open the configured storage backend and confirm it is reachable. */
export async function openDatabase(
  config: Pick<ServiceConfig, 'storage' | 'mongoUri' | 'mongoDb' | 'dataDir' | 'repositoryTimeoutMs'>,
  logger: Logger,
): Promise<Database> {
  switch (config.storage) {
    case 'memory':
      return new MemoryDatabase();
    case 'file': {
      const db = new FileDatabase(config.dataDir, logger);
      await db.ping();
      return db;
    }
    case 'mongo':
      return MongoDatabase.connect({
        uri: config.mongoUri,
        dbName: config.mongoDb,
        timeoutMs: config.repositoryTimeoutMs,
        logger,
      });
  }
}
