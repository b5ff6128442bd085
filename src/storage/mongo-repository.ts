import { MongoClient, type Collection, type Db } from 'mongodb';
import type { Task } from './schema.js';
import type { Database, OperationContext, TaskRepository } from './task-repository.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export const TASKS_COLLECTION = 'tasks';
export const DEFAULT_REPOSITORY_TIMEOUT_MS = 5_000;

export interface TaskDocument {
  _id: string;
  title: string;
  description: string;
  completed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toDocument(task: Task): TaskDocument {
  return {
    _id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    createdAt: new Date(task.created_at),
    updatedAt: new Date(task.updated_at),
  };
}

export function fromDocument(doc: TaskDocument): Task {
  return {
    id: doc._id,
    title: doc.title,
    description: doc.description,
    completed: doc.completed,
    created_at: doc.createdAt.toISOString(),
    updated_at: doc.updatedAt.toISOString(),
  };
}

export class MongoTaskRepository implements TaskRepository {
  constructor(
    private readonly collection: Collection<TaskDocument>,
    private readonly logger: Logger = defaultLogger,
    private readonly timeoutMs: number = DEFAULT_REPOSITORY_TIMEOUT_MS,
  ) {}

  private run<T>(operation: string, work: Promise<T>, ctx?: OperationContext): Promise<T> {
    return withTimeout(operation, this.timeoutMs, work, ctx?.signal);
  }

  async create(task: Task, ctx?: OperationContext): Promise<void> {
    this.logger.debug('Creating task in MongoDB', { task_id: task.id });
    try {
      await this.run('insertOne', this.collection.insertOne(toDocument(task)), ctx);
    } catch (error) {
      this.logger.error('MongoDB insert failed', { error, task_id: task.id });
      throw new Error(`failed to create task: ${describe(error)}`, { cause: error });
    }
  }

  async findById(id: string, ctx?: OperationContext): Promise<Task | undefined> {
    this.logger.debug('Finding task by ID in MongoDB', { task_id: id });
    try {
      const doc = await this.run('findOne', this.collection.findOne({ _id: id }), ctx);
      return doc ? fromDocument(doc) : undefined;
    } catch (error) {
      this.logger.error('MongoDB find failed', { error, task_id: id });
      throw new Error(`failed to find task: ${describe(error)}`, { cause: error });
    }
  }

  async findAll(ctx?: OperationContext): Promise<Task[]> {
    this.logger.debug('Finding all tasks in MongoDB');
    try {
      const docs = await this.run('find', this.collection.find({}).toArray(), ctx);
      this.logger.debug('All tasks retrieved from MongoDB', { count: docs.length });
      return docs.map(fromDocument);
    } catch (error) {
      this.logger.error('MongoDB find all failed', { error });
      throw new Error(`failed to find tasks: ${describe(error)}`, { cause: error });
    }
  }

  async update(id: string, task: Task, ctx?: OperationContext): Promise<boolean> {
    this.logger.debug('Updating task in MongoDB', { task_id: id });
    const doc = toDocument(task);
    try {
      const result = await this.run('updateOne', this.collection.updateOne(
        { _id: id },
        {
          $set: {
            title: doc.title,
            description: doc.description,
            completed: doc.completed,
            updatedAt: doc.updatedAt,
          },
        },
      ), ctx);
      return result.matchedCount > 0;
    } catch (error) {
      this.logger.error('MongoDB update failed', { error, task_id: id });
      throw new Error(`failed to update task: ${describe(error)}`, { cause: error });
    }
  }

  async delete(id: string, ctx?: OperationContext): Promise<boolean> {
    this.logger.debug('Deleting task from MongoDB', { task_id: id });
    try {
      const result = await this.run('deleteOne', this.collection.deleteOne({ _id: id }), ctx);
      return result.deletedCount > 0;
    } catch (error) {
      this.logger.error('MongoDB delete failed', { error, task_id: id });
      throw new Error(`failed to delete task: ${describe(error)}`, { cause: error });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface MongoDatabaseOptions {
  uri: string;
  dbName: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class MongoDatabase implements Database {
  private readonly repository: MongoTaskRepository;

  private constructor(
    private readonly client: MongoClient,
    private readonly db: Db,
    private readonly timeoutMs: number,
    logger: Logger,
  ) {
    this.repository = new MongoTaskRepository(db.collection<TaskDocument>(TASKS_COLLECTION), logger, timeoutMs);
  }

  /** Connect and ping; fails fast when the server is unreachable. */
  static async connect(options: MongoDatabaseOptions): Promise<MongoDatabase> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_REPOSITORY_TIMEOUT_MS;
    const client = new MongoClient(options.uri, { serverSelectionTimeoutMS: timeoutMs });

    try {
      await client.connect();
    } catch (error) {
      throw new Error(`failed to connect to MongoDB: ${describe(error)}`, { cause: error });
    }

    const database = new MongoDatabase(client, client.db(options.dbName), timeoutMs, options.logger ?? defaultLogger);
    try {
      await database.ping();
    } catch (error) {
      await client.close();
      throw new Error(`failed to ping MongoDB: ${describe(error)}`, { cause: error });
    }
    return database;
  }

  async ping(ctx?: OperationContext): Promise<void> {
    await withTimeout('ping', this.timeoutMs, this.db.command({ ping: 1 }), ctx?.signal);
  }

  async disconnect(): Promise<void> {
    await this.client.close();
  }

  getTaskRepository(): MongoTaskRepository {
    return this.repository;
  }
}
