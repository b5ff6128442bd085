import { readFileSync, writeFileSync, mkdirSync, existsSync, readdirSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import matter from 'gray-matter';
import { z } from 'zod';
import { isValidTaskId, type Task } from './schema.js';
import type { Database, TaskRepository } from './task-repository.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

const TASKS_DIR = 'tasks';

// YAML turns unquoted ISO dates into Date objects; accept both
const timestampSchema = z.union([
  z.string(),
  z.date().transform(date => date.toISOString()),
]);

const frontmatterSchema = z.object({
  id: z.string().refine(id => isValidTaskId(id), 'must be a UUID'),
  title: z.string(),
  completed: z.boolean(),
  created_at: timestampSchema,
  updated_at: timestampSchema,
});

/**
 * One markdown file per task: metadata in YAML frontmatter, description as
 * the body. File I/O is synchronous, so each operation completes before any
 * other request can observe the directory.
 */
export class FileTaskRepository implements TaskRepository {
  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  private get tasksPath(): string {
    return join(this.dataDir, TASKS_DIR);
  }

  private ensureDir(dir: string): void {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /** Create the tasks directory up front so permission problems surface at startup. */
  ensureReady(): void {
    this.ensureDir(this.tasksPath);
  }

  // Only well-formed ids reach the filesystem, so ids can't escape the tasks directory
  private taskFilePath(id: string): string | null {
    return isValidTaskId(id) ? join(this.tasksPath, `${id}.md`) : null;
  }

  private taskToMarkdown(task: Task): string {
    const { description, ...frontmatter } = task;
    // Trailing newline is ours; markdownToTask strips exactly one
    return matter.stringify(`${description}\n`, frontmatter);
  }

  private markdownToTask(content: string): Task {
    const { data, content: body } = matter(content);
    const meta = frontmatterSchema.parse(data);
    const description = body.endsWith('\n') ? body.slice(0, -1) : body;
    return { ...meta, description };
  }

  /** undefined only when the file does not exist; unreadable or malformed files throw. */
  private readTask(filePath: string): Task | undefined {
    try {
      return this.markdownToTask(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
      this.logger.error('Task file read failed', { file: filePath, error });
      throw new Error(`failed to read task file ${filePath}: ${describe(error)}`, { cause: error });
    }
  }

  private writeTask(filePath: string, task: Task): void {
    this.ensureDir(this.tasksPath);
    writeFileSync(filePath, this.taskToMarkdown(task));
  }

  async create(task: Task): Promise<void> {
    const path = this.taskFilePath(task.id);
    if (!path) {
      throw new Error(`Cannot save task with invalid id: ${task.id}`);
    }
    this.writeTask(path, task);
    this.logger.debug('Task file written', { task_id: task.id });
  }

  async findById(id: string): Promise<Task | undefined> {
    const path = this.taskFilePath(id);
    return path ? this.readTask(path) : undefined;
  }

  async findAll(): Promise<Task[]> {
    if (!existsSync(this.tasksPath)) return [];

    const tasks: Task[] = [];
    for (const file of readdirSync(this.tasksPath).filter(f => f.endsWith('.md'))) {
      const task = this.readTask(join(this.tasksPath, file));
      if (task) tasks.push(task);
    }
    return tasks;
  }

  async update(id: string, task: Task): Promise<boolean> {
    const path = this.taskFilePath(id);
    const existing = path ? this.readTask(path) : undefined;
    if (!path || !existing) return false;

    this.writeTask(path, {
      ...existing,
      title: task.title,
      description: task.description,
      completed: task.completed,
      updated_at: task.updated_at,
    });
    return true;
  }

  async delete(id: string): Promise<boolean> {
    const path = this.taskFilePath(id);
    if (!path || !existsSync(path)) return false;
    unlinkSync(path);
    return true;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileDatabase implements Database {
  private readonly repository: FileTaskRepository;

  constructor(dataDir: string, logger?: Logger) {
    this.repository = new FileTaskRepository(dataDir, logger);
  }

  async ping(): Promise<void> {
    this.repository.ensureReady();
  }

  async disconnect(): Promise<void> {}

  getTaskRepository(): FileTaskRepository {
    return this.repository;
  }
}
