import type { Task } from './schema.js';
import type { Database, TaskRepository } from './task-repository.js';
import { ReadWriteLock } from './rw-lock.js';

/**
 * In-memory task collection behind a single read/write lock.
 *
 * Records are copied on the way in and out, so nothing outside the registry
 * holds a reference into the map.
 */
export class TaskRegistry implements TaskRepository {
  private readonly tasks = new Map<string, Task>();
  private readonly lock = new ReadWriteLock();

  async create(task: Task): Promise<void> {
    const record = { ...task };
    await this.lock.write(() => {
      this.tasks.set(record.id, record);
    });
  }

  async findById(id: string): Promise<Task | undefined> {
    return this.lock.read(() => {
      const task = this.tasks.get(id);
      return task ? { ...task } : undefined;
    });
  }

  async findAll(): Promise<Task[]> {
    return this.lock.read(() => Array.from(this.tasks.values(), task => ({ ...task })));
  }

  async update(id: string, task: Task): Promise<boolean> {
    return this.lock.write(() => {
      const existing = this.tasks.get(id);
      if (!existing) return false;

      this.tasks.set(id, {
        ...existing,
        title: task.title,
        description: task.description,
        completed: task.completed,
        updated_at: task.updated_at,
      });
      return true;
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.lock.write(() => this.tasks.delete(id));
  }

  get size(): number {
    return this.tasks.size;
  }
}

export class MemoryDatabase implements Database {
  private readonly registry = new TaskRegistry();

  async ping(): Promise<void> {}

  async disconnect(): Promise<void> {}

  getTaskRepository(): TaskRegistry {
    return this.registry;
  }
}
