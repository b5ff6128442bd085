import type { Task } from './schema.js';

/** Per-call context. Implementations may abort outstanding work when the signal fires. */
export interface OperationContext {
  signal?: AbortSignal;
}

/**
 * Storage contract consumed by the task handler.
 *
 * Absent records are never errors: `findById` resolves `undefined`, and
 * `update`/`delete` on an unknown id succeed as no-ops, resolving `false`.
 */
export interface TaskRepository {
  create(task: Task, ctx?: OperationContext): Promise<void>;
  findById(id: string, ctx?: OperationContext): Promise<Task | undefined>;
  findAll(ctx?: OperationContext): Promise<Task[]>;
  /** Replaces the mutable fields. Resolves whether a record matched. */
  update(id: string, task: Task, ctx?: OperationContext): Promise<boolean>;
  /** Resolves whether a record was removed. */
  delete(id: string, ctx?: OperationContext): Promise<boolean>;
}

/** A repository plus the connection lifecycle used at startup and shutdown. */
export interface Database {
  ping(ctx?: OperationContext): Promise<void>;
  disconnect(): Promise<void>;
  getTaskRepository(): TaskRepository;
}
