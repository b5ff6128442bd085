import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  applyTaskUpdate,
  createTask,
  decodeCreateTaskRequest,
  decodeUpdateTaskRequest,
  parseTaskId,
  validateTaskFields,
  type Task,
} from '../storage/schema.js';
import type { OperationContext, TaskRepository } from '../storage/task-repository.js';
import { logger as defaultLogger, type LogData, type Logger } from '../utils/logger.js';
import { badRequest, internalError, notFound, validationError } from './api-error.js';

export interface TaskParams {
  id: string;
}

type TaskRequest = FastifyRequest<{ Params: TaskParams }>;

export interface TaskResponse {
  id: string;
  title: string;
  description: string;
  completed: boolean;
  created_at: string;
  updated_at: string;
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    created_at: task.created_at,
    updated_at: task.updated_at,
  };
}

export interface TaskHandlerOptions {
  repository: TaskRepository;
  logger?: Logger;
  /** Clock for timestamps; injectable for tests. */
  now?: () => Date;
}

/**
 * The five task operations. Each one decodes and validates its input before
 * touching the repository, calls it once (Update also looks the task up
 * first), and turns the outcome into a response or an ApiError.
 */
export class TaskHandler {
  private readonly repository: TaskRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TaskHandlerOptions) {
    this.repository = options.repository;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async getAll(_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    this.logger.info('Fetching all tasks');
    const ctx = this.contextFor(reply);

    const tasks = await this.execute('retrieve tasks', {}, () => this.repository.findAll(ctx));

    this.logger.info('Successfully retrieved tasks', { count: tasks.length });
    return reply.code(200).send({ tasks: tasks.map(toTaskResponse) });
  }

  async create(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    this.logger.info('Creating new task');

    const decoded = decodeCreateTaskRequest(request.body);
    if (!decoded.ok) {
      this.logger.warn('Invalid JSON format in request', { error: decoded.reason });
      throw badRequest('Invalid JSON format');
    }
    this.validate(decoded.value, 'create', {});

    const task = createTask(decoded.value, this.now());
    const ctx = this.contextFor(reply);
    await this.execute('create task', { task_id: task.id }, () => this.repository.create(task, ctx));

    this.logger.info('Task created successfully', { task_id: task.id, title: task.title });
    return reply.code(201).send({ task: toTaskResponse(task) });
  }

  async getById(request: TaskRequest, reply: FastifyReply): Promise<FastifyReply> {
    const id = this.parseId(request, 'get');
    this.logger.info('Fetching task by ID', { task_id: id });
    const ctx = this.contextFor(reply);

    const task = await this.execute('retrieve task', { task_id: id }, () => this.repository.findById(id, ctx));
    if (!task) {
      this.logger.info('Task not found', { task_id: id });
      throw notFound('Task not found');
    }

    this.logger.info('Task retrieved successfully', { task_id: id });
    return reply.code(200).send({ task: toTaskResponse(task) });
  }

  async update(request: TaskRequest, reply: FastifyReply): Promise<FastifyReply> {
    const id = this.parseId(request, 'update');
    this.logger.info('Updating task', { task_id: id });

    const decoded = decodeUpdateTaskRequest(request.body);
    if (!decoded.ok) {
      this.logger.warn('Invalid JSON format in update request', { error: decoded.reason, task_id: id });
      throw badRequest('Invalid JSON format');
    }
    this.validate(decoded.value, 'update', { task_id: id });
    const ctx = this.contextFor(reply);

    const existing = await this.execute('retrieve task', { task_id: id }, () => this.repository.findById(id, ctx));
    if (!existing) {
      this.logger.info('Task not found for update', { task_id: id });
      throw notFound('Task not found');
    }

    const task = applyTaskUpdate(existing, decoded.value, this.now());
    const matched = await this.execute('update task', { task_id: id }, () => this.repository.update(id, task, ctx));
    if (!matched) {
      // Deleted between the lookup and the write
      this.logger.info('Task disappeared before update', { task_id: id });
      throw notFound('Task not found');
    }

    this.logger.info('Task updated successfully', { task_id: id, title: task.title });
    return reply.code(200).send({ task: toTaskResponse(task) });
  }

  async delete(request: TaskRequest, reply: FastifyReply): Promise<FastifyReply> {
    const id = this.parseId(request, 'delete');
    this.logger.info('Deleting task', { task_id: id });
    const ctx = this.contextFor(reply);

    const deleted = await this.execute('delete task', { task_id: id }, () => this.repository.delete(id, ctx));
    if (!deleted) {
      this.logger.info('Task not found for delete', { task_id: id });
      throw notFound('Task not found');
    }

    this.logger.info('Task deleted successfully', { task_id: id });
    return reply.code(204).send();
  }

  /** Aborted when the client goes away before the response is written. */
  private contextFor(reply: FastifyReply): OperationContext {
    const controller = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });
    return { signal: controller.signal };
  }

  private parseId(request: TaskRequest, operation: string): string {
    const raw = request.params.id;
    const id = parseTaskId(raw);
    if (!id) {
      this.logger.warn(`Invalid task ID format for ${operation}`, { id: raw });
      throw badRequest('Invalid task ID format');
    }
    return id;
  }

  private validate(input: { title: string; description: string }, operation: string, context: LogData): void {
    const result = validateTaskFields(input);
    if (!result.valid) {
      this.logger.warn(`Validation failed for ${operation} request`, { ...context, errors: result.errors });
      throw validationError('Validation failed', result.errors);
    }
  }

  /** Repository failures are logged in full here and surface only as an opaque INTERNAL_ERROR. */
  private async execute<T>(action: string, context: LogData, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Failed to ${action} in repository`, { ...context, error });
      throw internalError(`Failed to ${action}`);
    }
  }
}
