import type { FastifyInstance } from 'fastify';
import type { TaskHandler, TaskParams } from './task-handler.js';

export const TASKS_PREFIX = '/api/v1/tasks';

export function registerTaskRoutes(app: FastifyInstance, handler: TaskHandler) {
  app.register(async (tasks) => {
    // List tasks
    tasks.get('/', (request, reply) => handler.getAll(request, reply));

    // Create task
    tasks.post('/', (request, reply) => handler.create(request, reply));

    // Get single task
    tasks.get<{ Params: TaskParams }>('/:id', (request, reply) => handler.getById(request, reply));

    // Update task
    tasks.put<{ Params: TaskParams }>('/:id', (request, reply) => handler.update(request, reply));

    // Delete task
    tasks.delete<{ Params: TaskParams }>('/:id', (request, reply) => handler.delete(request, reply));
  }, { prefix: TASKS_PREFIX });
}
