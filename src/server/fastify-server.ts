import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerTaskRoutes, TASKS_PREFIX } from './task-routes.js';
import { TaskHandler } from './task-handler.js';
import { ApiError, badRequest, internalError, notFound, sendError } from './api-error.js';
import { openDatabase } from '../storage/index.js';
import type { TaskRepository } from '../storage/task-repository.js';
import { configureLogger, logger as defaultLogger, type Logger } from '../utils/logger.js';
import { loadConfig, type ServiceConfig } from '../utils/config.js';
import { paths } from '../utils/paths.js';

export interface BuildServerOptions {
  repository: TaskRepository;
  logger?: Logger;
  now?: () => Date;
}

function isClientError(error: FastifyError): boolean {
  return error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500;
}

/**
 * Assemble the HTTP app around a repository. Does not listen; tests drive it
 * with `app.inject`.
 */
export function buildServer(options: BuildServerOptions): FastifyInstance {
  const logger = options.logger ?? defaultLogger;
  const app = Fastify({ logger: false });

  // CORS
  app.register(cors, { origin: '*' });

  // Access log
  app.addHook('onResponse', async (request, reply) => {
    logger.info('Request completed', {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      response_time_ms: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ApiError) {
      return sendError(reply, error);
    }
    // Body parser failures: invalid JSON, empty body, wrong content type, too large
    if (isClientError(error)) {
      logger.warn('Malformed request', { method: request.method, url: request.url, code: error.code, error: error.message });
      return sendError(reply, badRequest('Invalid JSON format'));
    }
    logger.error('Unhandled error', { method: request.method, url: request.url, error });
    return sendError(reply, internalError('Internal server error'));
  });

  app.setNotFoundHandler((request, reply) => {
    logger.info('Route not found', { method: request.method, url: request.url });
    return sendError(reply, notFound('Route not found'));
  });

  const handler = new TaskHandler({ repository: options.repository, logger, now: options.now });
  registerTaskRoutes(app, handler);

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  // Version endpoint
  app.get('/version', async () => paths.getVersion());

  return app;
}

/**
 * Open storage, build the app and listen. SIGTERM/SIGINT close the app,
 * which disconnects the database.
 */
export async function startHttpServer(config: ServiceConfig = loadConfig()): Promise<FastifyInstance> {
  configureLogger({ level: config.logLevel, dataDir: config.dataDir });
  const logger = defaultLogger;

  logger.info('Starting task service', { storage: config.storage });
  const database = await openDatabase(config, logger);
  logger.info('Storage ready', { storage: config.storage });

  const app = buildServer({ repository: database.getTaskRepository(), logger });
  app.addHook('onClose', async () => {
    await database.disconnect();
    logger.info('Storage disconnected');
  });

  await app.listen({ port: config.port, host: config.host });

  console.log(`Task service running on http://localhost:${config.port} (storage: ${config.storage})`);
  console.log('API endpoints:');
  console.log('  GET    /health');
  console.log(`  GET    ${TASKS_PREFIX}`);
  console.log(`  POST   ${TASKS_PREFIX}`);
  console.log(`  GET    ${TASKS_PREFIX}/{id}`);
  console.log(`  PUT    ${TASKS_PREFIX}/{id}`);
  console.log(`  DELETE ${TASKS_PREFIX}/{id}`);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log('Shutting down gracefully...');
    logger.info('Shutdown requested', { signal });
    await app.close();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  return app;
}
