// Domain
export {
  type Task,
  type CreateTaskInput,
  type CreateTaskRequest,
  type UpdateTaskRequest,
  type ValidationError,
  type ValidationResult,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  isValidTaskId,
  parseTaskId,
  createTask,
  applyTaskUpdate,
  validateTaskFields,
  decodeCreateTaskRequest,
  decodeUpdateTaskRequest,
} from './storage/schema.js';

// Storage
export {
  type Database,
  type OperationContext,
  type TaskRepository,
  TaskRegistry,
  MemoryDatabase,
  FileTaskRepository,
  FileDatabase,
  MongoTaskRepository,
  MongoDatabase,
  openDatabase,
} from './storage/index.js';

// HTTP
export { buildServer, startHttpServer, type BuildServerOptions } from './server/fastify-server.js';
export { TaskHandler, type TaskResponse } from './server/task-handler.js';
export { ApiError, type ErrorBody, type ErrorType } from './server/api-error.js';

// Config
export { loadConfig, ConfigError, type ServiceConfig } from './utils/config.js';
export { type Logger } from './utils/logger.js';
