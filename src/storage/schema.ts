import { randomUUID } from 'node:crypto';
import { z } from 'zod';

// ============================================================================
// Task ID
// ============================================================================

const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isValidTaskId(id: unknown): id is string {
  return typeof id === 'string' && ID_PATTERN.test(id);
}

/** Canonical lowercase form, or null when the input is not a UUID. */
export function parseTaskId(id: string): string | null {
  return isValidTaskId(id) ? id.toLowerCase() : null;
}

export function newTaskId(): string {
  return randomUUID();
}

// ============================================================================
// Task
// ============================================================================

export const TITLE_MAX_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 500;

export interface Task {
  id: string;
  title: string;
  description: string;
  completed: boolean;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Request decoding
// ============================================================================

/**
 * Shape checks only. A body that fails here is malformed (BAD_REQUEST);
 * length limits are checked separately so they can be reported per field.
 * JSON null counts as "not set", same as an absent field.
 */
const textField = z.string().nullish().transform(value => value ?? '');

export const createTaskRequestSchema = z.object({
  title: textField,
  description: textField,
}).strict();

export const updateTaskRequestSchema = z.object({
  title: textField,
  description: textField,
  completed: z.boolean().nullish().transform(value => value ?? undefined),
}).strict();

export type CreateTaskRequest = z.infer<typeof createTaskRequestSchema>;
export type UpdateTaskRequest = z.infer<typeof updateTaskRequestSchema>;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): DecodeResult<T> {
  const result = schema.safeParse(body);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, reason: result.error.issues.map(i => i.message).join('; ') };
}

export function decodeCreateTaskRequest(body: unknown): DecodeResult<CreateTaskRequest> {
  return decode(createTaskRequestSchema, body);
}

export function decodeUpdateTaskRequest(body: unknown): DecodeResult<UpdateTaskRequest> {
  return decode(updateTaskRequestSchema, body);
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidationError {
  field: string;
  message: string;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: ValidationError[] };

/** Length in code points, so an emoji counts as one character. */
function charLength(value: string): number {
  return [...value].length;
}

const taskFieldsSchema = z.object({
  title: z.string().refine(
    value => charLength(value) >= 1 && charLength(value) <= TITLE_MAX_LENGTH,
    `must be between 1 and ${TITLE_MAX_LENGTH} characters`,
  ),
  description: z.string().refine(
    value => charLength(value) <= DESCRIPTION_MAX_LENGTH,
    `must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
  ),
});

export function validateTaskFields(input: { title: string; description: string }): ValidationResult {
  const result = taskFieldsSchema.safeParse(input);
  if (result.success) return { valid: true };
  return {
    valid: false,
    errors: result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateTaskInput {
  title: string;
  description: string;
}

export function createTask(input: CreateTaskInput, now: Date = new Date()): Task {
  const timestamp = now.toISOString();
  return {
    id: newTaskId(),
    title: input.title,
    description: input.description,
    completed: false,
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Title and description are always overwritten; completed only when supplied.
 * updated_at never moves backwards, even if the clock does.
 */
export function applyTaskUpdate(task: Task, input: UpdateTaskRequest, now: Date = new Date()): Task {
  const previous = Date.parse(task.updated_at);
  const updatedAt = Number.isNaN(previous) || now.getTime() >= previous
    ? now.toISOString()
    : task.updated_at;

  return {
    ...task,
    title: input.title,
    description: input.description,
    completed: input.completed ?? task.completed,
    updated_at: updatedAt,
  };
}
