import type { FastifyReply } from 'fastify';
import type { ValidationError } from '../storage/schema.js';

export const ERROR_TYPES = {
  validation: 'VALIDATION_ERROR',
  notFound: 'NOT_FOUND',
  badRequest: 'BAD_REQUEST',
  internal: 'INTERNAL_ERROR',
  unauthorized: 'UNAUTHORIZED',
} as const;

export type ErrorType = (typeof ERROR_TYPES)[keyof typeof ERROR_TYPES];

const STATUS_CODES: Record<ErrorType, number> = {
  VALIDATION_ERROR: 400,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  UNAUTHORIZED: 401,
};

/** Wire shape of every non-2xx response. */
export interface ErrorBody {
  type: ErrorType;
  message: string;
  details?: ValidationError[];
}

export class ApiError extends Error {
  readonly statusCode: number;

  constructor(
    readonly type: ErrorType,
    message: string,
    readonly details?: ValidationError[],
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = STATUS_CODES[type];
  }

  toJSON(): ErrorBody {
    const body: ErrorBody = { type: this.type, message: this.message };
    if (this.details?.length) body.details = this.details;
    return body;
  }
}

export const validationError = (message: string, details: ValidationError[]) =>
  new ApiError(ERROR_TYPES.validation, message, details);

export const notFound = (message: string) => new ApiError(ERROR_TYPES.notFound, message);

export const badRequest = (message: string) => new ApiError(ERROR_TYPES.badRequest, message);

export const internalError = (message: string) => new ApiError(ERROR_TYPES.internal, message);

// Reserved; nothing in the service raises it yet
export const unauthorized = (message: string) => new ApiError(ERROR_TYPES.unauthorized, message);

export function sendError(reply: FastifyReply, error: ApiError): FastifyReply {
  return reply.code(error.statusCode).type('application/json').send(error.toJSON());
}
