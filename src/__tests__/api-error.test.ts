import { describe, it, expect } from 'vitest';
import { ApiError, badRequest, internalError, notFound, unauthorized, validationError } from '../server/api-error.js';

describe('ApiError', () => {
  it('maps each type to its HTTP status', () => {
    expect(validationError('Validation failed', []).statusCode).toBe(400);
    expect(badRequest('Invalid JSON format').statusCode).toBe(400);
    expect(notFound('Task not found').statusCode).toBe(404);
    expect(internalError('Failed to create task').statusCode).toBe(500);
    expect(unauthorized('Unauthorized').statusCode).toBe(401);
  });

  it('serializes details only when there are some', () => {
    expect(JSON.parse(JSON.stringify(notFound('Task not found')))).toEqual({
      type: 'NOT_FOUND',
      message: 'Task not found',
    });
    expect(validationError('Validation failed', []).toJSON()).toEqual({
      type: 'VALIDATION_ERROR',
      message: 'Validation failed',
    });
    expect(validationError('Validation failed', [{ field: 'title', message: 'must be between 1 and 100 characters' }]).toJSON())
      .toEqual({
        type: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: [{ field: 'title', message: 'must be between 1 and 100 characters' }],
      });
  });

  it('is a real Error', () => {
    const error = unauthorized('Unauthorized');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ApiError);
    expect(error.type).toBe('UNAUTHORIZED');
  });
});
