import { Context } from 'hono';
import { ZodError } from 'zod';
import { nanoid } from 'nanoid';
import {
  AppError,
  ConcurrencyConflictError,
  ConflictError,
  DailyLimitExceededError,
  NotFoundError,
  StateError,
  TransientError,
  ValidationError,
} from './errors';

/**
 * JSON body of a request; an empty body reads as `{}`.
 */
export async function readBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON', 'INVALID_JSON');
  }
}

/**
 * Map a thrown error to its HTTP response. Unexpected errors are logged
 * under a reference id and answered with a generic message.
 */
export function errorResponse(c: Context, error: unknown, failure: string): Response {
  if (error instanceof ZodError) {
    return c.json({
      error: 'Invalid request',
      code: 'VALIDATION_FAILED',
      issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    }, 400);
  }
  if (error instanceof ValidationError) {
    return c.json({ error: error.message, code: error.code }, 400);
  }
  if (error instanceof NotFoundError) {
    return c.json({ error: error.message, code: error.code }, 404);
  }
  if (error instanceof ConflictError || error instanceof StateError) {
    return c.json({ error: error.message, code: error.code }, 409);
  }
  if (error instanceof DailyLimitExceededError) {
    return c.json({
      error: error.message,
      code: error.code,
      intervalsToday: error.intervalsToday,
      dailyLimit: error.dailyLimit,
      upgrade: 'premium',
    }, 429);
  }
  if (error instanceof TransientError || error instanceof ConcurrencyConflictError) {
    return c.json({ error: error.message, code: error.code }, 503);
  }

  const referenceId = nanoid(10);
  console.error(`[http] ${failure} (ref ${referenceId}):`, error);
  return c.json({
    error: failure,
    code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
    referenceId,
  }, 500);
}
