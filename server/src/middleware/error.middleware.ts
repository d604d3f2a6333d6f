/**
 * Error Middleware
 * Last handler in the chain. Raw error messages are logged, never returned.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../lib/logger/structured-logger.js';

export interface ErrorBody {
  error: string;
  code: string;
  details?: unknown;
  traceId: string;
}

function isBodyParseError(error: unknown): error is { type: string; status: number } {
  return typeof error === 'object' && error !== null &&
    'type' in error && error.type === 'entity.parse.failed' &&
    'status' in error && typeof error.status === 'number';
}

export function validationErrorBody(error: ZodError, traceId: string): ErrorBody {
  return {
    error: 'Invalid request',
    code: 'VALIDATION_ERROR',
    details: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    traceId
  };
}

export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // Express recognizes error handlers by arity
  _next: NextFunction
): void {
  const traceId = req.traceId ?? 'unknown';

  if (error instanceof ZodError) {
    res.status(400).json(validationErrorBody(error, traceId));
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON', traceId } satisfies ErrorBody);
    return;
  }

  logger.error({
    traceId,
    event: 'unhandled_error',
    method: req.method,
    path: req.path,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  }, '[HTTP] Unhandled error');

  if (res.headersSent) {
    return;
  }

  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', traceId } satisfies ErrorBody);
}
