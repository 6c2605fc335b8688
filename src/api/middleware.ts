/**
 * API middleware — error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, createTypedError, TypedError, typedErrorOf } from '../domain/errors';
import { logger } from '../logger';

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const typedError = typedErrorOf(err);
  if (typedError) {
    const status = getHttpStatus(typedError);
    logger.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}
