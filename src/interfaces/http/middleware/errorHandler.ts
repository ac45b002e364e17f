/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Sits at the end of the middleware chain. Express 5 forwards rejected
 * promises from async handlers here, so controllers never wrap their work in
 * try/catch.
 *
 *   - Operational errors (AppError, including every CollectorError) are
 *     logged at "warn" and answered with their own statusCode and message.
 *     Collector errors also name their class in `error` (ConfigError,
 *     AuthError, DiscoveryError...), so a caller can tell a bad request from
 *     an unreachable source.
 *   - Malformed JSON bodies (body-parser sets `status` 400) get a 400.
 *   - Anything else is a programmer error: logged at "error", answered with a
 *     generic 500 that leaks no internals.
 *
 * Express recognizes this as an error handler because it has FOUR parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import { CollectorError } from '@shared/errors/CollectorError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
      ...(err instanceof CollectorError && { error: err.name }),
    });
    return;
  }

  if (isClientError(err)) {
    logger.warn({ statusCode: err.status, message: err.message }, 'Rejected request');
    res.status(err.status).json({
      status: 'error',
      message: 'Malformed request body',
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}

function isClientError(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}
