import type { Request, Response, NextFunction } from 'express';
import { BadRequestError, isAppError, type AppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

/**
 * Body-parser failures carry a `type` such as 'entity.too.large'
 */
function toBodyParserError(err: Error): AppError | null {
  if (!('type' in err) || typeof err.type !== 'string') return null;

  switch (err.type) {
    case 'entity.too.large':
      return new BadRequestError('Request body exceeds the upload limit');
    case 'entity.parse.failed':
      return new BadRequestError('Invalid JSON in request body');
    case 'request.aborted':
    case 'request.size.invalid':
    case 'encoding.unsupported':
    case 'charset.unsupported':
      return new BadRequestError(err.message);
    default:
      return null;
  }
}

/**
 * Global error handler middleware: maps domain errors to HTTP responses
 * of the form `{ error: CODE, message, details? }` and logs with request context.
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    const appError = isAppError(err) ? err : toBodyParserError(err);

    if (appError) {
      const meta = {
        code: appError.code,
        errorMessage: appError.message,
        details: redactSecrets(appError.details),
        stack: env.NODE_ENV === 'development' ? appError.stack : undefined,
        ...context,
      };
      if (appError.statusCode >= 500) {
        logger.error('Application error', meta);
      } else {
        logger.warn('Application error', meta);
      }

      res.status(appError.statusCode).json({
        error: appError.code,
        message: appError.message,
        ...(appError.details ? { details: redactSecrets(appError.details) } : {}),
      });
      return;
    }

    logger.error('Unexpected error', {
      errorMessage: err.message,
      name: err.name,
      stack: err.stack,
      ...context,
    });

    res.status(500).json({
      error: 'INTERNAL_SERVER_ERROR',
      message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    });
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
