import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const HTTP_STATUS_BAD_REQUEST = 400;
const HTTP_STATUS_INTERNAL_SERVER_ERROR = 500;
const NODE_ENV_DEVELOPMENT = 'development';
const SQLITE_ERROR_MARKER = 'SQLITE';

function isDevelopmentEnvironment(): boolean {
  return process.env.NODE_ENV === NODE_ENV_DEVELOPMENT;
}

function handleZodValidationError(err: ZodError, res: Response): void {
  res.status(HTTP_STATUS_BAD_REQUEST).json({
    error: 'Validation Error',
    message: 'Request validation failed',
    details: err.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  });
}

function handleAppError(err: AppError, res: Response): void {
  if (err.statusCode >= HTTP_STATUS_INTERNAL_SERVER_ERROR) {
    logger.error(`${err.name}:`, err.message);
  }
  res.status(err.statusCode).json({
    error: err.name,
    message: err.message,
    ...(isDevelopmentEnvironment() && { stack: err.stack }),
  });
}

function handleDatabaseError(err: Error, res: Response): void {
  logger.error('Database error:', err);
  res.status(HTTP_STATUS_INTERNAL_SERVER_ERROR).json({
    error: 'Database Error',
    message: isDevelopmentEnvironment()
      ? err.message
      : 'An internal database error occurred',
  });
}

function handleUnknownError(err: Error, res: Response): void {
  logger.error('Unhandled error:', err);
  res.status(HTTP_STATUS_INTERNAL_SERVER_ERROR).json({
    error: 'Internal Server Error',
    message: isDevelopmentEnvironment()
      ? err.message
      : 'An unexpected error occurred',
    ...(isDevelopmentEnvironment() && { stack: err.stack }),
  });
}

// Express recognises error middleware by its four parameters.
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    handleZodValidationError(err, res);
    return;
  }

  if (err instanceof AppError) {
    handleAppError(err, res);
    return;
  }

  if (err instanceof MulterError) {
    res.status(HTTP_STATUS_BAD_REQUEST).json({ error: 'Upload Error', message: err.message });
    return;
  }

  if (err.message.includes(SQLITE_ERROR_MARKER)) {
    handleDatabaseError(err, res);
    return;
  }

  handleUnknownError(err, res);
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
}
