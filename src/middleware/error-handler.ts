import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors.util';
import { ValidationError } from '../validators/job-request.validator';

function statusOf(err: Error): number {
  if (err instanceof AppError) return err.statusCode;
  // body-parser errors carry their own status (e.g. 400 for malformed JSON)
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return 500;
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const statusCode = statusOf(err);
  const message = err.message || 'Internal Server Error';

  console.error('Error:', {
    message,
    statusCode,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Don't leak error details in production
  const response = {
    error: message,
    ...(err instanceof ValidationError && { issues: err.issues }),
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  };

  res.status(statusCode).json(response);
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: 'Not Found',
    path: req.path,
  });
}
