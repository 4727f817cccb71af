import { Request, Response, NextFunction } from 'express';

/**
 * Logs one line per request once the response is sent
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;
    if (res.statusCode >= 500) {
      console.error(`✗ ${line}`);
    } else {
      console.log(line);
    }
  });

  next();
}
