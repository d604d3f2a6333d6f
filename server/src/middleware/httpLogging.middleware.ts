/**
 * HTTP Logging Middleware
 *
 * - One log line per request (method, path)
 * - One log line per response (status, duration)
 * - Level follows the status code
 * - All logs include traceId via req.log
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.debug({
    msg: 'HTTP request',
    method: req.method,
    path: req.path
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      msg: 'HTTP response',
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration
    });
  });

  next();
}
