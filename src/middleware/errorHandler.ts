import type { Request, Response, NextFunction } from 'express';

/** HTTP status carried by an error (`status` or `statusCode`), or 500. */
export function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    const candidate = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    if (typeof candidate === 'number' && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

/**
 * Global error handler. Client errors keep their status and message; anything
 * else is reported as a generic 500. CORS headers were already set upstream.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status  = statusOf(err);
  const message = err instanceof Error ? err.message : 'Internal server error';

  if (status >= 500) {
    req.log.error({ error: message, status }, 'Unhandled error');
    res.status(status).json({ error: 'Internal server error' });
    return;
  }

  req.log.warn({ error: message, status }, 'Request failed');
  res.status(status).json({ error: message });
}
