import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { EXPOSURE_MODULE } from '../sink/ringBufferSink';

/**
 * Attaches a unique requestId (UUID v4) to every inbound request and binds a
 * child logger under the exposure server's own module, so request logging
 * reaches the console but never the ring buffer it is serving.
 *
 * Log fields: requestId, method, path, ip
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  const serverLog = logger.child({ module: EXPOSURE_MODULE });

  return (req: Request, _res: Response, next: NextFunction): void => {
    req.requestId = uuidv4();
    req.log = serverLog.child({ requestId: req.requestId });

    req.log.debug(
      { method: req.method, path: req.path, ip: req.ip },
      'Request received',
    );

    next();
  };
}
