import type { Logger } from 'pino';

declare module 'express-serve-static-core' {
  interface Request {
    /** UUID v4 assigned per-request; included in every request log line. */
    requestId: string;
    /** Child logger bound to the exposure server module and requestId. */
    log: Logger;
  }
}
