import { Router } from 'express';
import type { RingBufferSink } from '../sink/ringBufferSink';

/**
 * GET /logs
 *
 * Returns the buffered records as a JSON array, oldest first; `[]` when
 * nothing has been recorded. Serialization works on the snapshot copy only.
 */
export function createLogsRouter(sink: RingBufferSink): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const items = sink.snapshot();
    req.log.debug({ count: items.length }, 'Serving log snapshot');
    res.status(200).json(items);
  });

  return router;
}
