import { Router } from 'express';

export const landingRouter = Router();

/**
 * GET /
 * Liveness marker. Never touches the buffer.
 */
landingRouter.get('/', (_req, res) => {
  res.type('text/plain').status(200).send('Logserver online');
});
