import type { Request, Response, NextFunction } from 'express';

// Sent on every response. A wildcard origin together with
// Allow-Credentials: true is not honoured by browsers for credentialed
// requests; the API uses no cookies or auth, so only plain requests matter.
export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin':      '*',
  'Access-Control-Allow-Methods':     'POST, GET, PATCH, OPTIONS, DELETE',
  'Access-Control-Allow-Headers':     '*',
  'Access-Control-Allow-Credentials': 'true',
};

/**
 * Sets the CORS headers before any route runs, so 404s and error responses
 * carry them too. The status code is left to the handler; preflight
 * (OPTIONS) requests are answered here with 204.
 */
export function cors(req: Request, res: Response, next: NextFunction): void {
  res.set(CORS_HEADERS);

  if (req.method === 'OPTIONS') {
    res.status(204).end();
    return;
  }

  next();
}
