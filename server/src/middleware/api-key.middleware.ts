/**
 * API Key Middleware
 * Shared-secret guard via the x-api-key header.
 * An empty expected key leaves the route open.
 */

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export function requireApiKey(expectedKey: string, scope: 'quote' | 'admin'): RequestHandler {
  const expected = expectedKey.trim();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      next();
      return;
    }

    const header = req.headers['x-api-key'];
    const provided = typeof header === 'string' ? header.trim() : '';

    if (!provided || !keysMatch(provided, expected)) {
      req.log.warn({ path: req.path, scope }, '[Auth] Missing or invalid API key');

      res.status(401).json({
        error: 'Unauthorized',
        code: 'INVALID_API_KEY',
        traceId: req.traceId
      });
      return;
    }

    next();
  };
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
