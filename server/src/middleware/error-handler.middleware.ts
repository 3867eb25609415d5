/**
 * Error Handler Middleware
 * Maps pricing error kinds to HTTP responses:
 * - ValidationError    -> 422 (caller's input)
 * - ConfigurationError -> 500 (our knobs)
 * - anything else      -> 500
 */

import type { Request, Response, NextFunction } from 'express';
import { ConfigurationError, ValidationError } from '../services/pricing/pricing.errors.js';

export function errorHandlerMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof ValidationError) {
    res.status(422).json({
      error: 'VALIDATION_ERROR',
      message: error.message,
      issues: error.issues,
      traceId: req.traceId
    });
    return;
  }

  if (error instanceof ConfigurationError) {
    req.log.error({ reason: error.reason, path: req.path }, '[Pricing] Configuration error');

    res.status(500).json({
      error: 'CONFIGURATION_ERROR',
      reason: error.reason,
      traceId: req.traceId
    });
    return;
  }

  // express.json() parse failures carry a 4xx status
  if (isHttpError(error) && error.status >= 400 && error.status < 500) {
    res.status(error.status).json({
      error: 'BAD_REQUEST',
      message: error.message,
      traceId: req.traceId
    });
    return;
  }

  req.log.error({ err: error, path: req.path }, '[HTTP] Unhandled error');

  res.status(500).json({
    error: 'INTERNAL_ERROR',
    traceId: req.traceId
  });
}

function isHttpError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}
