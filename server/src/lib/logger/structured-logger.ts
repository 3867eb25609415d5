/**
 * Structured Logger
 *
 * Features:
 * - JSON output (pino) for machine parsing
 * - Log level from LOG_LEVEL (debug, info, warn, error, silent)
 * - Sensitive data redaction (API keys, auth headers)
 * - Per-request child loggers carry traceId (see requestContext middleware)
 */

import { pino, type Logger } from 'pino';
import { resolveLogLevel } from '../../config/env.js';

/**
 * Singleton logger instance
 * Configure via LOG_LEVEL environment variable
 */
export const logger: Logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { service: 'plate-quote' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'apiKey',
      'adminApiKey',
      'headers.authorization',
      'headers["x-api-key"]',
      'req.headers.authorization',
      'req.headers["x-api-key"]',
    ],
    censor: '[REDACTED]',
  },
});

export type { Logger };
