// =============================================================================
// GAZETTE - Request Hygiene Middleware
//
// Covers:
//   - Request IDs for tracing
//   - Null-byte stripping in JSON bodies
//   - Not-found and error responses (no stack traces in production)
// Headers, CORS and rate limiting come from helmet, cors and
// express-rate-limit (see app.ts).
// =============================================================================

import { randomBytes } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import '../types/auth';
import { config } from '../config';
import { log } from '../utils/log';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `gzt-${Date.now()}-${randomBytes(3).toString('hex')}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

/**
 * Strip null bytes from string values in the parsed body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = sanitizeValue(req.body);
    }
    next();
  };
}

export function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\0/g, '');
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value && typeof value === 'object') {
    const clean: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      clean[key] = sanitizeValue(entry);
    }
    return clean;
  }
  return value;
}

// ── Fallthrough Handlers ───────────────────────────────────────────────

export function notFoundHandler(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const isProd = config.nodeEnv === 'production';
    const error = err instanceof Error ? err : new Error(String(err));

    // Malformed JSON bodies surface here from express.json()
    if ('type' in error && error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    log.error('Server', `Unhandled error on ${req.method} ${req.path}: ${error.message}`, {
      requestId: req.requestId,
      stack: isProd ? undefined : error.stack,
    });

    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
      ...(isProd ? {} : { stack: error.stack }),
    });
  };
}
