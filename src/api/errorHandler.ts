import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

const SENSITIVE_KEYS = [/secret/i, /token/i, /auth/i, /credential/i, /api[_-]?key/i];

/**
 * Redact sensitive fields from request bodies and error details
 */
export function redactFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactFields);
  }
  if (!value || typeof value !== 'object') {
    return redactSecrets(value);
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    redacted[key] = SENSITIVE_KEYS.some((pattern) => pattern.test(key))
      ? '[REDACTED]'
      : redactFields(entry);
  }
  return redacted;
}

/**
 * Global error handler: AppError subclasses map to their status code and
 * `{ error: code, message, details }`; anything else is a 500.
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      body: redactFields(req.body),
    };

    if (isAppError(err)) {
      const level = err.statusCode >= 500 ? 'error' : 'warn';
      logger.log(level, 'Application error', {
        code: err.code,
        message: err.message,
        details: redactFields(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      });

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactFields(err.details) } : {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', { message: err.message, ...context });

      res.status(400).json({
        error: 'INVALID_JSON',
        message: 'Invalid JSON in request body',
      });
    } else {
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
