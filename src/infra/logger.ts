import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction.
 * Console in every environment; JSON file as well in production when LOG_FILE is set.
 */

const SECRET_PATTERNS = [
  /access[_-]?token[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /bearer\s+([A-Za-z0-9._-]{8,})/gi,
];

const SECRET_KEYS = new Set(['token', 'accessToken', 'authorization', 'secret', 'YNAB_ACCESS_TOKEN']);

/**
 * Redacts sensitive information from log messages and metadata
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    let redacted = value;
    for (const pattern of SECRET_PATTERNS) {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    }
    return redacted;
  }

  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }

  if (value && typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SECRET_KEYS.has(key) ? '***REDACTED***' : redactSecrets(entry);
    }
    return redacted;
  }

  return value;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SECRET_KEYS.has(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      redactFormat,
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance. Silent until server.ts installs the real one.
 */
export let logger: winston.Logger = winston.createLogger({ silent: true });

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
