// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = new Set(['consumerSecret', 'consumer_secret', 'authorization', 'Authorization', 'oauth_signature']);
const SENSITIVE_QUERY = /([?&](?:consumer_secret|oauth_signature)=)[^&#]*/g;

/**
 * Mask credential-bearing query values in a URL string.
 */
export function redactUrl(url: string): string {
  return url.replace(SENSITIVE_QUERY, '$1[REDACTED]');
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object') return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of Object.keys(redacted)) {
      if (SENSITIVE_KEYS.has(key)) {
        redacted[key] = '[REDACTED]';
      }
    }

    if (typeof redacted.url === 'string') {
      redacted.url = redactUrl(redacted.url);
    }

    // Header maps are logged by key set only, but guard nested ones anyway
    if (redacted.headers && typeof redacted.headers === 'object') {
      redacted.headers = this.redactSensitive(redacted.headers);
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}
