import winston from 'winston';

import { type LogLevel, parseLogLevel } from '../config/env-parsers.js';

const isTestRun =
  process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const consoleFormat =
  process.env.NODE_ENV === 'production'
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      );

const logger = winston.createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  silent: isTestRun,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  ),
  defaultMeta: { service: 'signed-media-proxy' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}

/**
 * Drop userinfo from a URL before it reaches a log line.
 */
export function redactUrl(url: string): string {
  if (!URL.canParse(url)) return url;
  const parsed = new URL(url);
  if (!parsed.username && !parsed.password) return parsed.href;
  parsed.username = '';
  parsed.password = '';
  return parsed.href;
}
