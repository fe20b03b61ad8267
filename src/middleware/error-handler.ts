import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../errors/app-error.js';
import { logError } from '../services/logger.js';

export const RESPONSE_BODIES = {
  notFound: '404 Not Found',
  methodNotAllowed: 'Method Not Allowed',
  internal: 'Internal Server Error',
} as const;

/**
 * Plain-text error reply with a trailing newline. Once the head has gone
 * out the only honest move left is to cut the connection.
 */
export function sendFailure(res: Response, status: number, body: string): void {
  if (res.headersSent || res.destroyed) {
    res.destroy();
    return;
  }
  res.status(status).type('text/plain; charset=utf-8').send(`${body}\n`);
}

function getStatusCode(err: Error): number {
  return err instanceof AppError && err.isOperational ? err.statusCode : 500;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getStatusCode(err);

  logError(
    `HTTP ${statusCode}: ${err.message} - ${req.method} ${req.path}`,
    err
  );

  sendFailure(
    res,
    statusCode,
    statusCode === 500 ? RESPONSE_BODIES.internal : err.message
  );
}
