import type { Server } from 'node:http';

import { getErrorMessage } from '../errors/app-error.js';
import { logError, logInfo, logWarn } from '../services/logger.js';

const FORCED_SHUTDOWN_MS = 10000;

export function createShutdownHandler(
  server: Server,
  closeProxy: () => Promise<void>
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);

    setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, FORCED_SHUTDOWN_MS).unref();

    server.close(() => {
      logInfo('HTTP server closed');
    });
    server.closeIdleConnections();

    try {
      await closeProxy();
    } catch (error: unknown) {
      logWarn('Failed to close upstream connection pool', {
        error: getErrorMessage(error),
      });
    }
    process.exit(0);
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
