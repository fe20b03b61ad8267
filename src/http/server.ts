import type { Server } from 'node:http';

import type { AppConfig } from '../config/index.js';
import { logInfo } from '../services/logger.js';
import { createApp } from './router.js';
import { createShutdownHandler } from './server-shutdown.js';

export interface RunningServer {
  server: Server;
  port: number;
  shutdown: (signal: string) => Promise<void>;
}

function listen(
  app: ReturnType<typeof createApp>['app'],
  host: string,
  port: number
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      resolve(server);
    });
    server.once('error', reject);
  });
}

export async function startHttpServer(
  config: AppConfig
): Promise<RunningServer> {
  const { app, close } = createApp(config.proxy);
  const server = await listen(app, config.server.host, config.server.port);
  const address = server.address();
  const port =
    address !== null && typeof address === 'object'
      ? address.port
      : config.server.port;

  logInfo('Proxy listening', {
    host: config.server.host,
    port,
    maxSize: config.proxy.maxSize,
    timeoutMs: config.proxy.requestTimeoutMs,
    maxRedirects: config.proxy.maxRedirects,
    ipFiltering: !config.proxy.noIpFiltering,
  });

  return {
    server,
    port,
    shutdown: createShutdownHandler(server, close),
  };
}
