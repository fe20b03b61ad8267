import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import type { ProxyConfig } from '../config/index.js';
import {
  errorHandler,
  RESPONSE_BODIES,
  sendFailure,
} from '../middleware/error-handler.js';
import { Fetcher, type FetcherOptions } from '../services/fetcher.js';
import { NetworkGuard } from '../services/network-guard.js';
import { ProxyHandler } from '../services/proxy.js';

const CONTENT_SECURITY_POLICY =
  "default-src 'none'; img-src data:; style-src 'unsafe-inline'";

export interface ProxyApp {
  app: Express;
  close: () => Promise<void>;
}

function createResponseHeaders(
  config: ProxyConfig
): (req: Request, res: Response, next: NextFunction) => void {
  return (_req, res, next) => {
    res.setHeader('Server', config.serverName);
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Content-Security-Policy', CONTENT_SECURITY_POLICY);
    for (const [name, value] of Object.entries(config.addHeaders)) {
      res.setHeader(name, value);
    }
    next();
  };
}

function allowReadMethods(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (req.method === 'GET' || req.method === 'HEAD') {
    next();
    return;
  }
  res.setHeader('Allow', 'GET, HEAD');
  sendFailure(res, 405, RESPONSE_BODIES.methodNotAllowed);
}

/**
 * Outer HTTP surface: common headers, health check, and dispatch of
 * `/<tag>/<encodedUrl>` (or `/<tag>?url=`) to the proxy handler.
 */
export function createApp(
  config: ProxyConfig,
  options: FetcherOptions = {}
): ProxyApp {
  const guard = new NetworkGuard(config);
  const fetcher = new Fetcher(config, guard, options);
  const proxy = new ProxyHandler(config, { guard, fetcher });

  const app = express();
  app.disable('x-powered-by');
  app.disable('etag');

  app.use(createResponseHeaders(config));
  app.use(allowReadMethods);

  app.get('/healthcheck', (_req, res) => {
    res.type('text/plain; charset=utf-8').send('OK');
  });
  app.get('/favicon.ico', (_req, res) => {
    sendFailure(res, 404, RESPONSE_BODIES.notFound);
  });
  app.get('/:tag/:encodedUrl', proxy.handle);
  app.get('/:tag', (req, res, next) => {
    if (typeof req.query['url'] !== 'string') {
      next();
      return;
    }
    void proxy.handle(req, res);
  });

  app.use((_req: Request, res: Response) => {
    sendFailure(res, 404, RESPONSE_BODIES.notFound);
  });
  app.use(errorHandler);

  return {
    app,
    close: () => fetcher.close(),
  };
}
