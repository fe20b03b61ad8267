import type { Request, Response } from 'express';

import type { ProxyConfig } from '../config/index.js';
import {
  AppError,
  MalformedUpstreamError,
  PolicyViolationError,
  SignatureError,
  UpstreamTimeoutError,
} from '../errors/app-error.js';
import { decodeParts, verifyQueryToken } from '../lib/signature.js';
import { RESPONSE_BODIES, sendFailure } from '../middleware/error-handler.js';
import type { Fetcher, FetchedResource } from './fetcher.js';
import { logDebug, logError, redactUrl } from './logger.js';
import type { NetworkGuard } from './network-guard.js';

export type ProxyStage =
  | 'decoding'
  | 'validating'
  | 'fetching'
  | 'streaming'
  | 'done';

export const PROXY_BODIES = {
  badSignature: 'Bad Signature',
  invalidUrl: 'Invalid URL',
  badHost: 'Bad url host',
  deniedHost: 'Denylist host failure',
  notAllowedHost: 'Allowlist host failure',
  credentials: 'Credential URLs not allowed',
  fetchError: 'Error Fetching Resource',
  malformedContentType: 'Malformed Content-Type',
  unsupportedContentType: 'Unsupported content-type returned',
  timeout: 'Gateway Timeout',
} as const;

export interface ProxyFailure {
  status: number;
  body: string;
}

function describeValidationFailure(error: PolicyViolationError): string {
  switch (error.reason) {
    case 'invalid-url':
      return PROXY_BODIES.invalidUrl;
    case 'credentials':
      return PROXY_BODIES.credentials;
    case 'denied-host':
      return PROXY_BODIES.deniedHost;
    case 'not-allowed-host':
      return PROXY_BODIES.notAllowedHost;
    default:
      return PROXY_BODIES.badHost;
  }
}

/**
 * Status and body for a failure in a given stage. Host-policy details are
 * only spelled out for the initial target; anything that goes wrong once
 * fetching has started reads the same to the caller.
 */
export function describeFailure(
  stage: ProxyStage,
  error: AppError
): ProxyFailure {
  if (error instanceof SignatureError) {
    return { status: 400, body: PROXY_BODIES.badSignature };
  }
  if (stage === 'validating' && error instanceof PolicyViolationError) {
    return { status: 404, body: describeValidationFailure(error) };
  }
  if (error instanceof UpstreamTimeoutError) {
    return { status: 504, body: PROXY_BODIES.timeout };
  }
  if (error instanceof MalformedUpstreamError) {
    return { status: 400, body: PROXY_BODIES.malformedContentType };
  }
  if (
    error instanceof PolicyViolationError &&
    error.reason === 'content-type'
  ) {
    return { status: 404, body: PROXY_BODIES.unsupportedContentType };
  }
  if (!error.isOperational) {
    return { status: 500, body: RESPONSE_BODIES.internal };
  }
  return { status: 404, body: PROXY_BODIES.fetchError };
}

function readRouteParam(req: Request, name: string): string | undefined {
  const value = req.params[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readQueryUrl(req: Request): string | undefined {
  const value = req.query['url'];
  return typeof value === 'string' ? value : undefined;
}

function writeHead(resource: FetchedResource, res: Response): void {
  res.status(resource.status);
  for (const [name, value] of Object.entries(resource.headers)) {
    res.setHeader(name, value);
  }
}

function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
  });
}

interface ProxyDependencies {
  guard: NetworkGuard;
  fetcher: Fetcher;
}

/**
 * Per-request pipeline: decode the token, vet the target, fetch it and
 * relay the body. Each request runs once through
 * decoding → validating → fetching → streaming → done, and any stage may
 * stop it with a failure.
 */
export class ProxyHandler {
  private readonly guard: NetworkGuard;
  private readonly fetcher: Fetcher;

  constructor(
    private readonly config: ProxyConfig,
    deps: ProxyDependencies
  ) {
    this.guard = deps.guard;
    this.fetcher = deps.fetcher;
  }

  readonly handle = async (req: Request, res: Response): Promise<void> => {
    let stage: ProxyStage = 'decoding';

    try {
      const target = this.decodeTarget(req);

      stage = 'validating';
      const url = this.parseTarget(target);
      this.guard.validateUrl(url);

      stage = 'fetching';
      const resource = await this.fetcher.fetch(url, {
        method: req.method === 'HEAD' ? 'HEAD' : 'GET',
        headers: req.headers,
        clientAddress: req.socket.remoteAddress,
      });

      stage = 'streaming';
      await this.relay(resource, res);
      stage = 'done';
    } catch (error: unknown) {
      this.fail(stage, error, req, res);
    }
  };

  private decodeTarget(req: Request): string {
    const tag = readRouteParam(req, 'tag');
    const encodedUrl = readRouteParam(req, 'encodedUrl');
    if (tag === undefined) {
      throw new SignatureError('malformed', 'Missing signature');
    }
    if (encodedUrl !== undefined) {
      return decodeParts(this.config.key, tag, encodedUrl);
    }

    const queryUrl = readQueryUrl(req);
    if (queryUrl === undefined) {
      throw new SignatureError('malformed', 'Missing encoded URL');
    }
    return verifyQueryToken(this.config.key, tag, queryUrl);
  }

  private parseTarget(target: string): URL {
    if (!URL.canParse(target)) {
      throw new PolicyViolationError(
        'invalid-url',
        'Decoded target is not an absolute URL',
        target
      );
    }
    return new URL(target);
  }

  private async relay(resource: FetchedResource, res: Response): Promise<void> {
    if (resource.body === null) {
      writeHead(resource, res);
      res.end();
      return;
    }

    // the head waits for the first chunk so a body that fails early still
    // gets a proper status
    try {
      for await (const chunk of resource.body) {
        if (res.destroyed) throw new Error('Client closed the connection');
        if (!res.headersSent) writeHead(resource, res);
        if (!res.write(chunk)) await waitForDrain(res);
      }
    } catch (error: unknown) {
      throw resource.describeFailure(error);
    }

    if (!res.headersSent) writeHead(resource, res);
    res.end();
  }

  private fail(
    stage: ProxyStage,
    error: unknown,
    req: Request,
    res: Response
  ): void {
    if (!(error instanceof AppError)) {
      logError(
        `Unexpected proxy failure while ${stage}`,
        error instanceof Error ? error : { error: String(error) }
      );
      sendFailure(res, 500, RESPONSE_BODIES.internal);
      return;
    }

    const failure = describeFailure(stage, error);
    logDebug('Proxy request failed', {
      stage,
      code: error.code,
      status: failure.status,
      reason: error.message,
      target:
        'url' in error && typeof error.url === 'string'
          ? redactUrl(error.url)
          : undefined,
      path: req.path,
    });
    sendFailure(res, failure.status, failure.body);
  }
}
