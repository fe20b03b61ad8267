import type { IncomingHttpHeaders } from 'node:http';
import { pipeline, Readable } from 'node:stream';

import { Agent, fetch as undiciFetch, type Response } from 'undici';

import type { ProxyConfig } from '../config/index.js';
import type { AppError } from '../errors/app-error.js';
import { createDeadline, type Deadline } from '../lib/timer-utils.js';
import { createHttpError, mapFetchError } from './fetcher/errors.js';
import {
  buildOutboundHeaders,
  hasConditionalHeaders,
  pickResponseHeaders,
} from './fetcher/headers.js';
import {
  cancelResponseBody,
  type FetchLike,
  RedirectFollower,
} from './fetcher/redirects.js';
import {
  assertAllowedContentType,
  assertContentLengthWithinLimit,
  createByteLimit,
} from './fetcher/response.js';
import { logDebug, redactUrl } from './logger.js';
import type { HostResolver, NetworkGuard } from './network-guard.js';

const KEEP_ALIVE_TIMEOUT_MS = 10_000;

export interface UpstreamRequest {
  method: 'GET' | 'HEAD';
  headers: IncomingHttpHeaders;
  clientAddress?: string;
}

export interface FetchedResource {
  status: number;
  url: string;
  contentType: string | null;
  headers: Record<string, string>;
  // null for HEAD, 304 and empty bodies
  body: Readable | null;
  // classify an error raised while the body is being relayed
  describeFailure: (error: unknown) => AppError;
}

export interface FetcherOptions {
  fetchFn?: FetchLike;
  resolver?: HostResolver;
}

/**
 * Fetches one upstream resource under a single deadline covering every
 * redirect hop and the body read.
 */
export class Fetcher {
  private readonly agent: Agent;
  private readonly redirects: RedirectFollower;

  constructor(
    private readonly config: ProxyConfig,
    guard: NetworkGuard,
    options: FetcherOptions = {}
  ) {
    this.agent = new Agent({
      connect: {
        lookup: guard.createLookup(options.resolver),
        timeout: config.requestTimeoutMs,
      },
      keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS,
    });
    this.redirects = new RedirectFollower(options.fetchFn ?? undiciFetch, guard);
  }

  async fetch(target: URL, request: UpstreamRequest): Promise<FetchedResource> {
    const deadline = createDeadline(this.config.requestTimeoutMs);

    try {
      const { response, url, redirects } =
        await this.redirects.fetchWithRedirects(
          target,
          {
            method: request.method,
            headers: buildOutboundHeaders(request.headers, {
              serverName: this.config.serverName,
              allowContentVideo: this.config.allowContentVideo,
              enableXForwardedFor: this.config.enableXForwardedFor,
              clientAddress: request.clientAddress,
            }),
            signal: deadline.signal,
            dispatcher: this.agent,
          },
          this.config.maxRedirects
        );

      logDebug('Upstream responded', {
        url: redactUrl(url.href),
        status: response.status,
        redirects,
      });
      return this.toResource(response, url.href, request, deadline);
    } catch (error: unknown) {
      deadline.clear();
      throw mapFetchError(error, target.href, deadline);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private toResource(
    response: Response,
    url: string,
    request: UpstreamRequest,
    deadline: Deadline
  ): FetchedResource {
    const describeFailure = (error: unknown): AppError =>
      mapFetchError(error, url, deadline);
    const headers = pickResponseHeaders(response.headers);
    const contentType = response.headers.get('content-type');

    if (response.status === 304 && hasConditionalHeaders(request.headers)) {
      cancelResponseBody(response);
      deadline.clear();
      return {
        status: 304,
        url,
        contentType,
        headers,
        body: null,
        describeFailure,
      };
    }

    try {
      if (!response.ok) {
        throw createHttpError(url, response.status, response.statusText);
      }
      assertAllowedContentType(
        contentType,
        url,
        this.config.allowContentVideo
      );
      assertContentLengthWithinLimit(
        response.headers.get('content-length'),
        url,
        this.config.maxSize
      );
    } catch (error: unknown) {
      cancelResponseBody(response);
      throw error;
    }

    if (request.method === 'HEAD' || response.body === null) {
      cancelResponseBody(response);
      deadline.clear();
      return {
        status: response.status,
        url,
        contentType,
        headers,
        body: null,
        describeFailure,
      };
    }

    const limiter = createByteLimit(this.config.maxSize, url);
    pipeline(Readable.fromWeb(response.body), limiter, () => {
      deadline.clear();
    });

    return {
      status: response.status,
      url,
      contentType,
      headers,
      body: limiter,
      describeFailure,
    };
  }
}
