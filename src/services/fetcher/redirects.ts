import type { Dispatcher, RequestInit, Response } from 'undici';

import { PolicyViolationError } from '../../errors/app-error.js';
import type { NetworkGuard } from '../network-guard.js';
import { extractCredentials } from './headers.js';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

export function cancelResponseBody(response: Response): void {
  const cancelPromise = response.body?.cancel();
  if (!cancelPromise) return;

  void cancelPromise.catch(() => undefined);
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RedirectRequest {
  method: 'GET' | 'HEAD';
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface RedirectResult {
  response: Response;
  url: URL;
  redirects: number;
}

/**
 * Follows redirects by hand so that each hop goes through the network
 * guard before anything is sent to it.
 */
export class RedirectFollower {
  constructor(
    private readonly fetchFn: FetchLike,
    private readonly guard: NetworkGuard
  ) {}

  async fetchWithRedirects(
    url: URL,
    request: RedirectRequest,
    maxRedirects: number
  ): Promise<RedirectResult> {
    let currentUrl = url;
    const redirectLimit = Math.max(0, maxRedirects);

    for (let redirectCount = 0; ; redirectCount += 1) {
      const response = await this.withRedirectErrorContext(currentUrl, () =>
        this.performFetch(currentUrl, request)
      );

      if (!isRedirectStatus(response.status)) {
        return { response, url: currentUrl, redirects: redirectCount };
      }

      cancelResponseBody(response);
      if (redirectCount >= redirectLimit) {
        throw new PolicyViolationError(
          'redirects',
          `Too many redirects (limit ${redirectLimit})`,
          currentUrl.href
        );
      }

      currentUrl = this.resolveRedirectTarget(response, currentUrl);
    }
  }

  private async performFetch(
    target: URL,
    request: RedirectRequest
  ): Promise<Response> {
    this.guard.validateUrl(target);

    const { url, authorization } = extractCredentials(target);
    const headers = authorization
      ? { ...request.headers, authorization }
      : request.headers;

    return this.fetchFn(url.href, {
      method: request.method,
      headers,
      signal: request.signal,
      redirect: 'manual',
      ...(request.dispatcher ? { dispatcher: request.dispatcher } : {}),
    });
  }

  private resolveRedirectTarget(response: Response, currentUrl: URL): URL {
    const location = response.headers.get('location');
    if (!location) {
      throw new PolicyViolationError(
        'invalid-url',
        'Redirect response missing Location header',
        currentUrl.href
      );
    }
    if (!URL.canParse(location, currentUrl.href)) {
      throw new PolicyViolationError(
        'invalid-url',
        `Invalid redirect target: ${location}`,
        currentUrl.href
      );
    }
    return new URL(location, currentUrl);
  }

  private annotateRedirectError(error: unknown, url: URL): void {
    if (error === null || typeof error !== 'object') return;
    Object.assign(error, { requestUrl: url.href });
  }

  private async withRedirectErrorContext<T>(
    url: URL,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      this.annotateRedirectError(error, url);
      throw error;
    }
  }
}
