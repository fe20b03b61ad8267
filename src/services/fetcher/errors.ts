import {
  AppError,
  PolicyViolationError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../../errors/app-error.js';
import type { Deadline } from '../../lib/timer-utils.js';
import { BLOCKED_ADDRESS_CODE } from '../network-guard.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function getErrorCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

// fetch wraps socket and lookup failures as `TypeError('fetch failed')`
// with the real error as its cause
function unwrapCause(error: unknown): unknown {
  let current = error;
  for (let depth = 0; depth < 4; depth += 1) {
    if (!(current instanceof Error) || current.cause === undefined) break;
    current = current.cause;
  }
  return current;
}

function resolveErrorUrl(error: unknown, fallback: string): string {
  if (!isRecord(error)) return fallback;
  const { requestUrl } = error;
  return typeof requestUrl === 'string' ? requestUrl : fallback;
}

export function createHttpError(
  url: string,
  status: number,
  statusText: string
): UpstreamUnavailableError {
  return new UpstreamUnavailableError(
    `Unexpected upstream response HTTP ${status}: ${statusText}`,
    url,
    status
  );
}

/**
 * Classify anything thrown while fetching into the proxy's error taxonomy.
 * A fired deadline wins over whatever error the abort surfaced as.
 */
export function mapFetchError(
  error: unknown,
  fallbackUrl: string,
  deadline: Deadline
): AppError {
  const url = resolveErrorUrl(error, fallbackUrl);

  if (deadline.expired || isTimeoutError(error)) {
    return new UpstreamTimeoutError(deadline.timeoutMs, url);
  }
  if (error instanceof AppError) return error;

  const cause = unwrapCause(error);
  if (getErrorCode(cause) === BLOCKED_ADDRESS_CODE) {
    return new PolicyViolationError(
      'blocked-host',
      cause instanceof Error ? cause.message : 'Blocked address',
      url
    );
  }

  const code = getErrorCode(cause);
  const message = cause instanceof Error ? cause.message : String(cause);
  return new UpstreamUnavailableError(
    code
      ? `Network error (${code}): ${message}`
      : `Network error: ${message}`,
    url
  );
}
