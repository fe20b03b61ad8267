/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type SignatureFailure = 'malformed' | 'mismatch';

/**
 * Token could not be decoded or its tag did not verify (400)
 */
export class SignatureError extends AppError {
  public readonly reason: SignatureFailure;

  constructor(reason: SignatureFailure, message?: string) {
    super(
      message ??
        (reason === 'malformed' ? 'Malformed token' : 'Signature mismatch'),
      400,
      'INVALID_SIGNATURE'
    );
    this.reason = reason;
  }
}

export type PolicyViolation =
  | 'invalid-url'
  | 'blocked-host'
  | 'denied-host'
  | 'not-allowed-host'
  | 'credentials'
  | 'content-type'
  | 'size'
  | 'redirects';

/**
 * Request refused by proxy policy. Always surfaced as 404 so that callers
 * cannot tell a blocked host from a missing one.
 */
export class PolicyViolationError extends AppError {
  public readonly reason: PolicyViolation;
  public readonly url: string;

  constructor(reason: PolicyViolation, message: string, url: string) {
    super(message, 404, 'POLICY_VIOLATION');
    this.reason = reason;
    this.url = url;
  }
}

/**
 * Upstream answered with a Content-Type that is not a media type (400)
 */
export class MalformedUpstreamError extends AppError {
  public readonly url: string;
  public readonly contentType: string | null;

  constructor(url: string, contentType: string | null) {
    super(
      contentType === null
        ? 'Upstream response has no Content-Type'
        : `Malformed Content-Type: ${contentType}`,
      400,
      'MALFORMED_UPSTREAM'
    );
    this.url = url;
    this.contentType = contentType;
  }
}

/**
 * Upstream could not be reached or did not answer successfully (404)
 */
export class UpstreamUnavailableError extends AppError {
  public readonly url: string;
  public readonly httpStatus?: number;

  constructor(message: string, url: string, httpStatus?: number) {
    super(message, 404, 'UPSTREAM_UNAVAILABLE');
    this.url = url;
    this.httpStatus = httpStatus;
  }
}

/**
 * End-to-end deadline elapsed (504)
 */
export class UpstreamTimeoutError extends AppError {
  public readonly timeoutMs: number;
  public readonly url: string;

  constructor(timeoutMs: number, url: string) {
    super(`Request timeout after ${timeoutMs}ms`, 504, 'TIMEOUT');
    this.timeoutMs = timeoutMs;
    this.url = url;
  }
}

/**
 * Broken internal invariant. Not recoverable at request scope.
 */
export class TrieInvariantError extends AppError {
  constructor(message: string) {
    super(message, 500, 'TRIE_INVARIANT', false);
  }
}

/**
 * Startup configuration could not be validated
 */
export class ConfigError extends AppError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message, 500, 'CONFIG_ERROR', false);
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error.length > 0) return error;
  return 'Unknown error';
}
