import { Buffer } from 'node:buffer';
import type { IncomingHttpHeaders } from 'node:http';

// inbound headers worth passing upstream; everything else stays behind
const FORWARDED_REQUEST_HEADERS = [
  'accept',
  'accept-language',
  'cache-control',
  'if-modified-since',
  'if-none-match',
] as const;

const CONDITIONAL_HEADERS = ['if-modified-since', 'if-none-match'] as const;

// upstream headers the client may see
const FORWARDED_RESPONSE_HEADERS = [
  'accept-ranges',
  'cache-control',
  'content-length',
  'content-range',
  'content-type',
  'etag',
  'expires',
  'last-modified',
] as const;

export interface OutboundHeaderOptions {
  serverName: string;
  allowContentVideo: boolean;
  enableXForwardedFor: boolean;
  clientAddress?: string;
}

function readHeader(
  headers: IncomingHttpHeaders,
  name: string
): string | undefined {
  const value = headers[name];
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : undefined;
  return value === undefined || value === '' ? undefined : value;
}

export function hasConditionalHeaders(headers: IncomingHttpHeaders): boolean {
  return CONDITIONAL_HEADERS.some(
    (name) => readHeader(headers, name) !== undefined
  );
}

/**
 * Append the caller to an existing `X-Forwarded-For` chain.
 */
export function buildForwardedFor(
  existing: string | undefined,
  clientAddress: string | undefined
): string | undefined {
  const chain = existing?.trim();
  if (!clientAddress) return chain || undefined;
  return chain ? `${chain}, ${clientAddress}` : clientAddress;
}

export function buildOutboundHeaders(
  inbound: IncomingHttpHeaders,
  options: OutboundHeaderOptions
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const name of FORWARDED_REQUEST_HEADERS) {
    const value = readHeader(inbound, name);
    if (value !== undefined) headers[name] = value;
  }

  headers['accept'] ??= options.allowContentVideo
    ? 'image/*, video/*'
    : 'image/*';
  // bodies are relayed byte for byte, so ask for them unencoded
  headers['accept-encoding'] = 'identity';
  headers['user-agent'] = options.serverName;
  headers['via'] = `1.1 ${options.serverName}`;

  if (options.enableXForwardedFor) {
    const forwardedFor = buildForwardedFor(
      readHeader(inbound, 'x-forwarded-for'),
      options.clientAddress
    );
    if (forwardedFor) headers['x-forwarded-for'] = forwardedFor;
  }

  return headers;
}

/**
 * Basic credentials for a URL carrying `user:pass@`. Fetch refuses such
 * URLs, so the userinfo travels as a header on a stripped URL instead.
 */
export function extractCredentials(url: URL): {
  url: URL;
  authorization?: string;
} {
  if (!url.username && !url.password) return { url };

  const stripped = new URL(url.href);
  stripped.username = '';
  stripped.password = '';
  const user = decodeURIComponent(url.username);
  const password = decodeURIComponent(url.password);
  const token = Buffer.from(`${user}:${password}`, 'utf8').toString('base64');
  return { url: stripped, authorization: `Basic ${token}` };
}

export function pickResponseHeaders(
  upstream: { get(name: string): string | null }
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const name of FORWARDED_RESPONSE_HEADERS) {
    const value = upstream.get(name);
    if (value !== null) headers[name] = value;
  }
  return headers;
}
