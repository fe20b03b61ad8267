import { z } from 'zod';

import { ConfigError } from '../errors/app-error.js';
import {
  type LogLevel,
  parseBoolean,
  parseDurationMs,
  parseHeaderPairs,
  parseInteger,
  parseList,
  parseLogLevel,
} from './env-parsers.js';

export const SIZE_LIMITS = {
  FIVE_MB: 5 * 1024 * 1024,
} as const;

export const TIMEOUT = {
  DEFAULT_REQUEST_TIMEOUT_MS: 4000,
} as const;

// RFC 9110 token characters
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

const proxyConfigSchema = z
  .object({
    key: z.string().min(1, 'a signing key is required'),
    maxSize: z.number().int().positive().default(SIZE_LIMITS.FIVE_MB),
    requestTimeoutMs: z
      .number()
      .int()
      .positive()
      .default(TIMEOUT.DEFAULT_REQUEST_TIMEOUT_MS),
    maxRedirects: z.number().int().min(0).max(20).default(3),
    serverName: z.string().min(1).default('signed-media-proxy'),
    allowContentVideo: z.boolean().default(false),
    allowCredentialUrls: z.boolean().default(false),
    enableXForwardedFor: z.boolean().default(false),
    // test-only: lets the proxy reach loopback and private ranges
    noIpFiltering: z.boolean().default(false),
    allowList: z.array(z.string().min(1)).default([]),
    denyList: z.array(z.string().min(1)).default([]),
    addHeaders: z
      .record(
        z.string().regex(HEADER_NAME_PATTERN, 'Invalid header name'),
        z.string()
      )
      .default({}),
  })
  .strict();

export type ProxyConfigInput = z.input<typeof proxyConfigSchema>;
type ParsedProxyConfig = z.output<typeof proxyConfigSchema>;

export type ProxyConfig = Readonly<
  Omit<ParsedProxyConfig, 'allowList' | 'denyList' | 'addHeaders'>
> & {
  readonly allowList: readonly string[];
  readonly denyList: readonly string[];
  readonly addHeaders: Readonly<Record<string, string>>;
};

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

export interface AppConfig {
  readonly proxy: ProxyConfig;
  readonly server: ServerConfig;
  readonly logging: { readonly level: LogLevel };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate and freeze proxy settings. The result is shared by every request
 * and is never mutated afterwards.
 */
export function createProxyConfig(input: ProxyConfigInput): ProxyConfig {
  const result = proxyConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const { allowList, denyList, addHeaders } = result.data;
  return Object.freeze({
    ...result.data,
    allowList: Object.freeze([...allowList]),
    denyList: Object.freeze([...denyList]),
    addHeaders: Object.freeze({ ...addHeaders }),
  });
}

function readRequestTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.PROXY_TIMEOUT;
  if (raw === undefined) return undefined;
  const parsed = parseDurationMs(raw);
  if (parsed === undefined) {
    throw new ConfigError(`PROXY_TIMEOUT is not a duration: ${raw}`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const proxy = createProxyConfig({
    key: env.PROXY_KEY ?? env.CAMO_KEY ?? '',
    maxSize: parseInteger(env.PROXY_MAX_SIZE, SIZE_LIMITS.FIVE_MB, 1),
    requestTimeoutMs: readRequestTimeout(env),
    maxRedirects: parseInteger(env.PROXY_MAX_REDIRECTS, 3, 0, 20),
    serverName: env.PROXY_SERVER_NAME,
    allowContentVideo: parseBoolean(env.PROXY_ALLOW_VIDEO, false),
    allowCredentialUrls: parseBoolean(env.PROXY_ALLOW_CREDENTIAL_URLS, false),
    enableXForwardedFor: parseBoolean(env.PROXY_ENABLE_XFWD4, false),
    noIpFiltering: parseBoolean(env.PROXY_NO_IP_FILTERING, false),
    allowList: parseList(env.PROXY_ALLOW_LIST),
    denyList: parseList(env.PROXY_DENY_LIST),
    addHeaders: parseHeaderPairs(env.PROXY_ADD_HEADERS),
  });

  return {
    proxy,
    server: {
      host: env.HOST ?? '0.0.0.0',
      port: parseInteger(env.PORT, 8080, 1, 65535),
    },
    logging: { level: parseLogLevel(env.LOG_LEVEL) },
  };
}
