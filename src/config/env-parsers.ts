export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'debug']);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function parseBoolean(
  value: string | undefined,
  defaultValue: boolean
): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return defaultValue;
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

export function parseInteger(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (min !== undefined && parsed < min) return defaultValue;
  if (max !== undefined && parsed > max) return defaultValue;
  return parsed;
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m)?$/;
const DURATION_UNITS_MS = { ms: 1, s: 1000, m: 60_000 } as const;

/**
 * `500ms`, `4s`, `1m` or a bare millisecond count. Undefined when the value
 * is not a duration.
 */
export function parseDurationMs(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const match = DURATION_PATTERN.exec(value.trim().toLowerCase());
  if (!match?.[1]) return undefined;
  const unit = match[2] === 's' || match[2] === 'm' ? match[2] : 'ms';
  return Math.round(Number.parseFloat(match[1]) * DURATION_UNITS_MS[unit]);
}

export function parseHeaderPairs(
  value: string | undefined
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of parseList(value)) {
    const colon = entry.indexOf(':');
    if (colon <= 0) continue;
    const name = entry.slice(0, colon).trim();
    const headerValue = entry.slice(colon + 1).trim();
    if (name) headers[name] = headerValue;
  }
  return headers;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}
