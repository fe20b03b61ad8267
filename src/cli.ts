import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';

import { getErrorMessage } from './errors/app-error.js';

export interface ListenAddress {
  readonly host: string;
  readonly port: number;
}

interface ServeCommand {
  readonly command: 'serve';
  readonly listen?: ListenAddress;
  readonly help: boolean;
  readonly version: boolean;
}

interface EncodeCommand {
  readonly command: 'encode';
  readonly url: string;
  readonly hex: boolean;
}

interface DecodeCommand {
  readonly command: 'decode';
  readonly token: string;
}

export type CliCommand = ServeCommand | EncodeCommand | DecodeCommand;

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliCommand;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Signed media proxy',
  '',
  'Usage:',
  '  signed-media-proxy [--listen host:port] [--help|-h] [--version|-v]',
  '  signed-media-proxy encode [--hex] <url>',
  '  signed-media-proxy decode <token>',
  '',
  'Options:',
  '  --listen, -l  Address to listen on (default 0.0.0.0:8080).',
  '  --hex         Encode the token as hex instead of base64url.',
  '  --help, -h    Show this help message.',
  '  --version, -v Show version.',
  '',
  'The signing key is read from PROXY_KEY (or CAMO_KEY).',
  '',
] as const;

const optionSchema = {
  listen: { type: 'string', short: 'l' },
  hex: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

const LISTEN_PATTERN = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/;

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function readPackageVersion(): string {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return '0.0.0';
}

/**
 * `host:port`, `:port` or `[v6]:port`. An empty host means all interfaces.
 */
export function parseListenAddress(value: string): ListenAddress | undefined {
  const match = LISTEN_PATTERN.exec(value.trim());
  if (!match?.[3]) return undefined;
  const port = Number.parseInt(match[3], 10);
  if (port < 0 || port > 65535) return undefined;
  const host = match[1] ?? match[2] ?? '';
  return { host: host === '' ? '0.0.0.0' : host, port };
}

interface ServeFlags {
  listen: string | undefined;
  help: boolean;
  version: boolean;
}

function buildServeCommand(
  values: ServeFlags,
  positionals: readonly string[]
): CliParseResult {
  if (positionals.length > 0) {
    return { ok: false, message: `Unknown command: ${positionals[0]}` };
  }
  if (values.listen === undefined) {
    return {
      ok: true,
      values: { command: 'serve', help: values.help, version: values.version },
    };
  }
  const listen = parseListenAddress(values.listen);
  if (!listen) {
    return { ok: false, message: `Invalid listen address: ${values.listen}` };
  }
  return {
    ok: true,
    values: {
      command: 'serve',
      listen,
      help: values.help,
      version: values.version,
    },
  };
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: true,
    });

    const hex = values.hex === true;
    const [command, ...rest] = positionals;
    if (command === 'encode' || command === 'decode') {
      const [operand, ...extra] = rest;
      if (operand === undefined || extra.length > 0) {
        return {
          ok: false,
          message: `${command} takes exactly one argument`,
        };
      }
      return command === 'encode'
        ? { ok: true, values: { command, url: operand, hex } }
        : { ok: true, values: { command, token: operand } };
    }

    if (hex) {
      return { ok: false, message: '--hex only applies to encode' };
    }
    return buildServeCommand(
      {
        listen: values.listen,
        help: values.help === true,
        version: values.version === true,
      },
      positionals
    );
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}
