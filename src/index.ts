#!/usr/bin/env node
import {
  type CliCommand,
  parseCliArgs,
  readPackageVersion,
  renderCliUsage,
} from './cli.js';
import { type AppConfig, loadConfig } from './config/index.js';
import { getErrorMessage, SignatureError } from './errors/app-error.js';
import { registerSignalHandlers } from './http/server-shutdown.js';
import { startHttpServer } from './http/server.js';
import { decode, encode } from './lib/signature.js';
import { logError, setLogLevel } from './services/logger.js';

let isShuttingDown = false;

const shutdownHandlerRef: { current?: (signal: string) => Promise<void> } = {};

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);

  if (!isShuttingDown && shutdownHandlerRef.current) {
    isShuttingDown = true;
    process.stderr.write('Attempting graceful shutdown...\n');
    void shutdownHandlerRef.current('UNCAUGHT_EXCEPTION');
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

function fail(message: string): never {
  process.stderr.write(`${message}\n`);
  process.exit(1);
}

function withListen(config: AppConfig, command: CliCommand): AppConfig {
  if (command.command !== 'serve' || !command.listen) return config;
  return { ...config, server: command.listen };
}

async function run(command: CliCommand, config: AppConfig): Promise<void> {
  switch (command.command) {
    case 'encode': {
      const encoding = command.hex ? 'hex' : 'base64url';
      process.stdout.write(
        `/${encode(config.proxy.key, command.url, encoding)}\n`
      );
      return;
    }
    case 'decode':
      try {
        process.stdout.write(`${decode(config.proxy.key, command.token)}\n`);
      } catch (error: unknown) {
        if (error instanceof SignatureError) fail(error.message);
        throw error;
      }
      return;
    case 'serve': {
      setLogLevel(config.logging.level);
      const { shutdown } = await startHttpServer(withListen(config, command));
      shutdownHandlerRef.current = shutdown;
      registerSignalHandlers(shutdown);
      return;
    }
  }
}

const parsed = parseCliArgs(process.argv.slice(2));
if (!parsed.ok) {
  process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
  process.exit(1);
}

const command = parsed.values;
if (command.command === 'serve' && command.help) {
  process.stdout.write(renderCliUsage());
  process.exit(0);
}
if (command.command === 'serve' && command.version) {
  process.stdout.write(`${readPackageVersion()}\n`);
  process.exit(0);
}

let config: AppConfig;
try {
  config = loadConfig();
} catch (error: unknown) {
  fail(getErrorMessage(error));
}

await run(command, config);
