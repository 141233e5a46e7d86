/**
 * CLI helpers: option resolution, argument parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { ServerConfig } from './config.js';
import type { LogLevel } from './log.js';
import * as out from './output.js';

/** Options every command sees through optsWithGlobals() */
export type GlobalOptions = {
  db?: string;
  logLevel?: LogLevel;
};

export type ServeOptions = GlobalOptions & {
  host?: string;
  port?: number;
};

/**
 * Merge command-line options over the environment configuration.
 * Explicit flags win.
 */
export function resolveConfig(config: ServerConfig, opts: ServeOptions): ServerConfig {
  return {
    host: opts.host ?? config.host,
    port: opts.port ?? config.port,
    dbPath: opts.db ?? config.dbPath,
    logLevel: opts.logLevel ?? config.logLevel,
  };
}

/** commander argParser for --port */
export function parsePort(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Port must be a whole number.');
  }
  const port = Number(value);
  if (port > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return port;
}

/**
 * Wrap a command action: report a failure in red and set a failing
 * exit code instead of printing a stack trace.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
