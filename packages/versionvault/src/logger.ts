/**
 * Structured logging via pino.
 *
 * Logs go to stderr so command output on stdout stays clean. Level comes
 * from VV_LOG_LEVEL (default "warn"); the CLI lowers it under --verbose.
 */

import { pino, destination, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const options: LoggerOptions = {
  level: process.env['VV_LOG_LEVEL'] ?? 'warn',
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

export const logger: Logger = pino(options, destination(2));

// pino children copy the parent's level at creation, so keep them to re-level later
const children = new Set<Logger>();

export function createLogger(module: string): Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

/** Change the level of the root logger and every child created from it. */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
