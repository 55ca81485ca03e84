/**
 * Filesystem utilities shared across modules.
 */

import { mkdir } from 'node:fs/promises';

import { IOError } from './types.js';

/** Create directory and all parents if they don't exist. */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw toIOError(err, dirPath, 'Cannot create directory');
  }
}

/** Read the `code` of a Node system error, if there is one. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** True when the error says the path does not exist. */
export function isNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT';
}

/**
 * Wrap a failed filesystem call in an IOError.
 *
 * The original error is kept as `cause` and its system code is copied over.
 * An IOError passes through unchanged.
 */
export function toIOError(err: unknown, path: string, action: string): IOError {
  if (err instanceof IOError) {
    return err;
  }
  const code = errorCode(err);
  const detail = err instanceof Error ? err.message : String(err);
  return new IOError(`${action}: ${path}: ${detail}`, path, { code, cause: err });
}
