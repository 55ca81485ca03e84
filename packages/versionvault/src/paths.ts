/**
 * Work root discovery, path normalization and the directory walk behind
 * `vv store <dir>`.
 */

import { existsSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { dirname, join, posix, relative, resolve, sep } from 'node:path';

import picomatch from 'picomatch';

import { CONFIG_FILENAME } from './config.js';
import { isNotFound, toIOError } from './fs-utils.js';

/** Directory that marks a work root */
export const VAULT_DIR = '.vv';

/**
 * Nearest ancestor of `startDir` holding a .vv directory or a .vv.yml
 * file. Without one, `startDir` itself.
 */
export function findWorkRoot(startDir: string = process.cwd()): string {
  const start = resolve(startDir);
  for (let dir = start; ; dir = dirname(dir)) {
    if (existsSync(join(dir, VAULT_DIR)) || existsSync(join(dir, CONFIG_FILENAME))) {
      return dir;
    }
    if (dirname(dir) === dir) {
      return start;
    }
  }
}

/** POSIX form with `.` and `..` segments folded. */
export function normalizePath(path: string): string {
  const slashed = sep === '\\' ? path.replace(/\\/g, '/') : path;
  return posix.normalize(slashed);
}

export function toRootRelative(absolutePath: string, root: string): string {
  return normalizePath(relative(root, absolutePath));
}

export function resolveFilePath(inputPath: string, cwd: string = process.cwd()): string {
  return resolve(cwd, inputPath);
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isNotFound(err)) {
      return false;
    }
    throw toIOError(err, path, 'Cannot stat path');
  }
}

/**
 * Regular files below `dir`, as sorted absolute paths.
 *
 * Dotfiles are included. An ignore glob skips an entry when it matches
 * the path relative to `dir` or the bare name; directories are also tried
 * with a trailing slash so that "build/**" prunes "build" itself.
 */
export async function findStorableFiles(dir: string, ignorePatterns: string[] = []): Promise<string[]> {
  const ignored: (path: string) => boolean =
    ignorePatterns.length > 0 ? picomatch(ignorePatterns, { dot: true }) : () => false;
  const files: string[] = [];

  const visit = async (current: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return;
      throw toIOError(err, current, 'Cannot read directory');
    }
    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      const relPath = toRootRelative(fullPath, dir);
      if (ignored(relPath) || ignored(entry.name)) continue;
      if (entry.isDirectory()) {
        if (!ignored(`${relPath}/`)) {
          await visit(fullPath);
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  };

  await visit(dir);
  return files.sort();
}
