/**
 * Layered .vv.yml configuration.
 *
 * Each file is validated on load. Layers merge per top-level section: a
 * section in a nearer file replaces the whole section from farther ones.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';

import { writeFile } from 'atomically';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { ensureDir } from './fs-utils.js';
import type {
  CleanupConfig,
  DiffConfig,
  ResolvedVaultConfig,
  StoreConfig,
  VaultConfig,
} from './types.js';
import { ValidationError } from './types.js';

export const CONFIG_FILENAME = '.vv.yml';

/** Values used when no layer sets them. */
export function getBuiltinDefaults(): ResolvedVaultConfig {
  return {
    store: {
      path: '.vv/objects',
      cache_size: 2000,
    },
    diff: {
      algorithm: 'greedy',
      context_lines: 3,
      similarity_threshold: 0.6,
    },
    cleanup: {
      max_age_days: 30,
    },
    ignore: ['.git/**', '.vv/**', 'node_modules/**'],
  };
}

/** Parse a single .vv.yml file. */
export async function loadConfigFile(filePath: string): Promise<VaultConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Cannot read config file: ${filePath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ValidationError(
      `Malformed YAML in config file: ${filePath}: ${errorMessage(err)}`,
      ['Check that the .vv.yml file contains valid YAML.'],
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isSection(parsed)) {
    throw new ValidationError(`Invalid config file (not an object): ${filePath}`);
  }

  return validateConfig(parsed, filePath);
}

/**
 * Section-level merge. `diff: { algorithm: myers }` in a subdirectory drops
 * the parent's whole `diff` section; `withDefaults` refills the gaps.
 */
export function mergeConfigs(base: VaultConfig, override: VaultConfig): VaultConfig {
  const result: VaultConfig = { ...base };

  if (override.store !== undefined) result.store = override.store;
  if (override.diff !== undefined) result.diff = override.diff;
  if (override.cleanup !== undefined) result.cleanup = override.cleanup;
  if (override.ignore !== undefined) result.ignore = override.ignore;

  return result;
}

/** Fill every missing field from the built-in defaults. */
export function withDefaults(config: VaultConfig): ResolvedVaultConfig {
  const defaults = getBuiltinDefaults();
  return {
    store: { ...defaults.store, ...config.store },
    diff: { ...defaults.diff, ...config.diff },
    cleanup: { ...defaults.cleanup, ...config.cleanup },
    ignore: config.ignore ?? defaults.ignore,
  };
}

/**
 * Effective config for `targetPath`. Layers, weakest first: built-in
 * defaults, ~/.vv.yml, the work root's .vv.yml, then each .vv.yml on the
 * way down to the target directory.
 */
export async function resolveConfig(
  targetPath: string,
  workRoot: string,
): Promise<ResolvedVaultConfig> {
  let merged: VaultConfig = getBuiltinDefaults();
  for (const layer of await findConfigFiles(targetPath, workRoot)) {
    merged = mergeConfigs(merged, await loadConfigFile(layer.path));
  }
  return withDefaults(merged);
}

export type ConfigOrigin = 'builtin' | 'global' | 'root' | 'subdir';

export interface ConfigValueWithOrigin {
  value: unknown;
  origin: ConfigOrigin;
  file?: string | undefined;
}

const SECTIONS = ['store', 'diff', 'cleanup', 'ignore'] as const;
type SectionKey = (typeof SECTIONS)[number];

interface ConfigLayer {
  path: string;
  origin: ConfigOrigin;
}

/**
 * Effective values keyed "section.field" ("diff.algorithm"), each with the
 * layer it came from. `ignore` is reported as a single key.
 */
export async function resolveConfigWithOrigins(
  targetPath: string,
  workRoot: string,
): Promise<Map<string, ConfigValueWithOrigin>> {
  const owners = new Map<SectionKey, { layer: ConfigLayer; section: unknown }>();
  let merged: VaultConfig = getBuiltinDefaults();

  for (const layer of await findConfigFiles(targetPath, workRoot)) {
    const override = await loadConfigFile(layer.path);
    merged = mergeConfigs(merged, override);
    for (const key of SECTIONS) {
      if (override[key] !== undefined) {
        owners.set(key, { layer, section: override[key] });
      }
    }
  }

  const resolved = withDefaults(merged);
  const origins = new Map<string, ConfigValueWithOrigin>();
  const builtin = (value: unknown): ConfigValueWithOrigin => ({ value, origin: 'builtin' });

  for (const key of SECTIONS) {
    const owner = owners.get(key);
    const value = resolved[key];
    if (Array.isArray(value)) {
      origins.set(
        key,
        owner ? { value, origin: owner.layer.origin, file: owner.layer.path } : builtin(value),
      );
      continue;
    }
    for (const [field, fieldValue] of Object.entries(value)) {
      // a section left out of an override falls back to the default, not the parent layer
      const source =
        owner !== undefined && isSection(owner.section) && field in owner.section
          ? owner.layer
          : undefined;
      origins.set(
        `${key}.${field}`,
        source ? { value: fieldValue, origin: source.origin, file: source.path } : builtin(fieldValue),
      );
    }
  }

  return origins;
}

async function findConfigFiles(targetPath: string, workRoot: string): Promise<ConfigLayer[]> {
  const globalConfig = getGlobalConfigPath();
  const layers: ConfigLayer[] = existsSync(globalConfig)
    ? [{ path: globalConfig, origin: 'global' }]
    : [];

  const root = resolve(workRoot);
  const rootConfig = join(root, CONFIG_FILENAME);
  const chain: ConfigLayer[] = [];
  for (let dir = resolve(targetPath); dir.startsWith(root); dir = dirname(dir)) {
    const candidate = join(dir, CONFIG_FILENAME);
    if (candidate !== globalConfig && existsSync(candidate)) {
      chain.push({ path: candidate, origin: candidate === rootConfig ? 'root' : 'subdir' });
    }
    if (dirname(dir) === dir) break;
  }

  return [...layers, ...chain.reverse()];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isSection(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectSection(
  parsed: Record<string, unknown>,
  key: string,
  filePath: string,
): Record<string, unknown> | undefined {
  const value = parsed[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isSection(value)) {
    throw new ValidationError(`Invalid "${key}" in ${filePath}: expected an object`);
  }
  return value;
}

function expectNumber(
  section: Record<string, unknown>,
  key: string,
  filePath: string,
  check: (n: number) => boolean,
  expected: string,
): number | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !check(value)) {
    throw new ValidationError(`Invalid "${key}" in ${filePath}: expected ${expected}`);
  }
  return value;
}

function validateConfig(parsed: Record<string, unknown>, filePath: string): VaultConfig {
  const config: VaultConfig = {};

  const store = expectSection(parsed, 'store', filePath);
  if (store) {
    const section: Partial<StoreConfig> = {};
    const path = store['path'];
    if (path !== undefined) {
      if (typeof path !== 'string' || path.length === 0) {
        throw new ValidationError(`Invalid "path" in ${filePath}: expected a non-empty string`);
      }
      section.path = path;
    }
    const cacheSize = expectNumber(
      store,
      'cache_size',
      filePath,
      (n) => Number.isInteger(n) && n > 0,
      'a positive integer',
    );
    if (cacheSize !== undefined) section.cache_size = cacheSize;
    config.store = section;
  }

  const diff = expectSection(parsed, 'diff', filePath);
  if (diff) {
    const section: Partial<DiffConfig> = {};
    const algorithm = diff['algorithm'];
    if (algorithm !== undefined) {
      if (algorithm !== 'greedy' && algorithm !== 'myers') {
        throw new ValidationError(
          `Invalid "algorithm" in ${filePath}: expected "greedy" or "myers"`,
        );
      }
      section.algorithm = algorithm;
    }
    const contextLines = expectNumber(
      diff,
      'context_lines',
      filePath,
      (n) => Number.isInteger(n) && n >= 0,
      'a non-negative integer',
    );
    if (contextLines !== undefined) section.context_lines = contextLines;
    const threshold = expectNumber(
      diff,
      'similarity_threshold',
      filePath,
      (n) => n >= 0 && n <= 1,
      'a number between 0 and 1',
    );
    if (threshold !== undefined) section.similarity_threshold = threshold;
    config.diff = section;
  }

  const cleanup = expectSection(parsed, 'cleanup', filePath);
  if (cleanup) {
    const section: Partial<CleanupConfig> = {};
    const maxAge = expectNumber(
      cleanup,
      'max_age_days',
      filePath,
      (n) => Number.isFinite(n) && n >= 0,
      'a non-negative number',
    );
    if (maxAge !== undefined) section.max_age_days = maxAge;
    config.cleanup = section;
  }

  const ignore = parsed['ignore'];
  if (ignore !== undefined) {
    if (!Array.isArray(ignore) || !ignore.every((p): p is string => typeof p === 'string')) {
      throw new ValidationError(`Invalid "ignore" in ${filePath}: expected an array of strings`);
    }
    config.ignore = ignore;
  }

  return config;
}

export async function writeConfigFile(filePath: string, config: VaultConfig): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, stringifyYaml(config, { lineWidth: 0 }));
}

export function getConfigPath(workRoot: string): string {
  return join(workRoot, CONFIG_FILENAME);
}

/** ~/.vv.yml, or $VV_HOME/.vv.yml when VV_HOME is set. */
export function getGlobalConfigPath(): string {
  return join(process.env['VV_HOME'] ?? homedir(), CONFIG_FILENAME);
}

/** Absolute object store directory for a resolved config. */
export function resolveStorePath(config: ResolvedVaultConfig, workRoot: string): string {
  return isAbsolute(config.store.path) ? config.store.path : join(workRoot, config.store.path);
}
