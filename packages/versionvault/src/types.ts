/**
 * Shared type definitions for versionvault.
 *
 * Central types used across the codebase. Error classes are the only runtime code.
 */

/** Classification of a file between two snapshots. */
export type ChangeType = 'added' | 'removed' | 'modified' | 'unchanged';

/** Result of comparing two file snapshots. Hashes are '' for an absent side. */
export interface Change {
  type: ChangeType;
  path: string;
  oldHash: string;
  newHash: string;
}

/** Names of the built-in line diff algorithms. */
export type DiffAlgorithmName = 'greedy' | 'myers';

export interface StoreConfig {
  /** Object store root, relative to the working root unless absolute */
  path: string;
  /** Maximum number of blobs held in the in-memory cache */
  cache_size: number;
}

export interface DiffConfig {
  algorithm: DiffAlgorithmName;
  /** Unchanged lines kept around each change in unified output */
  context_lines: number;
  similarity_threshold: number;
}

export interface CleanupConfig {
  max_age_days: number;
}

/** Full versionvault configuration, merged from multiple .vv.yml files. */
export interface VaultConfig {
  store?: Partial<StoreConfig> | undefined;
  diff?: Partial<DiffConfig> | undefined;
  cleanup?: Partial<CleanupConfig> | undefined;
  /** Glob patterns skipped when storing directories */
  ignore?: string[] | undefined;
}

/** Configuration with every section filled from defaults. */
export interface ResolvedVaultConfig {
  store: StoreConfig;
  diff: DiffConfig;
  cleanup: CleanupConfig;
  ignore: string[];
}

/** Outcome of an object store retention pass. */
export interface CleanupResult {
  /** Hashes whose blobs were deleted */
  removed: string[];
  /** Total bytes of the deleted blobs */
  freedBytes: number;
}

export type ErrorCategory = 'io' | 'validation' | 'not_found' | 'unknown';

/** Structured error with category and optional troubleshooting. */
export class VaultError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly exitCode = 1,
    public readonly suggestions?: string[],
  ) {
    super(message);
    this.name = 'VaultError';
  }
}

/**
 * A backing location could not be read or written.
 *
 * `code` is the system error code (ENOENT, EACCES, ENOSPC, ...) when one is known.
 */
export class IOError extends VaultError {
  readonly path: string;
  readonly code: string | undefined;

  constructor(message: string, path: string, options?: { code?: string | undefined; cause?: unknown }) {
    super(message, 'io', 1);
    this.name = 'IOError';
    this.path = path;
    this.code = options?.code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Validation error for malformed input. */
export class ValidationError extends VaultError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'validation', 1, suggestions);
    this.name = 'ValidationError';
  }
}

/** Global CLI options shared across all commands. */
export interface GlobalOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  /** Object store directory override */
  store?: string | undefined;
}
