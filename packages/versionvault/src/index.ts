/**
 * versionvault -- content-addressed file storage and diffing.
 *
 * Library exports for programmatic usage.
 */

export type {
  Change,
  ChangeType,
  CleanupResult,
  DiffAlgorithmName,
  ErrorCategory,
  ResolvedVaultConfig,
  VaultConfig,
} from './types.js';

export { IOError, ValidationError, VaultError } from './types.js';

export { hashBytes, hashString, isValidHash, HASH_LENGTH } from './hash.js';
export {
  BINARY_SNIFF_LENGTH,
  BinaryContent,
  FileContent,
  TextContent,
  detectBinary,
  fileContentFromBytes,
  joinLines,
  looksBinary,
  openFileContent,
  splitLines,
} from './file-content.js';
export type { DiffAlgorithm } from './diff-algorithm.js';
export { GreedyMergeDiff, MyersDiff, createDiffAlgorithm } from './diff-algorithm.js';
export type { DiffEngineOptions, DiffLabels } from './diff-engine.js';
export { DiffEngine, editDistance } from './diff-engine.js';
export type { ObjectStoreOptions, StoredBlob } from './object-store.js';
export {
  DEFAULT_CACHE_SIZE,
  DEFAULT_STORE_PATH,
  DETACHED_PATH,
  ObjectStore,
  getObjectPath,
  getSharedObjectStore,
} from './object-store.js';
export { LRUCache } from './lru-cache.js';
export { KeyedMutex } from './keyed-mutex.js';
export {
  getBuiltinDefaults,
  loadConfigFile,
  mergeConfigs,
  resolveConfig,
  withDefaults,
  writeConfigFile,
} from './config.js';
export { createLogger, setLogLevel } from './logger.js';
