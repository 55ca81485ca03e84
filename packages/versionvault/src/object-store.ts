/**
 * Content-addressed object store.
 *
 * Blobs live at <root>/<hash[0:2]>/<hash[2:]> as raw canonical bytes, no
 * framing; the filename is the only identity record. A bounded LRU cache
 * fronts the disk (read-through on retrieve, filled on store). The
 * hash-to-origin-path map is in memory only, best effort, and never used to
 * decide whether an object exists.
 *
 * Operations on one hash are serialized with a keyed mutex so that a store,
 * a read-through and a cleanup of the same object never interleave.
 */

import type { Dirent } from 'node:fs';
import { access, readFile, readdir, stat, unlink } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { writeFile } from 'atomically';

import type { FileContent } from './file-content.js';
import { fileContentFromBytes } from './file-content.js';
import { ensureDir, errorCode, isNotFound, toIOError } from './fs-utils.js';
import { hashBytes, isValidHash, shortHash } from './hash.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { LRUCache } from './lru-cache.js';
import type { CleanupResult } from './types.js';
import { ValidationError } from './types.js';

export const DEFAULT_STORE_PATH = '.vv/objects';
export const DEFAULT_CACHE_SIZE = 2000;

/** Origin path given to retrieved objects whose source path is unknown */
export const DETACHED_PATH = '<detached>';

/** Length of the directory prefix for sharding (2 hex chars = 256 subdirs) */
const SHARD_PREFIX_LENGTH = 2;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ObjectStoreOptions {
  /** Store root directory */
  root: string;
  /** Maximum blobs held in memory */
  cacheSize?: number | undefined;
  logger?: Logger | undefined;
}

/** A blob found on disk. */
export interface StoredBlob {
  hash: string;
  path: string;
  size: number;
  mtimeMs: number;
}

/** Compute the sharded blob path for a hash. */
export function getObjectPath(root: string, hash: string): string {
  return join(root, hash.slice(0, SHARD_PREFIX_LENGTH), hash.slice(SHARD_PREFIX_LENGTH));
}

function assertValidHash(hash: string): void {
  if (!isValidHash(hash)) {
    throw new ValidationError(`Invalid object hash: ${hash}`, [
      'Object hashes are 64 lowercase hex characters.',
    ]);
  }
}

export class ObjectStore {
  readonly root: string;
  private readonly cache: LRUCache<string, Buffer>;
  private readonly originPaths = new Map<string, string>();
  private readonly locks = new KeyedMutex();
  private readonly log: Logger;

  private constructor(root: string, cacheSize: number, log: Logger) {
    this.root = root;
    this.log = log;
    this.cache = new LRUCache<string, Buffer>(cacheSize, (hash) => {
      this.log.debug({ hash }, 'evicted object from cache');
    });
  }

  /** Open a store, creating its root directory if needed. */
  static async open(options: ObjectStoreOptions): Promise<ObjectStore> {
    const root = resolve(options.root);
    const log = options.logger ?? createLogger('object-store');
    const store = new ObjectStore(root, options.cacheSize ?? DEFAULT_CACHE_SIZE, log);
    await ensureDir(root);
    log.debug({ root }, 'opened object store');
    return store;
  }

  /** Number of blobs currently cached in memory. */
  get cachedObjectCount(): number {
    return this.cache.size;
  }

  get cacheCapacity(): number {
    return this.cache.capacity;
  }

  /**
   * Persist content and return its hash.
   *
   * Identical content stored from any path yields the same hash and a single
   * blob; storing a hash that already exists writes nothing.
   */
  async storeObject(content: FileContent): Promise<string> {
    const hash = await content.getHash();

    return this.locks.withLock(hash, async () => {
      if (await this.hasObject(hash)) {
        this.log.debug({ hash, path: content.path }, 'object already stored');
        return hash;
      }

      const data = await content.getContent();
      const objectPath = getObjectPath(this.root, hash);
      await ensureDir(dirname(objectPath));
      try {
        await writeFile(objectPath, data);
      } catch (err) {
        throw toIOError(err, objectPath, 'Cannot write object');
      }

      this.cache.set(hash, Buffer.from(data));
      this.originPaths.set(hash, content.path);
      this.log.debug({ hash, path: content.path, size: data.length }, 'stored object');
      return hash;
    });
  }

  /**
   * Look up an object by hash.
   *
   * Returns undefined when no blob exists. A disk hit fills the cache. The
   * returned content lives in memory; its path is the last known origin,
   * or DETACHED_PATH, and is never written to.
   *
   * The variant is re-derived from the stored bytes. Text whose CRLF
   * folding pulled a NUL into the first 512 bytes comes back as
   * BinaryContent under the same hash.
   */
  async retrieveObject(hash: string): Promise<FileContent | undefined> {
    assertValidHash(hash);

    const cached = this.cache.get(hash);
    if (cached) {
      return this.reconstruct(hash, cached);
    }

    return this.locks.withLock(hash, async () => {
      const data = await this.readBlob(hash);
      if (!data) {
        return undefined;
      }
      this.cache.set(hash, data);
      this.log.debug({ hash }, 'loaded object into cache');
      return this.reconstruct(hash, data);
    });
  }

  /** True if the object is cached or persisted. Changes nothing. */
  async hasObject(hash: string): Promise<boolean> {
    assertValidHash(hash);
    if (this.cache.has(hash)) {
      return true;
    }
    const objectPath = getObjectPath(this.root, hash);
    try {
      await access(objectPath);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw toIOError(err, objectPath, 'Cannot access object');
    }
  }

  /** Total bytes of all files under the store root. */
  async getStorageSize(): Promise<number> {
    let total = 0;
    for (const file of await listFiles(this.root)) {
      try {
        total += (await stat(file)).size;
      } catch (err) {
        // removed between listing and stat
        if (!isNotFound(err)) {
          throw toIOError(err, file, 'Cannot stat file');
        }
      }
    }
    return total;
  }

  /**
   * Delete blobs older than `maxAgeDays` whole days.
   *
   * Age is floor((now - mtime) / 1 day); a blob goes when its age is
   * strictly greater than the threshold. The cache and the origin-path map
   * are not touched, so `hasObject` can keep answering true for a removed
   * blob until its cache entry is evicted.
   */
  async cleanup(maxAgeDays: number): Promise<CleanupResult> {
    if (!Number.isFinite(maxAgeDays) || maxAgeDays < 0) {
      throw new ValidationError(`maxAgeDays must be a non-negative number, got ${maxAgeDays}`);
    }

    const now = Date.now();
    const result: CleanupResult = { removed: [], freedBytes: 0 };

    for (const blob of await this.listBlobs()) {
      const ageDays = Math.floor((now - blob.mtimeMs) / MS_PER_DAY);
      if (ageDays <= maxAgeDays) {
        continue;
      }
      await this.locks.withLock(blob.hash, async () => {
        try {
          await unlink(blob.path);
        } catch (err) {
          if (isNotFound(err)) {
            return;
          }
          throw toIOError(err, blob.path, 'Cannot delete object');
        }
        result.removed.push(blob.hash);
        result.freedBytes += blob.size;
        this.log.debug({ hash: blob.hash, ageDays }, 'removed expired object');
      });
    }

    this.log.info(
      { removed: result.removed.length, freedBytes: result.freedBytes },
      'cleanup finished',
    );
    return result;
  }

  /**
   * Re-hash a persisted blob and check it against its name.
   *
   * Returns undefined when the blob is not on disk.
   */
  async verifyObject(hash: string): Promise<boolean | undefined> {
    assertValidHash(hash);
    return this.locks.withLock(hash, async () => {
      const data = await this.readBlob(hash);
      if (!data) {
        return undefined;
      }
      const actual = hashBytes(data);
      if (actual !== hash) {
        this.log.warn({ hash, actual: shortHash(actual) }, 'object content does not match its hash');
      }
      return actual === hash;
    });
  }

  /** Hashes of all blobs on disk, sorted. */
  async listObjects(): Promise<string[]> {
    return (await this.listBlobs()).map((blob) => blob.hash);
  }

  /** Known hash-to-origin-path pairs. Best effort: stale or arbitrary when paths share a hash. */
  knownPaths(): Array<[hash: string, path: string]> {
    return [...this.originPaths.entries()];
  }

  /** Last known origin path for a hash, if any. */
  originPathOf(hash: string): string | undefined {
    return this.originPaths.get(hash);
  }

  private reconstruct(hash: string, data: Buffer): FileContent {
    return fileContentFromBytes(this.originPaths.get(hash) ?? DETACHED_PATH, data);
  }

  private async readBlob(hash: string): Promise<Buffer | undefined> {
    const objectPath = getObjectPath(this.root, hash);
    try {
      return await readFile(objectPath);
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw toIOError(err, objectPath, 'Cannot read object');
    }
  }

  /** Blob-shaped files under the root: <2 hex>/<62 hex>. Other files are ignored. */
  private async listBlobs(): Promise<StoredBlob[]> {
    const blobs: StoredBlob[] = [];
    for (const shard of await readDirNames(this.root)) {
      if (!/^[0-9a-f]{2}$/.test(shard)) {
        continue;
      }
      for (const name of await readDirNames(join(this.root, shard))) {
        const hash = shard + name;
        if (!isValidHash(hash)) {
          continue;
        }
        const path = join(this.root, shard, name);
        try {
          const stats = await stat(path);
          if (stats.isFile()) {
            blobs.push({ hash, path, size: stats.size, mtimeMs: stats.mtimeMs });
          }
        } catch (err) {
          if (!isNotFound(err)) {
            throw toIOError(err, path, 'Cannot stat object');
          }
        }
      }
    }
    return blobs.sort((a, b) => (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0));
  }
}

async function readDirNames(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.map((entry) => entry.name);
  } catch (err) {
    if (isNotFound(err)) {
      return [];
    }
    // a stray file where a shard directory would be
    if (errorCode(err) === 'ENOTDIR') {
      return [];
    }
    throw toIOError(err, dir, 'Cannot read directory');
  }
}

/** All regular files below a directory, depth first. */
async function listFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) {
      return [];
    }
    throw toIOError(err, dir, 'Cannot read directory');
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

const sharedStores = new Map<string, Promise<ObjectStore>>();

/**
 * Process-wide store for a root directory.
 *
 * Concurrent first callers share one opening promise, so a root is only
 * ever opened once. Options other than `root` only apply on first open.
 */
export function getSharedObjectStore(options: ObjectStoreOptions): Promise<ObjectStore> {
  const key = resolve(options.root);
  const existing = sharedStores.get(key);
  if (existing) {
    return existing;
  }
  const opening = ObjectStore.open({ ...options, root: key });
  sharedStores.set(key, opening);
  opening.catch(() => {
    // let a later caller retry after a failed open
    sharedStores.delete(key);
  });
  return opening;
}
