/**
 * File content abstraction: identity hash, lazy loading, text/binary variants.
 *
 * Text content is line-ending-normalized: its canonical bytes are each line
 * followed by "\n", so CRLF and LF copies of a file share one hash. Binary
 * content hashes its raw bytes. Bytes that are not valid UTF-8 are always
 * binary, so no decoding step can fold two different files into one hash.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { hashBytes } from './hash.js';
import { isNotFound, toIOError } from './fs-utils.js';
import { IOError, ValidationError } from './types.js';

/** Number of leading bytes inspected when classifying text vs binary */
export const BINARY_SNIFF_LENGTH = 512;

/**
 * Base class for a file's bytes and identity hash.
 *
 * Content is loaded from `path` on first read or hash request. Writes mark
 * the instance dirty so the next `getHash()` recomputes.
 */
export abstract class FileContent {
  readonly path: string;
  abstract readonly isBinary: boolean;

  private cachedHash: string | undefined;
  protected dirty = false;

  constructor(path: string) {
    this.path = path;
  }

  /** Byte length of the in-memory content; 0 until loaded. */
  abstract get size(): number;

  /** True once content has been loaded or set in memory. */
  protected abstract get loaded(): boolean;

  /** Canonical bytes of the in-memory content, in a buffer the caller owns. */
  protected abstract canonicalBytes(): Buffer;

  /**
   * Load content from `path`, returning its canonical bytes.
   *
   * Always reads the backing file, replacing whatever is in memory.
   */
  abstract readContent(): Promise<Buffer>;

  /** Persist bytes to `path` and replace the in-memory content. */
  abstract writeContent(data: Uint8Array): Promise<void>;

  /** Whether the cached hash is stale. */
  get isDirty(): boolean {
    return this.dirty;
  }

  /** Canonical bytes, read from `path` only if nothing is loaded yet. */
  async getContent(): Promise<Buffer> {
    if (!this.loaded) {
      return this.readContent();
    }
    return this.canonicalBytes();
  }

  async getHash(): Promise<string> {
    if (this.cachedHash !== undefined && !this.dirty) {
      return this.cachedHash;
    }
    if (!this.loaded) {
      await this.readContent();
    }
    this.cachedHash = hashBytes(this.canonicalBytes());
    this.dirty = false;
    return this.cachedHash;
  }

  /**
   * Content equality by hash.
   *
   * Computes (and caches) the hash of both sides, loading content from disk
   * if needed.
   */
  async equals(other: FileContent): Promise<boolean> {
    const [mine, theirs] = await Promise.all([this.getHash(), other.getHash()]);
    return mine === theirs;
  }
}

/** Split text into lines on CRLF, CR or LF. A final terminator adds no empty line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Rejoin lines with a trailing newline per line. */
export function joinLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

export class TextContent extends FileContent {
  readonly isBinary = false;
  private lines: string[] | undefined;

  get size(): number {
    return this.lines ? this.canonicalBytes().length : 0;
  }

  protected get loaded(): boolean {
    return this.lines !== undefined;
  }

  protected canonicalBytes(): Buffer {
    return Buffer.from(joinLines(this.lines ?? []), 'utf-8');
  }

  async readContent(): Promise<Buffer> {
    let data: Buffer;
    try {
      data = await readFile(this.path);
    } catch (err) {
      throw toIOError(err, this.path, 'Cannot read file');
    }
    const text = decodeUtf8(data);
    if (text === undefined) {
      throw new IOError(`Not valid UTF-8 text: ${this.path}`, this.path);
    }
    this.lines = splitLines(text);
    this.dirty = true;
    return this.canonicalBytes();
  }

  async writeContent(data: Uint8Array): Promise<void> {
    const text = decodeUtf8(data);
    if (text === undefined) {
      throw new ValidationError(`Not valid UTF-8 text: ${this.path}`, [
        'Store bytes that are not UTF-8 as BinaryContent.',
      ]);
    }
    try {
      await writeFile(this.path, data);
    } catch (err) {
      throw toIOError(err, this.path, 'Cannot write file');
    }
    this.setText(text);
  }

  /** Lines of the file, read from disk on first access if never set. */
  async getLines(): Promise<string[]> {
    if (this.lines === undefined) {
      await this.readContent();
    }
    return [...(this.lines ?? [])];
  }

  /** Replace the content in memory. Nothing is written until `writeContent`. */
  setLines(newLines: readonly string[]): void {
    this.lines = [...newLines];
    this.dirty = true;
  }

  getLineCount(): number {
    return this.lines?.length ?? 0;
  }

  /** @internal Seed content without touching disk. */
  setText(text: string): void {
    this.setLines(splitLines(text));
  }
}

export class BinaryContent extends FileContent {
  readonly isBinary = true;
  private data: Buffer | undefined;

  get size(): number {
    return this.data?.length ?? 0;
  }

  protected get loaded(): boolean {
    return this.data !== undefined;
  }

  protected canonicalBytes(): Buffer {
    return this.data ? Buffer.from(this.data) : Buffer.alloc(0);
  }

  async readContent(): Promise<Buffer> {
    try {
      this.data = await readFile(this.path);
    } catch (err) {
      throw toIOError(err, this.path, 'Cannot read file');
    }
    this.dirty = true;
    return this.canonicalBytes();
  }

  async writeContent(data: Uint8Array): Promise<void> {
    try {
      await writeFile(this.path, data);
    } catch (err) {
      throw toIOError(err, this.path, 'Cannot write file');
    }
    this.setData(data);
  }

  /** Copy of the loaded bytes; empty until read or set. */
  getData(): Buffer {
    return this.canonicalBytes();
  }

  /** @internal Seed content without touching disk. */
  setData(data: Uint8Array): void {
    this.data = Buffer.from(data);
    this.dirty = true;
  }
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Decode UTF-8 without substitution; undefined for malformed input. A BOM is kept. */
export function decodeUtf8(data: Uint8Array): string | undefined {
  try {
    return strictUtf8.decode(data);
  } catch (err) {
    if (err instanceof TypeError) {
      return undefined;
    }
    throw err;
  }
}

function hasLeadingNul(data: Uint8Array): boolean {
  const limit = Math.min(data.length, BINARY_SNIFF_LENGTH);
  for (let i = 0; i < limit; i++) {
    if (data[i] === 0) {
      return true;
    }
  }
  return false;
}

/** Binary when a NUL byte appears in the first 512 bytes or the bytes are not valid UTF-8. */
export function looksBinary(data: Uint8Array): boolean {
  return hasLeadingNul(data) || decodeUtf8(data) === undefined;
}

/**
 * Read a file and classify it with `looksBinary`.
 *
 * A missing file counts as text so that new files can be created through
 * `writeContent`.
 */
export async function detectBinary(path: string): Promise<boolean> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    if (isNotFound(err)) {
      return false;
    }
    throw toIOError(err, path, 'Cannot read file');
  }
  return looksBinary(data);
}

/** Create a lazily loaded FileContent for a path, classified as text or binary. */
export async function openFileContent(path: string): Promise<FileContent> {
  return (await detectBinary(path)) ? new BinaryContent(path) : new TextContent(path);
}

/**
 * Build an in-memory FileContent from bytes, classified like `looksBinary`.
 *
 * `path` is recorded as the origin only; nothing is read from or written to it.
 */
export function fileContentFromBytes(path: string, data: Uint8Array): FileContent {
  const text = hasLeadingNul(data) ? undefined : decodeUtf8(data);
  if (text === undefined) {
    const content = new BinaryContent(path);
    content.setData(data);
    return content;
  }
  const content = new TextContent(path);
  content.setText(text);
  return content;
}
