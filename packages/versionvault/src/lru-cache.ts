/**
 * Bounded least-recently-used cache.
 *
 * Recency order lives in the Map's insertion order: the first key is the
 * least recently used. `get` and `set` refresh an entry; `has` and `peek`
 * leave the order alone. Size never exceeds capacity.
 */

import { ValidationError } from './types.js';

export class LRUCache<K, V> {
  private readonly entries = new Map<K, V>();
  readonly capacity: number;
  private readonly onEvict: ((key: K, value: V) => void) | undefined;

  /**
   * @param capacity Maximum number of entries (positive integer)
   * @param onEvict Called for each entry pushed out by a newer one
   */
  constructor(capacity: number, onEvict?: (key: K, value: V) => void) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.onEvict = onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /** Read without marking the entry as used. */
  peek(key: K): V | undefined {
    return this.entries.get(key);
  }

  /** Read and mark the entry as most recently used. */
  get(key: K): V | undefined {
    if (!this.entries.has(key)) {
      return undefined;
    }
    const value = this.entries.get(key);
    this.entries.delete(key);
    if (value !== undefined) {
      this.entries.set(key, value);
    }
    return value;
  }

  /** Insert or replace, then evict least recently used entries over capacity. */
  set(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      const evicted = this.entries.get(oldest.value);
      this.entries.delete(oldest.value);
      if (evicted !== undefined) {
        this.onEvict?.(oldest.value, evicted);
      }
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.entries.keys()];
  }
}
