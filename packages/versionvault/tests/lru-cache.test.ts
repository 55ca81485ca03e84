import { describe, expect, it } from 'vitest';

import { LRUCache } from '../src/lru-cache.js';
import { ValidationError } from '../src/types.js';

describe('LRUCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);
    expect(cache.keys()).toEqual(['b', 'c']);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(2);
  });

  it('get refreshes recency', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);
    expect(cache.keys()).toEqual(['a', 'c']);
  });

  it('has and peek leave the order alone', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.has('a')).toBe(true);
    expect(cache.peek('a')).toBe(1);
    cache.set('c', 3);
    expect(cache.has('a')).toBe(false);
    expect(cache.keys()).toEqual(['b', 'c']);
  });

  it('set on an existing key replaces and refreshes it', () => {
    const cache = new LRUCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);
    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.peek('a')).toBe(10);
  });

  it('reports evictions', () => {
    const evicted: Array<[string, number]> = [];
    const cache = new LRUCache<string, number>(1, (key, value) => evicted.push([key, value]));
    cache.set('a', 1);
    cache.set('a', 2);
    cache.set('b', 3);
    expect(evicted).toEqual([['a', 2]]);
  });

  it('delete and clear remove entries without eviction callbacks', () => {
    const evicted: string[] = [];
    const cache = new LRUCache<string, number>(3, (key) => evicted.push(key));
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(evicted).toEqual([]);
  });

  it('never grows past capacity', () => {
    const cache = new LRUCache<number, number>(5);
    for (let i = 0; i < 100; i++) {
      cache.set(i, i);
      expect(cache.size).toBeLessThanOrEqual(5);
    }
    expect(cache.keys()).toEqual([95, 96, 97, 98, 99]);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new LRUCache(0)).toThrow(ValidationError);
    expect(() => new LRUCache(1.5)).toThrow(ValidationError);
    expect(new LRUCache(1).capacity).toBe(1);
  });
});
