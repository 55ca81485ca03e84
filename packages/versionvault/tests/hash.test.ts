import { describe, expect, it } from 'vitest';

import { hashBytes, hashString, isValidHash, shortHash } from '../src/hash.js';

describe('hash', () => {
  it('hashes empty input to the well-known SHA-256 digest', () => {
    expect(hashBytes(new Uint8Array())).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('hashes a string as UTF-8', () => {
    expect(hashString('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
    expect(hashBytes(Buffer.from('abc', 'utf-8'))).toBe(hashString('abc'));
  });

  it('returns consistent hash for same content', () => {
    expect(hashBytes(Buffer.from('identical content'))).toBe(
      hashBytes(Buffer.from('identical content')),
    );
  });

  it('isValidHash validates correctly', () => {
    expect(isValidHash('a'.repeat(64))).toBe(true);
    expect(isValidHash('a'.repeat(63))).toBe(false);
    expect(isValidHash('A'.repeat(64))).toBe(false);
    expect(isValidHash('sha256:' + 'a'.repeat(64))).toBe(false);
    expect(isValidHash('../' + 'a'.repeat(61))).toBe(false);
  });

  it('shortHash keeps the first 12 characters by default', () => {
    expect(shortHash('0123456789abcdef')).toBe('0123456789ab');
    expect(shortHash('0123456789abcdef', 4)).toBe('0123');
  });
});
