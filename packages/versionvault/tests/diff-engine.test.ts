import { describe, expect, it } from 'vitest';

import { GreedyMergeDiff } from '../src/diff-algorithm.js';
import { DiffEngine, editDistance } from '../src/diff-engine.js';
import { BinaryContent, TextContent } from '../src/file-content.js';
import { hashString } from '../src/hash.js';
import { ValidationError } from '../src/types.js';

function text(path: string, lines: string[]): TextContent {
  const content = new TextContent(path);
  content.setLines(lines);
  return content;
}

describe('DiffEngine.compareFiles', () => {
  const engine = new DiffEngine();

  it('reports unchanged with empty fields when both sides are absent', async () => {
    expect(await engine.compareFiles(undefined, undefined)).toEqual({
      type: 'unchanged',
      path: '',
      oldHash: '',
      newHash: '',
    });
  });

  it('reports an added file under the new path', async () => {
    expect(await engine.compareFiles(undefined, text('new.txt', ['a']))).toEqual({
      type: 'added',
      path: 'new.txt',
      oldHash: '',
      newHash: hashString('a\n'),
    });
  });

  it('reports a removed file under the old path', async () => {
    expect(await engine.compareFiles(text('old.txt', ['a']), undefined)).toEqual({
      type: 'removed',
      path: 'old.txt',
      oldHash: hashString('a\n'),
      newHash: '',
    });
  });

  it('reports unchanged for equal hashes even across paths', async () => {
    const change = await engine.compareFiles(text('a.txt', ['x']), text('b.txt', ['x']));
    expect(change.type).toBe('unchanged');
    expect(change.path).toBe('a.txt');
    expect(change.oldHash).toBe(change.newHash);
  });

  it('reports modified for different hashes', async () => {
    const change = await engine.compareFiles(text('a.txt', ['x']), text('a.txt', ['y']));
    expect(change).toEqual({
      type: 'modified',
      path: 'a.txt',
      oldHash: hashString('x\n'),
      newHash: hashString('y\n'),
    });
  });

  it('compares binary content by raw bytes', async () => {
    const a = new BinaryContent('a.bin');
    a.setData(Buffer.from([0, 1]));
    const b = new BinaryContent('a.bin');
    b.setData(Buffer.from([0, 2]));
    expect((await engine.compareFiles(a, b)).type).toBe('modified');
  });
});

describe('DiffEngine.generateLineDiff', () => {
  it('uses the greedy algorithm by default', async () => {
    const engine = new DiffEngine();
    expect(engine.algorithmName).toBe('greedy');
    expect(
      await engine.generateLineDiff(text('a', ['foo', 'bar']), text('a', ['foo', 'baz'])),
    ).toEqual([' foo', '-bar', '+baz']);
  });

  it('returns nothing when a side is absent', async () => {
    const engine = new DiffEngine();
    expect(await engine.generateLineDiff(undefined, text('a', ['x']))).toEqual([]);
    expect(await engine.generateLineDiff(text('a', ['x']), undefined)).toEqual([]);
  });

  it('switches algorithms by name or instance', async () => {
    const engine = new DiffEngine({ algorithm: 'myers' });
    expect(engine.algorithmName).toBe('myers');
    expect(await engine.generateLineDiff(text('a', ['b']), text('a', ['a', 'b']))).toEqual([
      '+a',
      ' b',
    ]);

    engine.setAlgorithm(new GreedyMergeDiff());
    expect(engine.algorithmName).toBe('greedy');
    engine.setAlgorithm('myers');
    expect(engine.algorithmName).toBe('myers');
  });
});

describe('DiffEngine.generateUnifiedDiff', () => {
  const oldLines = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];
  const newLines = ['a', 'b', 'c', 'D', 'e', 'f', 'g', 'h'];

  it('trims context around a change and writes headers', async () => {
    const engine = new DiffEngine({ contextLines: 1 });
    expect(
      await engine.generateUnifiedDiff(text('old/f.txt', oldLines), text('new/f.txt', newLines)),
    ).toEqual(['--- old/f.txt', '+++ new/f.txt', '@@ -3,3 +3,3 @@', ' c', '+D', '-d', ' e']);
  });

  it('uses three context lines by default', async () => {
    const engine = new DiffEngine();
    expect(engine.getContextLines()).toBe(3);
    expect(await engine.generateUnifiedDiff(text('f', oldLines), text('f', newLines))).toEqual([
      '--- f',
      '+++ f',
      '@@ -1,7 +1,7 @@',
      ' a',
      ' b',
      ' c',
      '+D',
      '-d',
      ' e',
      ' f',
      ' g',
    ]);
  });

  it('splits distant changes into separate hunks', async () => {
    const engine = new DiffEngine({ algorithm: 'myers', contextLines: 0 });
    const before = ['1', '2', '3', '4', '5'];
    const after = ['1', 'x', '2', '3', '4'];
    expect(await engine.generateUnifiedDiff(text('f', before), text('f', after))).toEqual([
      '--- f',
      '+++ f',
      '@@ -1,0 +2,1 @@',
      '+x',
      '@@ -5,1 +5,0 @@',
      '-5',
    ]);
  });

  it('uses labels in place of paths when given', async () => {
    const engine = new DiffEngine({ contextLines: 0 });
    const lines = await engine.generateUnifiedDiff(text('/abs/a', ['x']), text('/abs/b', ['y']), {
      old: 'a',
    });
    expect(lines.slice(0, 2)).toEqual(['--- a', '+++ /abs/b']);
  });

  it('returns nothing for identical files', async () => {
    const engine = new DiffEngine();
    expect(await engine.generateUnifiedDiff(text('f', ['a']), text('f', ['a']))).toEqual([]);
  });

  it('validates context lines', () => {
    const engine = new DiffEngine();
    expect(() => engine.setContextLines(-1)).toThrow(ValidationError);
    expect(() => engine.setContextLines(1.5)).toThrow(ValidationError);
    engine.setContextLines(0);
    expect(engine.getContextLines()).toBe(0);
    expect(() => new DiffEngine({ contextLines: -2 })).toThrow(ValidationError);
  });
});

describe('similarity', () => {
  const engine = new DiffEngine();

  it('treats two empty strings as identical', () => {
    expect(engine.calculateSimilarity('', '')).toBe(1);
  });

  it('scores zero when exactly one side is empty', () => {
    expect(engine.calculateSimilarity('', 'abc')).toBe(0);
    expect(engine.calculateSimilarity('abc', '')).toBe(0);
  });

  it('scores one for equal strings', () => {
    expect(engine.calculateSimilarity('abc', 'abc')).toBe(1);
  });

  it('normalizes the edit distance by the longer length', () => {
    expect(engine.calculateSimilarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7, 10);
    expect(engine.calculateSimilarity('abcd', 'abcx')).toBe(0.75);
  });

  it('is symmetric', () => {
    expect(engine.calculateSimilarity('flaw', 'lawn')).toBe(
      engine.calculateSimilarity('lawn', 'flaw'),
    );
  });

  it('counts code points, not UTF-16 units', () => {
    expect(engine.calculateSimilarity('😀', '😁')).toBe(0);
    expect(engine.calculateSimilarity('a😀', 'a😁')).toBe(0.5);
  });

  it('editDistance handles empty sides', () => {
    expect(editDistance([], ['a', 'b'])).toBe(2);
    expect(editDistance(['a'], [])).toBe(1);
  });

  it('areFilesSimilar compares newline-joined lines against the threshold', async () => {
    const a = text('a', ['abcd']);
    const b = text('b', ['abcx']);
    expect(await engine.areFilesSimilar(a, b)).toBe(true);
    expect(await engine.areFilesSimilar(a, b, 0.75)).toBe(true);
    expect(await engine.areFilesSimilar(a, b, 0.8)).toBe(false);
  });

  it('does not count trailing newlines when joining lines', async () => {
    // "a\nb" vs "a\nc" scores 2/3; with trailing newlines it would be 3/4
    const similar = await engine.areFilesSimilar(text('a', ['a', 'b']), text('b', ['a', 'c']), 0.7);
    expect(similar).toBe(false);
  });
});
