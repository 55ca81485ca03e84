import { describe, expect, it } from 'vitest';

import { GreedyMergeDiff, MyersDiff, createDiffAlgorithm } from '../src/diff-algorithm.js';
import { ValidationError } from '../src/types.js';

describe('GreedyMergeDiff', () => {
  const greedy = new GreedyMergeDiff();

  it('emits context for equal lines and orders differing lines', () => {
    expect(greedy.computeDiff(['foo', 'bar'], ['foo', 'baz'])).toEqual([' foo', '-bar', '+baz']);
  });

  it('emits the new line first when it sorts lower', () => {
    expect(greedy.computeDiff(['b'], ['a'])).toEqual(['+a', '-b']);
  });

  it('drains the remaining side', () => {
    expect(greedy.computeDiff(['a'], ['a', 'b', 'c'])).toEqual([' a', '+b', '+c']);
    expect(greedy.computeDiff(['a', 'b'], [])).toEqual(['-a', '-b']);
  });

  it('compares by code unit, so uppercase sorts first', () => {
    expect(greedy.computeDiff(['d'], ['D'])).toEqual(['+D', '-d']);
  });

  it('returns nothing for two empty inputs', () => {
    expect(greedy.computeDiff([], [])).toEqual([]);
  });

  it('emits one line per input line', () => {
    const oldLines = ['x', 'm', 'a'];
    const newLines = ['a', 'm', 'z', 'q'];
    const out = greedy.computeDiff(oldLines, newLines);
    const kept = out.filter((l) => l.startsWith(' ')).length;
    const removed = out.filter((l) => l.startsWith('-')).length;
    const added = out.filter((l) => l.startsWith('+')).length;
    expect(kept + removed).toBe(oldLines.length);
    expect(kept + added).toBe(newLines.length);
  });
});

describe('MyersDiff', () => {
  const myers = new MyersDiff();

  it('finds a single deletion', () => {
    expect(myers.computeDiff(['a', 'b', 'c'], ['a', 'c'])).toEqual([' a', '-b', ' c']);
  });

  it('finds a single insertion', () => {
    expect(myers.computeDiff(['a', 'c'], ['a', 'b', 'c'])).toEqual([' a', '+b', ' c']);
  });

  it('keeps identical input as context', () => {
    expect(myers.computeDiff(['a', 'b'], ['a', 'b'])).toEqual([' a', ' b']);
  });
});

describe('createDiffAlgorithm', () => {
  it('builds algorithms by name', () => {
    expect(createDiffAlgorithm('greedy')).toBeInstanceOf(GreedyMergeDiff);
    expect(createDiffAlgorithm('myers').name).toBe('myers');
  });

  it('rejects unknown names', () => {
    expect(() => createDiffAlgorithm('patience')).toThrow(ValidationError);
    expect(() => createDiffAlgorithm('patience')).toThrow('Unknown diff algorithm: patience');
  });
});
