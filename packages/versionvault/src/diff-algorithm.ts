/**
 * Line diff algorithms.
 *
 * Every algorithm emits one output line per input line, prefixed with
 * " " (in both), "-" (old only) or "+" (new only).
 */

import { diffArrays } from 'diff';

import type { DiffAlgorithmName } from './types.js';
import { ValidationError } from './types.js';

export const CONTEXT_PREFIX = ' ';
export const REMOVED_PREFIX = '-';
export const ADDED_PREFIX = '+';

export interface DiffAlgorithm {
  readonly name: DiffAlgorithmName;
  computeDiff(oldLines: readonly string[], newLines: readonly string[]): string[];
}

/**
 * Greedy two-pointer merge.
 *
 * Equal lines advance both sides. Otherwise the smaller line (UTF-16 code
 * unit order) is emitted first: a removal when the old line sorts before
 * the new one or the new side is exhausted, else an addition. Output is
 * not minimal and misaligns reordered content.
 */
export class GreedyMergeDiff implements DiffAlgorithm {
  readonly name = 'greedy' as const;

  computeDiff(oldLines: readonly string[], newLines: readonly string[]): string[] {
    const result: string[] = [];
    let i = 0;
    let j = 0;

    while (i < oldLines.length || j < newLines.length) {
      const oldLine = oldLines[i];
      const newLine = newLines[j];

      if (oldLine !== undefined && newLine !== undefined && oldLine === newLine) {
        result.push(CONTEXT_PREFIX + oldLine);
        i++;
        j++;
      } else if (oldLine !== undefined && (newLine === undefined || oldLine < newLine)) {
        result.push(REMOVED_PREFIX + oldLine);
        i++;
      } else if (newLine !== undefined) {
        result.push(ADDED_PREFIX + newLine);
        j++;
      }
    }

    return result;
  }
}

/** Minimal edit script (Myers) via jsdiff. Removals precede additions within a change. */
export class MyersDiff implements DiffAlgorithm {
  readonly name = 'myers' as const;

  computeDiff(oldLines: readonly string[], newLines: readonly string[]): string[] {
    const result: string[] = [];
    for (const part of diffArrays([...oldLines], [...newLines])) {
      const prefix = part.added ? ADDED_PREFIX : part.removed ? REMOVED_PREFIX : CONTEXT_PREFIX;
      for (const line of part.value) {
        result.push(prefix + line);
      }
    }
    return result;
  }
}

/** Build a fresh algorithm instance by name. */
export function createDiffAlgorithm(name: string): DiffAlgorithm {
  switch (name) {
    case 'greedy':
      return new GreedyMergeDiff();
    case 'myers':
      return new MyersDiff();
    default:
      throw new ValidationError(`Unknown diff algorithm: ${name}`, [
        'Use one of: greedy, myers.',
      ]);
  }
}
