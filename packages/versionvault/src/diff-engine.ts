/**
 * Diff engine: change classification, line diffs, similarity scoring.
 *
 * Works purely on in-memory FileContent; it never reads or writes the
 * object store. The line diff strategy is pluggable and owned by the engine.
 */

import type { DiffAlgorithm } from './diff-algorithm.js';
import {
  ADDED_PREFIX,
  GreedyMergeDiff,
  REMOVED_PREFIX,
  createDiffAlgorithm,
} from './diff-algorithm.js';
import type { FileContent, TextContent } from './file-content.js';
import type { Change, DiffAlgorithmName } from './types.js';
import { ValidationError } from './types.js';

export const DEFAULT_CONTEXT_LINES = 3;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

export interface DiffEngineOptions {
  /** Algorithm instance (ownership passes to the engine) or built-in name */
  algorithm?: DiffAlgorithm | DiffAlgorithmName | undefined;
  contextLines?: number | undefined;
}

/** Names shown in the "---" and "+++" headers of a unified diff. */
export interface DiffLabels {
  old?: string | undefined;
  new?: string | undefined;
}

export class DiffEngine {
  private algorithm: DiffAlgorithm;
  private contextLines = DEFAULT_CONTEXT_LINES;

  constructor(options: DiffEngineOptions = {}) {
    this.algorithm = resolveAlgorithm(options.algorithm ?? new GreedyMergeDiff());
    if (options.contextLines !== undefined) {
      this.setContextLines(options.contextLines);
    }
  }

  get algorithmName(): DiffAlgorithmName {
    return this.algorithm.name;
  }

  /** Replace the diff algorithm. The previous instance is dropped. */
  setAlgorithm(algorithm: DiffAlgorithm | DiffAlgorithmName): void {
    this.algorithm = resolveAlgorithm(algorithm);
  }

  setContextLines(lines: number): void {
    if (!Number.isInteger(lines) || lines < 0) {
      throw new ValidationError(`Context lines must be a non-negative integer, got ${lines}`);
    }
    this.contextLines = lines;
  }

  getContextLines(): number {
    return this.contextLines;
  }

  /** Classify the change between two optional snapshots of a file. */
  async compareFiles(
    oldFile: FileContent | undefined,
    newFile: FileContent | undefined,
  ): Promise<Change> {
    if (!oldFile) {
      if (!newFile) {
        return { type: 'unchanged', path: '', oldHash: '', newHash: '' };
      }
      return { type: 'added', path: newFile.path, oldHash: '', newHash: await newFile.getHash() };
    }
    if (!newFile) {
      return { type: 'removed', path: oldFile.path, oldHash: await oldFile.getHash(), newHash: '' };
    }

    const oldHash = await oldFile.getHash();
    const newHash = await newFile.getHash();
    return {
      type: oldHash === newHash ? 'unchanged' : 'modified',
      path: oldFile.path,
      oldHash,
      newHash,
    };
  }

  /** Full annotated line diff. Empty when either side is absent. */
  async generateLineDiff(
    oldFile: TextContent | undefined,
    newFile: TextContent | undefined,
  ): Promise<string[]> {
    if (!oldFile || !newFile) {
      return [];
    }
    const [oldLines, newLines] = await Promise.all([oldFile.getLines(), newFile.getLines()]);
    return this.algorithm.computeDiff(oldLines, newLines);
  }

  /**
   * Unified diff with file headers and hunks.
   *
   * Unchanged runs are trimmed to `contextLines` around each change; changes
   * whose context overlaps share a hunk. Returns [] when nothing differs.
   * Header names default to each file's path.
   */
  async generateUnifiedDiff(
    oldFile: TextContent | undefined,
    newFile: TextContent | undefined,
    labels: DiffLabels = {},
  ): Promise<string[]> {
    const lines = await this.generateLineDiff(oldFile, newFile);
    if (!oldFile || !newFile) {
      return [];
    }
    const hunks = buildHunks(lines, this.contextLines);
    if (hunks.length === 0) {
      return [];
    }
    return [
      `--- ${labels.old ?? oldFile.path}`,
      `+++ ${labels.new ?? newFile.path}`,
      ...hunks.flat(),
    ];
  }

  /**
   * Normalized Levenshtein similarity in [0, 1].
   *
   * Distances count Unicode code points with unit insert, delete and
   * substitute costs. Two empty strings are identical; one empty string
   * shares nothing with a non-empty one.
   */
  calculateSimilarity(textA: string, textB: string): number {
    const a = Array.from(textA);
    const b = Array.from(textB);

    if (a.length === 0 && b.length === 0) return 1.0;
    if (a.length === 0 || b.length === 0) return 0.0;

    return 1.0 - editDistance(a, b) / Math.max(a.length, b.length);
  }

  async areFilesSimilar(
    fileA: TextContent,
    fileB: TextContent,
    threshold = DEFAULT_SIMILARITY_THRESHOLD,
  ): Promise<boolean> {
    const [linesA, linesB] = await Promise.all([fileA.getLines(), fileB.getLines()]);
    return this.calculateSimilarity(linesA.join('\n'), linesB.join('\n')) >= threshold;
  }
}

function resolveAlgorithm(algorithm: DiffAlgorithm | DiffAlgorithmName): DiffAlgorithm {
  return typeof algorithm === 'string' ? createDiffAlgorithm(algorithm) : algorithm;
}

/** Levenshtein distance, keeping two rows of the DP table. */
export function editDistance(a: readonly string[], b: readonly string[]): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const diagonal = previous[j - 1] ?? 0;
      if (a[i - 1] === b[j - 1]) {
        current[j] = diagonal;
      } else {
        current[j] = 1 + Math.min(previous[j] ?? 0, current[j - 1] ?? 0, diagonal);
      }
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

function isChange(line: string): boolean {
  return line.startsWith(ADDED_PREFIX) || line.startsWith(REMOVED_PREFIX);
}

/** Group annotated lines into hunks, each led by an "@@ -a,b +c,d @@" header. */
function buildHunks(lines: readonly string[], context: number): string[][] {
  const changeIndexes: number[] = [];
  lines.forEach((line, index) => {
    if (isChange(line)) changeIndexes.push(index);
  });

  const ranges: Array<[number, number]> = [];
  for (const index of changeIndexes) {
    const start = Math.max(0, index - context);
    const end = Math.min(lines.length - 1, index + context);
    const last = ranges[ranges.length - 1];
    if (last && start <= last[1] + 1) {
      last[1] = end;
    } else {
      ranges.push([start, end]);
    }
  }

  return ranges.map(([start, end]) => {
    let oldBefore = 0;
    let newBefore = 0;
    for (const line of lines.slice(0, start)) {
      if (!line.startsWith(ADDED_PREFIX)) oldBefore++;
      if (!line.startsWith(REMOVED_PREFIX)) newBefore++;
    }
    const body = lines.slice(start, end + 1);
    const oldCount = body.filter((line) => !line.startsWith(ADDED_PREFIX)).length;
    const newCount = body.filter((line) => !line.startsWith(REMOVED_PREFIX)).length;
    const oldStart = oldBefore + (oldCount > 0 ? 1 : 0);
    const newStart = newBefore + (newCount > 0 ? 1 : 0);
    return [`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`, ...body];
  });
}
