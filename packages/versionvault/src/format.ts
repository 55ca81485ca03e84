/**
 * Terminal and JSON rendering for the vv CLI.
 *
 * Human output goes through a semantic palette so that `--color never`
 * (or a non-TTY stdout, or NO_COLOR) yields plain text. JSON output is
 * wrapped in an envelope carrying `schema_version`.
 */

import colors, { createColors } from 'picocolors';

import type { Change, ChangeType, VaultError } from './types.js';

export const SCHEMA_VERSION = '0.1';

export type ColorMode = 'always' | 'never' | 'auto';

type Paint = (text: string | number) => string;

export interface Palette {
  success: Paint;
  error: Paint;
  warning: Paint;
  info: Paint;
  heading: Paint;
  hint: Paint;
  muted: Paint;
}

function buildPalette(mode: ColorMode): Palette {
  const pc = mode === 'auto' ? colors : createColors(mode === 'always');
  return {
    success: pc.green,
    error: pc.red,
    warning: pc.yellow,
    info: pc.cyan,
    heading: pc.bold,
    hint: pc.dim,
    muted: pc.gray,
  };
}

/** Active palette. Replaced wholesale by `initColors`. */
export let c: Palette = buildPalette('auto');

/** Pick the color mode; call once the --color flag is parsed. */
export function initColors(mode: ColorMode): void {
  c = buildPalette(mode);
}

const SIZE_UNITS = ['KB', 'MB', 'GB'] as const;

/** "512 B", "1.5 KB", "12 MB": one decimal below 10 units. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  let value = bytes;
  let unit: string = SIZE_UNITS[0];
  for (const next of SIZE_UNITS) {
    value /= 1024;
    unit = next;
    if (value < 1024) break;
  }
  return value >= 10 ? `${Math.round(value)} ${unit}` : `${value.toFixed(1)} ${unit}`;
}

export function formatJson(data: unknown): string {
  const body = typeof data === 'object' && data !== null ? data : { data };
  return JSON.stringify({ schema_version: SCHEMA_VERSION, ...body }, null, 2);
}

export function formatJsonError(error: Error): string {
  if (isVaultError(error)) {
    const { message, category, suggestions } = error;
    return formatJson(
      suggestions ? { error: message, type: category, suggestions } : { error: message, type: category },
    );
  }
  return formatJson({ error: error.message, type: 'unknown' });
}

/** "Error: message", then a blank line and indented suggestions if any. */
export function formatError(error: Error): string {
  const head = c.error(`Error: ${error.message}`);
  const suggestions = isVaultError(error) ? (error.suggestions ?? []) : [];
  if (suggestions.length === 0) {
    return head;
  }
  return [head, '', ...suggestions.map((s) => c.hint(`  ${s}`))].join('\n');
}

function isVaultError(error: Error): error is VaultError {
  return 'category' in error;
}

const CHECK_PASS = '✓';
const CHECK_FAIL = '✗';

/** One-letter status per change type, as in `git status --short`. */
export const CHANGE_SYMBOLS: Record<ChangeType, string> = {
  added: 'A',
  removed: 'D',
  modified: 'M',
  unchanged: '=',
};

function paintChange(type: ChangeType, text: string): string {
  switch (type) {
    case 'added':
      return c.success(text);
    case 'removed':
      return c.error(text);
    case 'modified':
      return c.warning(text);
    case 'unchanged':
      return c.muted(text);
  }
}

function short(hash: string): string {
  return hash === '' ? '-' : hash.slice(0, 12);
}

/** "M  path  1a2b3c4d5e6f -> 0f9e8d7c6b5a"; an absent side shows "-". */
export function formatChange(change: Change): string {
  const status = paintChange(change.type, CHANGE_SYMBOLS[change.type]);
  return `${status}  ${change.path}  ${c.muted(`${short(change.oldHash)} -> ${short(change.newHash)}`)}`;
}

export function formatDiffLine(line: string): string {
  if (line.startsWith('---') || line.startsWith('+++')) return c.heading(line);
  if (line.startsWith('@@')) return c.info(line);
  if (line.startsWith('+')) return c.success(line);
  if (line.startsWith('-')) return c.error(line);
  return line;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatCheckPass(message: string): string {
  return `  ${c.success(CHECK_PASS)}  ${message}`;
}

export function formatCheckFail(message: string): string {
  return `  ${c.error(CHECK_FAIL)}  ${message}`;
}

/** "1 file", "3 files"; pass `plural` for irregular forms. */
export function formatCount(n: number, singular: string, plural = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : plural}`;
}

export function formatHint(hint: string): string {
  return c.hint(`  ${hint}`);
}
