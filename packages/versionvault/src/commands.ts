/**
 * Command handlers and program definition for the vv CLI.
 *
 * Commander.js-based, with global flags and dual-mode output
 * (human-readable + JSON). Handlers never call process.exit; failures set
 * process.exitCode.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { Command, InvalidArgumentError, Option } from 'commander';
import { stringify as stringifyYaml } from 'yaml';

import { resolveConfig, resolveConfigWithOrigins, resolveStorePath } from './config.js';
import { DiffEngine } from './diff-engine.js';
import type { FileContent } from './file-content.js';
import { TextContent, openFileContent } from './file-content.js';
import {
  formatChange,
  formatCheckFail,
  formatCheckPass,
  formatCount,
  formatDiffLine,
  formatError,
  formatHint,
  formatJson,
  formatJsonError,
  formatPercent,
  formatSize,
  initColors,
} from './format.js';
import { shortHash } from './hash.js';
import { setLogLevel } from './logger.js';
import type { ObjectStore } from './object-store.js';
import { getSharedObjectStore } from './object-store.js';
import {
  findStorableFiles,
  findWorkRoot,
  isDirectory,
  resolveFilePath,
  toRootRelative,
} from './paths.js';
import type { DiffAlgorithmName, GlobalOptions, ResolvedVaultConfig } from './types.js';
import { VaultError, ValidationError } from './types.js';

/** Everything a handler needs: flags, work root and merged config. */
interface CommandContext {
  opts: GlobalOptions;
  cwd: string;
  root: string;
  config: ResolvedVaultConfig;
}

export function getGlobalOpts(cmd: Command): GlobalOptions {
  const root = cmd.parent ?? cmd;
  const opts = root.opts();
  return {
    json: Boolean(opts['json']),
    quiet: Boolean(opts['quiet']),
    verbose: Boolean(opts['verbose']),
    store: typeof opts['store'] === 'string' ? opts['store'] : undefined,
  };
}

function getCwd(cmd: Command): string {
  const root = cmd.parent ?? cmd;
  const cwd = root.opts()['cwd'];
  return typeof cwd === 'string' ? resolve(cwd) : process.cwd();
}

async function loadContext(cmd: Command): Promise<CommandContext> {
  const opts = getGlobalOpts(cmd);
  const cwd = getCwd(cmd);
  const root = findWorkRoot(cwd);
  const config = await resolveConfig(cwd, root);
  return { opts, cwd, root, config };
}

async function openStore(ctx: CommandContext): Promise<ObjectStore> {
  const storePath = ctx.opts.store
    ? resolveFilePath(ctx.opts.store, ctx.cwd)
    : resolveStorePath(ctx.config, ctx.root);
  return getSharedObjectStore({ root: storePath, cacheSize: ctx.config.store.cache_size });
}

/** Print human output unless --quiet or --json. */
function say(ctx: CommandContext, message: string): void {
  if (!ctx.opts.quiet && !ctx.opts.json) {
    console.log(message);
  }
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parseRatio(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return n;
}

// --- hash ---

async function handleHash(paths: string[], _opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const results: Array<{ path: string; hash: string; binary: boolean; size: number }> = [];

  for (const inputPath of paths) {
    const absPath = resolveFilePath(inputPath, ctx.cwd);
    const content = await openFileContent(absPath);
    const hash = await content.getHash();
    const relPath = toRootRelative(absPath, ctx.cwd);
    results.push({ path: relPath, hash, binary: content.isBinary, size: content.size });
    say(ctx, `${hash}  ${relPath}`);
  }

  if (ctx.opts.json) {
    console.log(formatJson({ files: results }));
  }
}

// --- store ---

async function handleStore(paths: string[], _opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);

  const files: string[] = [];
  for (const inputPath of paths) {
    const absPath = resolveFilePath(inputPath, ctx.cwd);
    if (await isDirectory(absPath)) {
      files.push(...(await findStorableFiles(absPath, ctx.config.ignore)));
    } else {
      files.push(absPath);
    }
  }

  const stored: Array<{ path: string; hash: string; new: boolean }> = [];
  for (const file of files) {
    const content = await openFileContent(file);
    const existed = await store.hasObject(await content.getHash());
    const hash = await store.storeObject(content);
    const relPath = toRootRelative(file, ctx.cwd);
    stored.push({ path: relPath, hash, new: !existed });
    say(ctx, `${shortHash(hash)}  ${relPath}${existed ? formatHint('(already stored)') : ''}`);
  }

  const newCount = stored.filter((s) => s.new).length;
  if (ctx.opts.json) {
    console.log(formatJson({ stored, summary: { total: stored.length, new: newCount } }));
  } else {
    say(ctx, `Stored ${formatCount(stored.length, 'file')} (${newCount} new)`);
  }
}

// --- cat ---

async function handleCat(hash: string, _opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);
  const content = await store.retrieveObject(hash);
  if (!content) {
    throw new VaultError(`Object not found: ${hash}`, 'not_found', 1, [
      'Run: vv store <file> to add it.',
    ]);
  }

  const data = await content.getContent();
  if (ctx.opts.json) {
    console.log(
      formatJson({
        hash,
        path: content.path,
        binary: content.isBinary,
        size: data.length,
        content: data.toString(content.isBinary ? 'base64' : 'utf-8'),
      }),
    );
    return;
  }
  process.stdout.write(data);
}

// --- has ---

async function handleHas(hashes: string[], _opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);

  const results: Array<{ hash: string; present: boolean }> = [];
  for (const hash of hashes) {
    const present = await store.hasObject(hash);
    results.push({ hash, present });
    say(ctx, present ? formatCheckPass(hash) : formatCheckFail(hash));
  }

  if (ctx.opts.json) {
    console.log(formatJson({ objects: results }));
  }
  if (results.some((r) => !r.present)) {
    process.exitCode = 1;
  }
}

// --- size ---

async function handleSize(_opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);
  const bytes = await store.getStorageSize();
  const objects = (await store.listObjects()).length;

  if (ctx.opts.json) {
    console.log(formatJson({ root: store.root, bytes, objects }));
  } else {
    say(ctx, `${formatSize(bytes)} in ${formatCount(objects, 'object')}`);
  }
}

// --- cleanup ---

async function handleCleanup(opts: { days?: number }, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);
  const days = opts.days ?? ctx.config.cleanup.max_age_days;
  const result = await store.cleanup(days);

  if (ctx.opts.json) {
    console.log(formatJson({ max_age_days: days, ...result }));
    return;
  }
  if (ctx.opts.verbose) {
    for (const hash of result.removed) {
      say(ctx, `  removed ${hash}`);
    }
  }
  say(
    ctx,
    `Removed ${formatCount(result.removed.length, 'object')} older than ${formatCount(days, 'day')} (${formatSize(result.freedBytes)})`,
  );
}

// --- verify ---

async function handleVerify(hashes: string[], _opts: unknown, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);
  const store = await openStore(ctx);
  const targets = hashes.length > 0 ? hashes : await store.listObjects();

  const results: Array<{ hash: string; status: 'ok' | 'corrupt' | 'missing' }> = [];
  for (const hash of targets) {
    const ok = await store.verifyObject(hash);
    const status = ok === undefined ? 'missing' : ok ? 'ok' : 'corrupt';
    results.push({ hash, status });
    say(ctx, status === 'ok' ? formatCheckPass(hash) : formatCheckFail(`${hash}  ${status}`));
  }

  const failed = results.filter((r) => r.status !== 'ok').length;
  if (ctx.opts.json) {
    console.log(formatJson({ objects: results, summary: { total: results.length, failed } }));
  } else {
    say(ctx, `Verified ${formatCount(results.length, 'object')}, ${failed} failed`);
  }
  if (failed > 0) {
    process.exitCode = 1;
  }
}

// --- diff ---

interface DiffOptions {
  algorithm?: DiffAlgorithmName;
  context?: number;
}

/** Open a path for comparison; a missing file is an absent side. */
async function openOptional(absPath: string): Promise<FileContent | undefined> {
  return existsSync(absPath) ? openFileContent(absPath) : undefined;
}

async function handleDiff(
  oldPath: string,
  newPath: string,
  opts: DiffOptions,
  cmd: Command,
): Promise<void> {
  const ctx = await loadContext(cmd);
  const engine = new DiffEngine({
    algorithm: opts.algorithm ?? ctx.config.diff.algorithm,
    contextLines: opts.context ?? ctx.config.diff.context_lines,
  });

  const oldFile = await openOptional(resolveFilePath(oldPath, ctx.cwd));
  const newFile = await openOptional(resolveFilePath(newPath, ctx.cwd));
  const compared = await engine.compareFiles(oldFile, newFile);
  const change = {
    ...compared,
    path: compared.path ? toRootRelative(compared.path, ctx.cwd) : '',
  };

  let lines: string[] = [];
  const bothText = oldFile instanceof TextContent && newFile instanceof TextContent;
  if (change.type === 'modified' && bothText) {
    lines = await engine.generateUnifiedDiff(oldFile, newFile, {
      old: toRootRelative(oldFile.path, ctx.cwd),
      new: toRootRelative(newFile.path, ctx.cwd),
    });
  }

  if (ctx.opts.json) {
    console.log(formatJson({ change, algorithm: engine.algorithmName, diff: lines }));
    return;
  }

  say(ctx, formatChange(change));
  if (change.type === 'modified' && !bothText) {
    say(ctx, 'Binary files differ');
  }
  for (const line of lines) {
    say(ctx, formatDiffLine(line));
  }
}

// --- similar ---

async function handleSimilar(
  pathA: string,
  pathB: string,
  opts: { threshold?: number },
  cmd: Command,
): Promise<void> {
  const ctx = await loadContext(cmd);
  const engine = new DiffEngine({ algorithm: ctx.config.diff.algorithm });
  const threshold = opts.threshold ?? ctx.config.diff.similarity_threshold;

  const fileA = await openFileContent(resolveFilePath(pathA, ctx.cwd));
  const fileB = await openFileContent(resolveFilePath(pathB, ctx.cwd));
  if (!(fileA instanceof TextContent) || !(fileB instanceof TextContent)) {
    throw new ValidationError('Similarity is only defined for text files.');
  }

  const similarity = engine.calculateSimilarity(
    (await fileA.getLines()).join('\n'),
    (await fileB.getLines()).join('\n'),
  );
  const similar = similarity >= threshold;

  if (ctx.opts.json) {
    console.log(formatJson({ similarity, threshold, similar }));
    return;
  }
  say(
    ctx,
    `Similarity: ${formatPercent(similarity)} (${similar ? 'similar' : 'not similar'} at threshold ${formatPercent(threshold)})`,
  );
}

// --- config ---

async function handleConfig(opts: { showOrigin?: boolean }, cmd: Command): Promise<void> {
  const ctx = await loadContext(cmd);

  if (opts.showOrigin) {
    const origins = await resolveConfigWithOrigins(ctx.cwd, ctx.root);
    const keys = [...origins.keys()].sort();
    if (ctx.opts.json) {
      console.log(formatJson({ values: Object.fromEntries(keys.map((k) => [k, origins.get(k)])) }));
      return;
    }
    for (const key of keys) {
      const entry = origins.get(key);
      if (entry) {
        say(ctx, `${key} = ${JSON.stringify(entry.value)}  ${formatHint(entry.file ?? entry.origin)}`);
      }
    }
    return;
  }

  if (ctx.opts.json) {
    console.log(formatJson({ config: ctx.config }));
  } else {
    say(ctx, stringifyYaml(ctx.config, { lineWidth: 0 }).trimEnd());
  }
}

// --- Program ---

function wrapAction<A extends unknown[]>(
  handler: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const list: unknown[] = args;
    const cmd = list.find((a): a is Command => a instanceof Command);
    const globalOpts = cmd ? getGlobalOpts(cmd) : { json: false, quiet: false, verbose: false };
    try {
      if (globalOpts.quiet && globalOpts.verbose) {
        throw new ValidationError('--quiet and --verbose cannot be used together.');
      }
      await handler(...args);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(globalOpts.json ? formatJsonError(error) : formatError(error));
      process.exitCode = err instanceof VaultError ? err.exitCode : 1;
    }
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vv')
    .description('Content-addressed file storage and diffing.')
    .version('0.1.0', '--version', 'Show version number')
    .option('--json', 'Structured JSON output')
    .option('--quiet', 'Suppress all output except errors')
    .option('--verbose', 'Detailed progress output and debug logs')
    .option('--store <dir>', 'Object store directory (overrides config)')
    .option('-C, --cwd <dir>', 'Run as if started in <dir>')
    .addOption(
      new Option('--color <mode>', 'Color output')
        .choices(['always', 'never', 'auto'])
        .default('auto'),
    )
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      const color = opts['color'];
      initColors(color === 'always' || color === 'never' ? color : 'auto');
      if (opts['verbose']) {
        setLogLevel('debug');
      }
    });

  program
    .command('hash')
    .description('Print the content hash of files')
    .argument('<file...>', 'Files to hash')
    .action(wrapAction(handleHash));

  program
    .command('store')
    .description('Store files or directories in the object store')
    .argument('<path...>', 'Files or directories to store')
    .action(wrapAction(handleStore));

  program
    .command('cat')
    .description('Write a stored object to stdout')
    .argument('<hash>', 'Object hash')
    .action(wrapAction(handleCat));

  program
    .command('has')
    .description('Check whether objects exist (exit 1 if any is missing)')
    .argument('<hash...>', 'Object hashes')
    .action(wrapAction(handleHas));

  program
    .command('size')
    .description('Show total object store size')
    .action(wrapAction(handleSize));

  program
    .command('cleanup')
    .description('Delete objects older than a number of days')
    .option('--days <n>', 'Maximum age in whole days (default from config)', parseNonNegativeInt)
    .action(wrapAction(handleCleanup));

  program
    .command('verify')
    .description('Re-hash stored objects and report corruption')
    .argument('[hash...]', 'Object hashes (default: all)')
    .action(wrapAction(handleVerify));

  program
    .command('diff')
    .description('Compare two files and show a unified diff')
    .argument('<old>', 'Old file (may be missing)')
    .argument('<new>', 'New file (may be missing)')
    .addOption(
      new Option('--algorithm <name>', 'Line diff algorithm').choices(['greedy', 'myers']),
    )
    .option('--context <n>', 'Context lines around changes', parseNonNegativeInt)
    .action(wrapAction(handleDiff));

  program
    .command('similar')
    .description('Score how similar two text files are')
    .argument('<a>', 'First file')
    .argument('<b>', 'Second file')
    .option('--threshold <ratio>', 'Similarity threshold in [0, 1]', parseRatio)
    .action(wrapAction(handleSimilar));

  program
    .command('config')
    .description('Show the effective configuration')
    .option('--show-origin', 'Show which file each value comes from')
    .action(wrapAction(handleConfig));

  return program;
}
