import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  DiffEngine,
  ObjectStore,
  TextContent,
  openFileContent,
} from '../src/index.js';
import { findStorableFiles } from '../src/paths.js';

describe('snapshot and compare workflow', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vv-workflow-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stores a tree, detects an edit and diffs against the stored copy', async () => {
    const work = join(dir, 'work');
    await mkdir(join(work, 'docs'), { recursive: true });
    await writeFile(join(work, 'README.md'), '# Title\nintro\n');
    await writeFile(join(work, 'docs', 'guide.md'), 'step one\nstep two\n');
    await writeFile(join(work, 'docs', 'copy.md'), 'step one\r\nstep two\r\n');

    const store = await ObjectStore.open({ root: join(dir, 'objects') });
    const snapshot = new Map<string, string>();
    for (const file of await findStorableFiles(work)) {
      snapshot.set(file, await store.storeObject(await openFileContent(file)));
    }

    // guide.md and copy.md differ only in line endings
    expect(new Set(snapshot.values()).size).toBe(2);
    expect(await store.listObjects()).toHaveLength(2);

    const guidePath = join(work, 'docs', 'guide.md');
    await writeFile(guidePath, 'step one\nstep 2\n');

    const engine = new DiffEngine({ algorithm: 'myers', contextLines: 1 });
    const storedHash = snapshot.get(guidePath) ?? '';
    const before = await store.retrieveObject(storedHash);
    const after = await openFileContent(guidePath);

    const change = await engine.compareFiles(before, after);
    expect(change.type).toBe('modified');
    expect(change.oldHash).toBe(storedHash);

    expect(before).toBeInstanceOf(TextContent);
    expect(after).toBeInstanceOf(TextContent);
    if (before instanceof TextContent && after instanceof TextContent) {
      expect(
        await engine.generateUnifiedDiff(before, after, { old: 'a/guide.md', new: 'b/guide.md' }),
      ).toEqual(['--- a/guide.md', '+++ b/guide.md', '@@ -1,2 +1,2 @@', ' step one', '-step two', '+step 2']);
    }

    const unchanged = await engine.compareFiles(
      await openFileContent(join(work, 'README.md')),
      await store.retrieveObject(snapshot.get(join(work, 'README.md')) ?? ''),
    );
    expect(unchanged.type).toBe('unchanged');
  });
});
