/**
 * Tests for the commit store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { vol } from 'memfs';
import { openStore } from '../context.js';
import { commit, commitExists, commitPath } from '../commit-store.js';
import { trackFile } from '../index-store.js';
import { writeAuthor } from '../config-store.js';
import { writeFileWithParents } from '../../utils/fs.js';
import type { StoreContext } from '../types.js';

vi.mock('node:fs', async () => {
  const memfs = await import('memfs');
  return { default: memfs.fs, ...memfs.fs };
});

vi.mock('../../utils/fs.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/fs.js')>();
  return { ...actual, writeFileWithParents: vi.fn(actual.writeFileWithParents) };
});

const HELLO_ID = '59cf4ed07faff74096d2be40c3acbdea62c357484b265c8a6d922e2b0ca48602';
const WORLD_ID = 'aad26cf077c5963fce4a58b50e86b8834fe9e7a6b882122c87f735608e49c7c6';
const LOG = '/work/vcs/log.txt';

function commitDirs(): string[] {
  return vol.readdirSync('/work/vcs/commits').map(String).sort();
}

describe('commit', () => {
  let ctx: StoreContext;

  beforeEach(() => {
    vol.reset();
    vol.fromJSON({ '/work/a.txt': 'hello' });
    ctx = openStore('/work');
    writeAuthor(ctx, 'alice');
  });

  it('reports nothing to commit for an empty index', () => {
    expect(commit(ctx, 'init')).toEqual({ status: 'nothing-to-commit', reason: 'empty-index' });
    expect(commitDirs()).toEqual([]);
    expect(vol.readFileSync(LOG, 'utf8')).toBe('');
  });

  it('treats an index of missing files as empty', () => {
    vol.writeFileSync('/work/vcs/index.txt', 'gone.txt');

    expect(commit(ctx, 'init')).toEqual({ status: 'nothing-to-commit', reason: 'empty-index' });
    expect(commitDirs()).toEqual([]);
  });

  it('stores a snapshot and a log entry', () => {
    trackFile(ctx, 'a.txt');

    const result = commit(ctx, 'first');

    expect(result).toEqual({ status: 'created', commitId: HELLO_ID, files: ['a.txt'], reusedSnapshot: false });
    expect(vol.readFileSync(`/work/vcs/commits/${HELLO_ID}/a.txt`, 'utf8')).toBe('hello');
    expect(vol.readFileSync(LOG, 'utf8')).toBe(`commit ${HELLO_ID}\nAuthor: alice\nfirst`);
    expect(commitExists(ctx, HELLO_ID)).toBe(true);
    expect(commitPath(ctx, HELLO_ID)).toBe(`/work/vcs/commits/${HELLO_ID}`);
  });

  it('is a no-op when the latest commit already matches', () => {
    trackFile(ctx, 'a.txt');
    commit(ctx, 'first');

    const result = commit(ctx, 'again');

    expect(result).toEqual({ status: 'nothing-to-commit', reason: 'unchanged', commitId: HELLO_ID });
    expect(commitDirs()).toEqual([HELLO_ID]);
    expect(vol.readFileSync(LOG, 'utf8')).toBe(`commit ${HELLO_ID}\nAuthor: alice\nfirst`);
  });

  it('creates a distinct commit after a change, newest first in the log', () => {
    trackFile(ctx, 'a.txt');
    commit(ctx, 'first');
    vol.writeFileSync('/work/a.txt', 'world');

    const result = commit(ctx, 'second');

    expect(result).toEqual({ status: 'created', commitId: WORLD_ID, files: ['a.txt'], reusedSnapshot: false });
    expect(commitDirs()).toEqual([HELLO_ID, WORLD_ID].sort());
    expect(vol.readFileSync(LOG, 'utf8')).toBe(
      `commit ${WORLD_ID}\nAuthor: alice\nsecond\n\ncommit ${HELLO_ID}\nAuthor: alice\nfirst`
    );
  });

  it('reuses an older snapshot but still logs the commit', () => {
    trackFile(ctx, 'a.txt');
    commit(ctx, 'first');
    vol.writeFileSync('/work/a.txt', 'world');
    commit(ctx, 'second');
    vol.writeFileSync('/work/a.txt', 'hello');

    const result = commit(ctx, 'back again');

    expect(result).toEqual({ status: 'created', commitId: HELLO_ID, files: ['a.txt'], reusedSnapshot: true });
    expect(commitDirs()).toHaveLength(2);
    expect(String(vol.readFileSync(LOG, 'utf8')).split('\n')).toEqual([
      `commit ${HELLO_ID}`,
      'Author: alice',
      'back again',
      '',
      `commit ${WORLD_ID}`,
      'Author: alice',
      'second',
      '',
      `commit ${HELLO_ID}`,
      'Author: alice',
      'first',
    ]);
  });

  it('stamps an empty author when none is configured', () => {
    writeAuthor(ctx, '');
    trackFile(ctx, 'a.txt');

    commit(ctx, 'first');

    expect(vol.readFileSync(LOG, 'utf8')).toBe(`commit ${HELLO_ID}\nAuthor: \nfirst`);
  });

  it('keeps nested files under their relative names', () => {
    vol.fromJSON({ '/work/src/main.ts': 'export {};' });
    trackFile(ctx, 'a.txt');
    trackFile(ctx, 'src/main.ts');

    const result = commit(ctx, 'nested');

    expect(result.status).toBe('created');
    if (result.status !== 'created') return;
    expect(result.files).toEqual(['a.txt', 'src/main.ts']);
    expect(vol.readFileSync(`/work/vcs/commits/${result.commitId}/src/main.ts`, 'utf8')).toBe('export {};');
  });

  it('removes a partially written snapshot and can retry', async () => {
    const actual = await vi.importActual<typeof import('../../utils/fs.js')>('../../utils/fs.js');
    vol.writeFileSync('/work/b.txt', 'second file');
    trackFile(ctx, 'a.txt');
    trackFile(ctx, 'b.txt');
    vi.mocked(writeFileWithParents)
      .mockImplementationOnce(actual.writeFileWithParents)
      .mockImplementationOnce(() => {
        throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
      });

    expect(() => commit(ctx, 'first')).toThrow('ENOSPC: no space left on device');
    expect(commitDirs()).toEqual([]);
    expect(vol.readFileSync(LOG, 'utf8')).toBe('');

    expect(commit(ctx, 'first')).toMatchObject({ status: 'created', reusedSnapshot: false });
    const [commitId] = commitDirs();
    const dir = commitPath(ctx, commitId);
    expect(vol.readFileSync(`${dir}/a.txt`, 'utf8')).toBe('hello');
    expect(vol.readFileSync(`${dir}/b.txt`, 'utf8')).toBe('second file');
  });
});
