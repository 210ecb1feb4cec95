import { describe, it, expect, beforeEach, vi } from 'vitest';
import { vol } from 'memfs';
import { openStore, type StoreContext } from '@minivcs/core';
import { runCommand } from '../../src/commands/registry.js';

vi.mock('node:fs', async () => {
  const memfs = await import('memfs');
  return { default: memfs.fs, ...memfs.fs };
});

const HELLO_ID = '59cf4ed07faff74096d2be40c3acbdea62c357484b265c8a6d922e2b0ca48602';
const WORLD_ID = 'aad26cf077c5963fce4a58b50e86b8834fe9e7a6b882122c87f735608e49c7c6';

describe('log command', () => {
  let ctx: StoreContext;

  beforeEach(() => {
    vol.reset();
    vol.fromJSON({ '/work/a.txt': 'hello' });
    ctx = openStore('/work');
  });

  it('reports an empty history', () => {
    expect(runCommand('log', [], ctx)).toMatchObject({
      ok: true,
      kind: 'Listed',
      message: 'No commits yet.',
      data: { entries: [] },
    });
  });

  it('prints the ledger newest first', () => {
    runCommand('config', ['alice'], ctx);
    runCommand('add', ['a.txt'], ctx);
    runCommand('commit', ['first'], ctx);
    vol.writeFileSync('/work/a.txt', 'world');
    runCommand('commit', ['second'], ctx);

    const outcome = runCommand('log', [], ctx);

    expect(outcome.message).toBe(
      `commit ${WORLD_ID}\nAuthor: alice\nsecond\n\ncommit ${HELLO_ID}\nAuthor: alice\nfirst`
    );
    expect(outcome.data).toEqual({
      entries: [
        { commitId: WORLD_ID, author: 'alice', message: 'second' },
        { commitId: HELLO_ID, author: 'alice', message: 'first' },
      ],
    });
  });
});
