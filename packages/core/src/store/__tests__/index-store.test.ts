/**
 * Tests for the index store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { vol } from 'memfs';
import { createStoreContext, openStore } from '../context.js';
import { currentTrackedFiles, readIndexNames, trackFile } from '../index-store.js';
import { Logger, type LogEntry } from '../../utils/logger.js';

vi.mock('node:fs', async () => {
  const memfs = await import('memfs');
  return { default: memfs.fs, ...memfs.fs };
});

const INDEX = '/work/vcs/index.txt';

describe('index store', () => {
  beforeEach(() => {
    vol.reset();
  });

  describe('trackFile', () => {
    it('appends an existing file to the index', () => {
      vol.fromJSON({ '/work/a.txt': 'hello' });
      const ctx = openStore('/work');

      const result = trackFile(ctx, 'a.txt');

      expect(result).toEqual({ status: 'tracked', name: 'a.txt', alreadyTracked: false });
      expect(vol.readFileSync(INDEX, 'utf8')).toBe('a.txt');
    });

    it('does not duplicate an already tracked file', () => {
      vol.fromJSON({ '/work/a.txt': 'hello' });
      const ctx = openStore('/work');

      trackFile(ctx, 'a.txt');
      const result = trackFile(ctx, 'a.txt');

      expect(result).toEqual({ status: 'tracked', name: 'a.txt', alreadyTracked: true });
      expect(vol.readFileSync(INDEX, 'utf8')).toBe('a.txt');
    });

    it('keeps the order of first addition', () => {
      vol.fromJSON({ '/work/b.txt': 'b', '/work/a.txt': 'a' });
      const ctx = openStore('/work');

      trackFile(ctx, 'b.txt');
      trackFile(ctx, 'a.txt');
      trackFile(ctx, 'b.txt');

      expect(vol.readFileSync(INDEX, 'utf8')).toBe('b.txt\na.txt');
    });

    it('reports a missing file without touching the index', () => {
      vol.fromJSON({ '/work/a.txt': 'hello', '/work/vcs/index.txt': 'a.txt' });
      const ctx = openStore('/work');

      const result = trackFile(ctx, 'missing.txt');

      expect(result).toEqual({ status: 'not-found', input: 'missing.txt' });
      expect(vol.readFileSync(INDEX, 'utf8')).toBe('a.txt');
    });

    it('refuses directories', () => {
      vol.fromJSON({ '/work/src/main.ts': 'x' });
      const ctx = openStore('/work');

      expect(trackFile(ctx, 'src')).toEqual({ status: 'not-found', input: 'src' });
    });

    it('refuses files outside the working directory', () => {
      vol.fromJSON({ '/outside.txt': 'x', '/work/a.txt': 'a' });
      const ctx = openStore('/work');

      expect(trackFile(ctx, '../outside.txt')).toEqual({ status: 'not-found', input: '../outside.txt' });
      expect(trackFile(ctx, '/outside.txt')).toEqual({ status: 'not-found', input: '/outside.txt' });
    });

    it('refuses files inside the store directory', () => {
      vol.fromJSON({ '/work/a.txt': 'a' });
      const ctx = openStore('/work');

      expect(trackFile(ctx, 'vcs/log.txt')).toEqual({ status: 'not-found', input: 'vcs/log.txt' });
    });

    it('stores normalized relative names', () => {
      vol.fromJSON({ '/work/a.txt': 'a', '/work/src/main.ts': 'x' });
      const ctx = openStore('/work');

      expect(trackFile(ctx, './a.txt')).toEqual({ status: 'tracked', name: 'a.txt', alreadyTracked: false });
      expect(trackFile(ctx, '/work/src/main.ts')).toEqual({
        status: 'tracked',
        name: 'src/main.ts',
        alreadyTracked: false,
      });
      expect(vol.readFileSync(INDEX, 'utf8')).toBe('a.txt\nsrc/main.ts');
    });

    it('purges stale entries when the index is rewritten', () => {
      vol.fromJSON({
        '/work/a.txt': 'a',
        '/work/b.txt': 'b',
        '/work/c.txt': 'c',
        '/work/vcs/index.txt': 'a.txt\ngone.txt\nb.txt',
      });
      const ctx = openStore('/work');

      trackFile(ctx, 'c.txt');

      expect(vol.readFileSync(INDEX, 'utf8')).toBe('a.txt\nb.txt\nc.txt');
    });
  });

  describe('currentTrackedFiles', () => {
    it('skips missing entries without rewriting the index', () => {
      vol.fromJSON({
        '/work/a.txt': 'a',
        '/work/vcs/index.txt': 'gone.txt\na.txt\n',
      });
      const ctx = openStore('/work');

      expect(currentTrackedFiles(ctx)).toEqual([{ name: 'a.txt', path: '/work/a.txt' }]);
      expect(readIndexNames(ctx)).toEqual(['gone.txt', 'a.txt']);
      expect(vol.readFileSync(INDEX, 'utf8')).toBe('gone.txt\na.txt\n');
    });

    it('reports skipped entries to the component logger', () => {
      vol.fromJSON({ '/work/vcs/index.txt': 'gone.txt' });
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: 'debug', onLog: (entry) => entries.push(entry) });
      openStore('/work');
      const ctx = createStoreContext('/work', { logger });

      currentTrackedFiles(ctx);

      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe('Skipping missing tracked file');
      expect(entries[0].context).toEqual({ name: 'gone.txt' });
    });

    it('returns nothing for an empty index', () => {
      vol.fromJSON({ '/work/a.txt': 'a' });
      const ctx = openStore('/work');

      expect(currentTrackedFiles(ctx)).toEqual([]);
    });
  });
});
