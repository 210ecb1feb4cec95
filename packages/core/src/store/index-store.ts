/**
 * Index Store
 *
 * Persists the tracked file names, one per line, in order of first addition.
 * Names whose file has disappeared are skipped on read and dropped the next
 * time the index is rewritten.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { StoreContext, TrackedFile, TrackResult } from './types.js';
import { fromStoredName, isFile, readTextOrEmpty, toStoredName } from '../utils/fs.js';

/**
 * Names exactly as persisted, blank lines ignored
 */
export function readIndexNames(ctx: StoreContext): string[] {
  return readTextOrEmpty(ctx.indexFile)
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.length > 0);
}

/**
 * Tracked files that currently exist as regular files, in index order
 */
export function currentTrackedFiles(ctx: StoreContext): TrackedFile[] {
  const files: TrackedFile[] = [];

  for (const name of readIndexNames(ctx)) {
    const filePath = fromStoredName(ctx.workDir, name);
    if (isFile(filePath)) {
      files.push({ name, path: filePath });
    } else {
      ctx.logger.debug('Skipping missing tracked file', { name });
    }
  }

  return files;
}

/**
 * Add a file to the index. Rewrites the whole index on success.
 */
export function trackFile(ctx: StoreContext, input: string): TrackResult {
  const name = resolveTrackableName(ctx, input);
  if (name === null) {
    return { status: 'not-found', input };
  }

  const names = currentTrackedFiles(ctx).map((file) => file.name);
  const alreadyTracked = names.includes(name);
  if (!alreadyTracked) {
    names.push(name);
  }

  writeIndexNames(ctx, names);
  ctx.logger.debug(alreadyTracked ? 'File already tracked' : 'Tracking file', { name });

  return { status: 'tracked', name, alreadyTracked };
}

export function writeIndexNames(ctx: StoreContext, names: readonly string[]): void {
  fs.writeFileSync(ctx.indexFile, names.join('\n'), 'utf-8');
}

/**
 * Stored name for `input`, or null when it is not a regular file inside the
 * working directory (the store directory itself is never trackable)
 */
function resolveTrackableName(ctx: StoreContext, input: string): string | null {
  if (input.length === 0) {
    return null;
  }

  const absolute = path.resolve(ctx.workDir, input);
  if (!isWithin(ctx.workDir, absolute) || isWithin(ctx.storeDir, absolute)) {
    return null;
  }
  if (!isFile(absolute)) {
    return null;
  }

  return toStoredName(path.relative(ctx.workDir, absolute));
}

function isWithin(parent: string, candidate: string): boolean {
  const relative = path.relative(parent, candidate);
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}
