/**
 * Commit Store
 *
 * Content-addressed snapshots: one directory per commit identifier under
 * `commits/`, holding a verbatim copy of every tracked file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { CommitId, CommitResult, FileSnapshot, StoreContext } from './types.js';
import { computeIdentifier } from './hasher.js';
import { currentTrackedFiles } from './index-store.js';
import { isLatestCommit, prependLogEntry } from './log-store.js';
import { readAuthor } from './config-store.js';
import { fromStoredName, isDirectory, writeFileWithParents } from '../utils/fs.js';

export function commitPath(ctx: StoreContext, commitId: CommitId): string {
  return path.join(ctx.commitsDir, commitId);
}

export function commitExists(ctx: StoreContext, commitId: CommitId): boolean {
  return isDirectory(commitPath(ctx, commitId));
}

/**
 * Snapshot the tracked files and record the commit in the log.
 *
 * Nothing is written when the index is empty or when the latest log entry
 * already carries the computed identifier. A set matching an older commit
 * reuses that snapshot directory but still gets a new log entry. If copying
 * fails, the new snapshot directory is removed before the error propagates.
 */
export function commit(ctx: StoreContext, message: string): CommitResult {
  const logger = ctx.logger.child('commit');
  const tracked = currentTrackedFiles(ctx);

  if (tracked.length === 0) {
    return { status: 'nothing-to-commit', reason: 'empty-index' };
  }

  const snapshots: FileSnapshot[] = tracked.map((file) => ({
    name: file.name,
    content: fs.readFileSync(file.path),
  }));
  const commitId = computeIdentifier(snapshots);

  if (isLatestCommit(ctx, commitId)) {
    logger.debug('Latest commit already matches', { commitId });
    return { status: 'nothing-to-commit', reason: 'unchanged', commitId };
  }

  const dir = commitPath(ctx, commitId);
  const reusedSnapshot = fs.existsSync(dir);

  if (reusedSnapshot) {
    logger.debug('Snapshot directory exists, skipping copy', { commitId });
  } else {
    fs.mkdirSync(dir, { recursive: true });
    try {
      for (const snapshot of snapshots) {
        writeFileWithParents(fromStoredName(dir, snapshot.name), snapshot.content);
      }
    } catch (error) {
      // An existing commit directory always counts as a complete snapshot
      fs.rmSync(dir, { recursive: true, force: true });
      logger.debug('Removed incomplete snapshot', { commitId });
      throw error;
    }
    logger.debug('Stored snapshot', { commitId, files: snapshots.length });
  }

  prependLogEntry(ctx, { commitId, author: readAuthor(ctx), message });

  return {
    status: 'created',
    commitId,
    files: snapshots.map((snapshot) => snapshot.name),
    reusedSnapshot,
  };
}
