/**
 * Log Store
 *
 * Human-readable ledger of commits, newest first. Each entry is a 4-line
 * block: `commit <id>`, `Author: <name>`, the message, and a blank line.
 */

import * as fs from 'node:fs';

import type { CommitId, LogEntry, StoreContext } from './types.js';
import { readTextOrEmpty } from '../utils/fs.js';

const COMMIT_PREFIX = 'commit ';
const AUTHOR_PREFIX = 'Author: ';

export function readLog(ctx: StoreContext): string {
  return readTextOrEmpty(ctx.logFile);
}

function foldLines(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ');
}

/**
 * Render one entry. Line breaks in the author and message are folded so the
 * block always has exactly one line for each.
 */
export function formatLogEntry(entry: LogEntry): string {
  return `${COMMIT_PREFIX}${entry.commitId}\n${AUTHOR_PREFIX}${foldLines(entry.author)}\n${foldLines(entry.message)}`;
}

/**
 * Put `entry` in front of the existing ledger
 */
export function prependLogEntry(ctx: StoreContext, entry: LogEntry): void {
  const previous = readLog(ctx);
  const next = `${formatLogEntry(entry)}\n\n${previous}`.trimEnd();
  fs.writeFileSync(ctx.logFile, next, 'utf-8');
  ctx.logger.debug('Prepended log entry', { commitId: entry.commitId });
}

/**
 * Whether the most recent entry records `commitId`. Older entries are not consulted.
 */
export function isLatestCommit(ctx: StoreContext, commitId: CommitId): boolean {
  const firstLine = readLog(ctx).split('\n', 1)[0] ?? '';
  return firstLine.replace(/\r$/, '') === `${COMMIT_PREFIX}${commitId}`;
}

/**
 * Structured view of a ledger, newest first. Blocks that do not start with a
 * `commit` line are ignored.
 */
export function parseLog(text: string): LogEntry[] {
  const entries: LogEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.startsWith(COMMIT_PREFIX)) {
      continue;
    }

    const authorLine = lines[i + 1] ?? '';
    entries.push({
      commitId: line.slice(COMMIT_PREFIX.length),
      author: authorLine.startsWith(AUTHOR_PREFIX) ? authorLine.slice(AUTHOR_PREFIX.length) : '',
      message: lines[i + 2] ?? '',
    });
    i += 2;
  }

  return entries;
}
