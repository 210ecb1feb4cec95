/**
 * Commit command - Snapshot the tracked files
 *
 * @module commands/commit
 */

import { commit, type StoreContext } from '@minivcs/core';
import type { CommandOutcome } from '../types.js';
import { failed, succeeded } from './outcome.js';

export function commitCommand(ctx: StoreContext, args: readonly string[]): CommandOutcome {
  const [message] = args;

  if (message === undefined) {
    return failed('commit', 'MessageMissing', 'MESSAGE_MISSING', 'Message was not passed.');
  }

  const result = commit(ctx, message);

  switch (result.status) {
    case 'created':
      return succeeded('commit', 'Created', 'Changes are committed.', {
        commitId: result.commitId,
        files: result.files,
        reusedSnapshot: result.reusedSnapshot,
      });
    case 'nothing-to-commit':
      return failed('commit', 'NothingToCommit', 'NOTHING_TO_COMMIT', 'Nothing to commit.', {
        reason: result.reason,
      });
  }
}
