/**
 * Checkout command - Restore a commit's files into the working directory
 *
 * @module commands/checkout
 */

import { checkout, type StoreContext } from '@minivcs/core';
import type { CommandOutcome } from '../types.js';
import { failed, succeeded } from './outcome.js';

export function checkoutCommand(ctx: StoreContext, args: readonly string[]): CommandOutcome {
  const [commitId] = args;

  if (commitId === undefined) {
    return failed('checkout', 'MessageMissing', 'MESSAGE_MISSING', 'Commit id was not passed.');
  }

  const result = checkout(ctx, commitId);
  if (result.status === 'not-found') {
    return failed('checkout', 'NotFound', 'NOT_FOUND', 'Commit does not exist.', { commitId });
  }

  return succeeded('checkout', 'Restored', `Switched to commit ${commitId}.`, {
    commitId,
    files: result.files,
  });
}
