/**
 * Add command - Track a file, or list the tracked files
 *
 * @module commands/add
 */

import { currentTrackedFiles, trackFile, type StoreContext } from '@minivcs/core';
import type { CommandOutcome } from '../types.js';
import { failed, succeeded } from './outcome.js';

export function addCommand(ctx: StoreContext, args: readonly string[]): CommandOutcome {
  const [input] = args;

  if (input === undefined) {
    const names = currentTrackedFiles(ctx).map((file) => file.name);
    if (names.length === 0) {
      return succeeded('add', 'Listed', 'Add a file to the index.', { files: [] });
    }
    return succeeded('add', 'Listed', ['Tracked files:', ...names].join('\n'), { files: names });
  }

  const result = trackFile(ctx, input);
  if (result.status === 'not-found') {
    return failed('add', 'NotFound', 'NOT_FOUND', `Can't find '${input}'.`, { input });
  }

  return succeeded('add', 'Tracked', `The file '${input}' is tracked.`, {
    name: result.name,
    alreadyTracked: result.alreadyTracked,
  });
}
