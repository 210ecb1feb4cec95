/**
 * Config command - Get or set the author recorded in new commits
 *
 * @module commands/config
 *
 * @example
 * ```bash
 * minivcs config            # The username is Alice.
 * minivcs config "Alice"    # The username is Alice.
 * ```
 */

import { readAuthor, writeAuthor, type StoreContext } from '@minivcs/core';
import type { CommandOutcome } from '../types.js';
import { succeeded } from './outcome.js';

export function configCommand(ctx: StoreContext, args: readonly string[]): CommandOutcome {
  const [name] = args;

  if (name !== undefined) {
    writeAuthor(ctx, name);
  }

  const author = readAuthor(ctx);
  if (author === '') {
    return succeeded('config', 'Configured', 'Please, tell me who you are.', { author: null });
  }

  return succeeded('config', 'Configured', `The username is ${author}.`, { author });
}
