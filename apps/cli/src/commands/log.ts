/**
 * Log command - Print the commit ledger, newest first
 *
 * @module commands/log
 */

import { parseLog, readLog, type StoreContext } from '@minivcs/core';
import type { CommandOutcome } from '../types.js';
import { succeeded } from './outcome.js';

export function logCommand(ctx: StoreContext): CommandOutcome {
  const text = readLog(ctx);

  if (text.length === 0) {
    return succeeded('log', 'Listed', 'No commits yet.', { entries: [] });
  }

  return succeeded('log', 'Listed', text, { entries: parseLog(text) });
}
