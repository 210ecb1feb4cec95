/**
 * Outcome rendering
 *
 * Every run prints exactly one result: the outcome message, or the outcome
 * object in JSON mode.
 */

import { getErrorDefaults } from '../lib/errors.js';
import { getSymbols } from '../lib/environment.js';
import type { Logger } from '../lib/logger.js';
import type { CommandOutcome } from '../types.js';

export interface RenderOptions {
  json: boolean;
}

export function renderOutcome(outcome: CommandOutcome, logger: Logger, options: RenderOptions): void {
  if (options.json) {
    logger.json(outcome);
    return;
  }

  if (outcome.ok) {
    logger.log(outcome.message);
    return;
  }

  logger.error(outcome.message);

  if (outcome.code && logger.isLevelEnabled('verbose')) {
    const { arrow } = getSymbols();
    for (const suggestion of getErrorDefaults(outcome.code).suggestions) {
      logger.dim(`  ${arrow} ${suggestion}`);
    }
  }
}
