/**
 * Help listing
 */

import chalk from 'chalk';
import { COMMAND_KINDS } from '../types.js';
import { COMMANDS } from '../commands/registry.js';

/** Width of the command-name column */
const NAME_COLUMN = 11;

export interface HelpOptions {
  colors?: boolean;
}

/**
 * One line per command in registry order, under a fixed heading
 */
export function renderHelp(options: HelpOptions = {}): string {
  const name = options.colors ? chalk.cyan : (s: string) => s;

  const lines = COMMAND_KINDS.map((kind) => {
    // Pad before coloring so escape codes don't count toward the column
    const padded = kind.padEnd(NAME_COLUMN, ' ');
    return `${name(padded)}${COMMANDS[kind].description}`;
  });

  return ['These are minivcs commands:', ...lines].join('\n');
}
