/**
 * Command registry
 *
 * One entry per command; help, dispatch and arity checks all read this table.
 */

import type { StoreContext } from '@minivcs/core';
import type { CommandKind, CommandOutcome } from '../types.js';
import { addCommand } from './add.js';
import { checkoutCommand } from './checkout.js';
import { commitCommand } from './commit.js';
import { configCommand } from './config.js';
import { logCommand } from './log.js';
import { failed } from './outcome.js';

export type CommandHandler = (ctx: StoreContext, args: readonly string[]) => CommandOutcome;

export interface CommandSpec {
  description: string;
  usage: string;
  /** Positional arguments beyond this count are rejected before the handler runs */
  maxArgs: number;
  handler: CommandHandler;
}

export const COMMANDS: Record<CommandKind, CommandSpec> = {
  config: {
    description: 'Get and set a username.',
    usage: 'minivcs config [name]',
    maxArgs: 1,
    handler: configCommand,
  },
  add: {
    description: 'Add a file to the index.',
    usage: 'minivcs add [file]',
    maxArgs: 1,
    handler: addCommand,
  },
  log: {
    description: 'Show commit logs.',
    usage: 'minivcs log',
    maxArgs: 0,
    handler: logCommand,
  },
  commit: {
    description: 'Save changes.',
    usage: 'minivcs commit <message>',
    maxArgs: 1,
    handler: commitCommand,
  },
  checkout: {
    description: 'Restore a file.',
    usage: 'minivcs checkout <commit-id>',
    maxArgs: 1,
    handler: checkoutCommand,
  },
};

export function runCommand(kind: CommandKind, args: readonly string[], ctx: StoreContext): CommandOutcome {
  const spec = COMMANDS[kind];

  if (args.length > spec.maxArgs) {
    return failed(kind, 'InvalidArguments', 'INVALID_ARGUMENTS', `Too many arguments for '${kind}'.`, {
      usage: spec.usage,
      received: args.length,
    });
  }

  ctx.logger.debug('Running command', { command: kind, args: args.length });
  return spec.handler(ctx, args);
}

export function unknownCommand(name: string): CommandOutcome {
  return failed(name, 'UnknownCommand', 'UNKNOWN_COMMAND', `'${name}' is not a minivcs command.`);
}
