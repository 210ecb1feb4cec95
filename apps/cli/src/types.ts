/**
 * CLI-specific types
 */

import type { ErrorCode } from './lib/errors.js';

/** Global options available to all commands; a type alias, as commander's `opts<T>()` needs an index-compatible type */
export type CliOptions = {
  /** Enable verbose output */
  verbose?: boolean;
  /** Print only results and errors */
  quiet?: boolean;
  /** Output as JSON */
  json?: boolean;
  /** Path to a settings file */
  config?: string;
  /** False when `--no-color` is passed */
  color?: boolean;
};

/** Commands in help order */
export const COMMAND_KINDS = ['config', 'add', 'log', 'commit', 'checkout'] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export function isCommandKind(name: string): name is CommandKind {
  return COMMAND_KINDS.some((kind) => kind === name);
}

/** What a command run amounted to */
export type OutcomeKind =
  | 'Configured'
  | 'Listed'
  | 'Tracked'
  | 'Created'
  | 'Restored'
  | 'NothingToCommit'
  | 'NotFound'
  | 'MessageMissing'
  | 'InvalidArguments'
  | 'UnknownCommand';

/**
 * Result of one command, rendered as a single message or as JSON
 */
export interface CommandOutcome {
  /** Command name as typed; for unknown commands, the unrecognized word */
  command: string;
  ok: boolean;
  kind: OutcomeKind;
  message: string;
  /** Set for failure kinds */
  code?: ErrorCode;
  data?: Record<string, unknown>;
}
