/**
 * Outcome constructors shared by the command handlers
 */

import { getErrorDefaults, type ErrorCode } from '../lib/errors.js';
import type { CommandOutcome, OutcomeKind } from '../types.js';

export function succeeded(
  command: string,
  kind: OutcomeKind,
  message: string,
  data?: Record<string, unknown>
): CommandOutcome {
  return { command, ok: true, kind, message, data };
}

export function failed(
  command: string,
  kind: OutcomeKind,
  code: ErrorCode,
  message: string = getErrorDefaults(code).message,
  data?: Record<string, unknown>
): CommandOutcome {
  return { command, ok: false, kind, message, code, data };
}
