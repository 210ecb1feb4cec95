/**
 * Snapshot Store Type Definitions
 */

import type { Logger } from '../utils/logger.js';

// ============================================================================
// Store Context
// ============================================================================

/**
 * Resolved locations of one store, built once per invocation and passed
 * explicitly into every operation.
 */
export interface StoreContext {
  /** Working directory whose files are tracked and restored */
  readonly workDir: string;
  /** `<workDir>/vcs` */
  readonly storeDir: string;
  /** `<storeDir>/commits`, one subdirectory per commit identifier */
  readonly commitsDir: string;
  /** Author name, single line */
  readonly configFile: string;
  /** Tracked file names, one per line, in order of first addition */
  readonly indexFile: string;
  /** Newest-first ledger of 4-line commit blocks */
  readonly logFile: string;
  readonly logger: Logger;
}

export interface StoreOptions {
  logger?: Logger;
}

// ============================================================================
// Files & Identifiers
// ============================================================================

/** 64 lowercase hex characters of a SHA-256 digest */
export type CommitId = string;

export interface TrackedFile {
  /** Working-directory-relative name with `/` separators */
  name: string;
  /** Absolute path in the working directory */
  path: string;
}

/** One hasher input: a file name and its bytes */
export interface FileSnapshot {
  name: string;
  content: Buffer | string;
}

export interface LogEntry {
  commitId: CommitId;
  author: string;
  message: string;
}

// ============================================================================
// Operation Results
// ============================================================================

export type TrackResult =
  | { status: 'tracked'; name: string; alreadyTracked: boolean }
  | { status: 'not-found'; input: string };

export type CommitResult =
  | {
      status: 'created';
      commitId: CommitId;
      files: string[];
      /** The snapshot directory already existed, so nothing was copied */
      reusedSnapshot: boolean;
    }
  | { status: 'nothing-to-commit'; reason: 'empty-index' }
  | { status: 'nothing-to-commit'; reason: 'unchanged'; commitId: CommitId };

export type CheckoutResult =
  | { status: 'restored'; commitId: string; files: string[] }
  | { status: 'not-found'; commitId: string };
