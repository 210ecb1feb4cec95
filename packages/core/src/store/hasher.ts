/**
 * Content Hasher
 *
 * Derives a commit identifier from the ordered names and contents of the
 * tracked files. Same files in the same order always give the same id.
 */

import * as crypto from 'node:crypto';

import type { CommitId, FileSnapshot } from './types.js';

/** Hash algorithm used for commit identifiers */
const HASH_ALGORITHM = 'sha256';

/**
 * Hash `name + content` of every file, in sequence order, as one stream.
 *
 * @example
 * ```typescript
 * computeIdentifier([{ name: 'a.txt', content: 'hello' }]);
 * // sha256('a.txthello') as 64 hex chars
 * ```
 */
export function computeIdentifier(files: readonly FileSnapshot[]): CommitId {
  const hash = crypto.createHash(HASH_ALGORITHM);

  for (const file of files) {
    hash.update(file.name, 'utf-8');
    hash.update(file.content);
  }

  return hash.digest('hex');
}
