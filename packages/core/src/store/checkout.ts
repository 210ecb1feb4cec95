/**
 * Checkout Engine
 *
 * Copies a commit's stored files back into the working directory,
 * overwriting files of the same name.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { CheckoutResult, StoreContext } from './types.js';
import { fromStoredName, isDirectory, listFilesRecursive, writeFileWithParents } from '../utils/fs.js';

/**
 * Restore the snapshot stored under `commitId`. The identifier is looked up
 * literally but must name an entry directly inside `commits/`.
 */
export function checkout(ctx: StoreContext, commitId: string): CheckoutResult {
  const dir = path.resolve(ctx.commitsDir, commitId);

  if (path.dirname(dir) !== ctx.commitsDir || !isDirectory(dir)) {
    return { status: 'not-found', commitId };
  }

  const files = listFilesRecursive(dir);
  for (const name of files) {
    const content = fs.readFileSync(fromStoredName(dir, name));
    writeFileWithParents(fromStoredName(ctx.workDir, name), content);
  }

  ctx.logger.child('checkout').debug('Restored snapshot', { commitId, files: files.length });

  return { status: 'restored', commitId, files };
}
