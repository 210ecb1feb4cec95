/**
 * Author name persisted in `config.txt`
 */

import * as fs from 'node:fs';

import type { StoreContext } from './types.js';
import { readTextOrEmpty } from '../utils/fs.js';

/**
 * The stored name without trailing line breaks; empty string when no author
 * has been set. Other whitespace is part of the name.
 */
export function readAuthor(ctx: StoreContext): string {
  return readTextOrEmpty(ctx.configFile).replace(/(\r?\n)+$/, '');
}

/** Stores `name` exactly as given */
export function writeAuthor(ctx: StoreContext, name: string): void {
  fs.writeFileSync(ctx.configFile, name, 'utf-8');
}
