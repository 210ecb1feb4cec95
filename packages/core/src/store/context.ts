/**
 * Store Context
 *
 * Resolves the on-disk layout of a store and creates it on first use.
 * Directory and file names are part of the on-disk contract.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { StoreContext, StoreOptions } from './types.js';
import { createSilentLogger } from '../utils/logger.js';

// ============================================================================
// Constants
// ============================================================================

export const VCS_DIR_NAME = 'vcs';
export const COMMITS_DIR_NAME = 'commits';
export const CONFIG_FILE_NAME = 'config.txt';
export const INDEX_FILE_NAME = 'index.txt';
export const LOG_FILE_NAME = 'log.txt';

// ============================================================================
// Context
// ============================================================================

/**
 * Resolve every store path for a working directory. Touches nothing on disk.
 */
export function createStoreContext(workDir: string, options: StoreOptions = {}): StoreContext {
  const root = path.resolve(workDir);
  const storeDir = path.join(root, VCS_DIR_NAME);

  return {
    workDir: root,
    storeDir,
    commitsDir: path.join(storeDir, COMMITS_DIR_NAME),
    configFile: path.join(storeDir, CONFIG_FILE_NAME),
    indexFile: path.join(storeDir, INDEX_FILE_NAME),
    logFile: path.join(storeDir, LOG_FILE_NAME),
    logger: options.logger ?? createSilentLogger(),
  };
}

/**
 * Resolve the store and create any missing directory or file.
 * Existing content is left as it is.
 */
export function openStore(workDir: string, options: StoreOptions = {}): StoreContext {
  const ctx = createStoreContext(workDir, options);
  ensureStoreLayout(ctx);
  return ctx;
}

export function ensureStoreLayout(ctx: StoreContext): void {
  if (!fs.existsSync(ctx.commitsDir)) {
    fs.mkdirSync(ctx.commitsDir, { recursive: true });
    ctx.logger.debug('Created store directories', { storeDir: ctx.storeDir });
  }

  for (const file of [ctx.configFile, ctx.indexFile, ctx.logFile]) {
    if (!fs.existsSync(file)) {
      fs.writeFileSync(file, '', 'utf-8');
    }
  }
}
