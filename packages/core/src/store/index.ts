/**
 * Snapshot Store
 *
 * Track files, snapshot them under a content hash, and restore any snapshot.
 * Control flow for a commit: index → hasher → commit directory → log.
 * Checkout reads commit directories directly.
 */

export * from './types.js';
export * from './context.js';
export * from './hasher.js';
export * from './index-store.js';
export * from './log-store.js';
export * from './config-store.js';
export * from './commit-store.js';
export * from './checkout.js';
