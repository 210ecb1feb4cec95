/**
 * @minivcs/core - Snapshot storage engine for minivcs
 *
 * Synchronous, single-process store: no locking between concurrent
 * invocations on the same working directory.
 */

export * from './store/index.js';
export { Logger, createSilentLogger, type LogEntry as LoggerEntry, type LoggerConfig, type LogLevel } from './utils/logger.js';
