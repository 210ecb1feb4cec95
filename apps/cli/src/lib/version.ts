/**
 * CLI Version
 *
 * @module lib/version
 */

/** Kept in step with apps/cli/package.json */
export const CLI_VERSION = '0.1.0';

export const CLI_NAME = 'minivcs';
