#!/usr/bin/env node
/**
 * minivcs - a minimal local version-control tool
 */

import { createProgram } from './program.js';
import { createLogger, wrapError } from './lib/index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    createLogger().logError(wrapError(error, { operation: 'startup' }));
    process.exitCode = 1;
  });
