/**
 * CLI settings loading with cosmiconfig + zod validation
 *
 * Settings only shape how results are presented. The author name lives in
 * the store (`vcs/config.txt`) and is handled by the `config` command.
 *
 * @module config
 * @example
 * ```json
 * // .minivcsrc.json
 * { "output": "json", "logLevel": "verbose", "color": false }
 * ```
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import { VcsError, withTimeout, wrapError } from './errors.js';
import { isQuiet, isVerbose, shouldUseColors } from './environment.js';
import type { LogLevel } from './logger.js';
import type { CliOptions } from '../types.js';

// ============================================================================
// Constants
// ============================================================================

/** Maximum settings load timeout in milliseconds */
const DEFAULT_CONFIG_TIMEOUT_MS = 5000;

const OUTPUT_FORMATS = ['pretty', 'json'] as const;

const LOG_LEVELS = ['quiet', 'normal', 'verbose'] as const;

/**
 * Settings search locations in priority order, relative to the working directory
 */
const CONFIG_SEARCH_PLACES = [
  '.minivcsrc',
  '.minivcsrc.json',
  '.minivcsrc.yaml',
  '.minivcsrc.yml',
  'minivcs.config.json',
  'package.json',
] as const;

// ============================================================================
// Schema
// ============================================================================

export const configSchema = z
  .object({
    /** Default output format */
    output: z.enum(OUTPUT_FORMATS).default('pretty'),
    /** Diagnostic verbosity */
    logLevel: z.enum(LOG_LEVELS).default('normal'),
    /** Colored terminal output */
    color: z.boolean().default(true),
  })
  .strict();

export type MinivcsConfig = z.infer<typeof configSchema>;

export const defaultConfig: MinivcsConfig = configSchema.parse({});

export interface LoadedConfig {
  config: MinivcsConfig;
  /** Settings file that was used, or null for defaults */
  filepath: string | null;
}

/** Presentation options after flags, environment and settings are combined */
export interface RuntimeOptions {
  json: boolean;
  colors: boolean;
  level: LogLevel;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load settings from `configPath`, or search the working directory for one.
 *
 * @throws {VcsError} CONFIG_INVALID when the file fails validation,
 *   CONFIG_PARSE_ERROR when it cannot be parsed, FILE_NOT_FOUND when an
 *   explicit path does not exist
 */
export async function loadConfig(
  cwd: string,
  configPath?: string,
  options?: { timeout?: number }
): Promise<LoadedConfig> {
  const explorer = cosmiconfig('minivcs', {
    searchPlaces: [...CONFIG_SEARCH_PLACES],
    searchStrategy: 'none',
  });

  let result: CosmiconfigResult;
  try {
    result = await withTimeout<CosmiconfigResult>(
      () => (configPath ? explorer.load(configPath) : explorer.search(cwd)),
      options?.timeout ?? DEFAULT_CONFIG_TIMEOUT_MS,
      'CONFIG_PARSE_ERROR'
    );
  } catch (error) {
    throw toConfigError(error, configPath);
  }

  if (!result || result.isEmpty) {
    return { config: defaultConfig, filepath: result?.filepath ?? null };
  }

  return { config: validateConfig(result.config, result.filepath), filepath: result.filepath };
}

/**
 * Validate raw settings, applying defaults
 */
export function validateConfig(raw: unknown, filepath = 'settings'): MinivcsConfig {
  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const errors = parsed.error.errors
      .map((e) => `  • ${e.path.join('.') || 'root'}: ${e.message}`)
      .join('\n');

    throw new VcsError(`Invalid settings in ${filepath}:\n${errors}`, 'CONFIG_INVALID', {
      context: { file: filepath },
      suggestions: ['Valid keys are output, logLevel and color', 'Delete the file to fall back to defaults'],
    });
  }

  return parsed.data;
}

/**
 * Combine settings with command-line flags and environment variables.
 * Flags win over environment, environment over settings. Colors also need
 * a terminal that supports them.
 */
export function resolveRuntimeOptions(config: MinivcsConfig, flags: CliOptions): RuntimeOptions {
  let level: LogLevel = config.logLevel;
  if (flags.verbose || isVerbose()) {
    level = 'verbose';
  } else if (flags.quiet || isQuiet()) {
    level = 'quiet';
  }

  return {
    json: flags.json === true || config.output === 'json',
    colors: flags.color !== false && config.color && shouldUseColors(),
    level,
  };
}

/**
 * Errors reaching here were already wrapped by `withTimeout`; anything it
 * could not classify came from a loader and is reported as a parse failure.
 */
function toConfigError(error: unknown, configPath?: string): VcsError {
  const wrapped = wrapError(error, configPath ? { file: configPath } : undefined);

  if (wrapped.code !== 'UNKNOWN_ERROR') {
    return wrapped;
  }

  return VcsError.fromCode('CONFIG_PARSE_ERROR', `Failed to load settings: ${wrapped.message}`, {
    cause: wrapped.cause ?? wrapped,
    context: wrapped.context,
  });
}
