/**
 * Logger wrapper with level-based filtering and structured output
 *
 * Result lines go to stdout/stderr through console; debug diagnostics go
 * through consola so they respect its level filter.
 */

import { createConsola, type ConsolaInstance } from 'consola';
import chalk from 'chalk';
import { getSymbols, shouldUseColors } from './environment.js';
import { isVcsError, type VcsError } from './errors.js';

/** Log levels mapping */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'verbose' | 'normal' | 'quiet';

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silent: -1,
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
  // Aliases for CLI convenience
  verbose: 4,
  normal: 3,
  quiet: 1,
};

/** Structured log entry */
export interface LogEntry {
  timestamp: string;
  level: 'ERROR' | 'INFO' | 'DEBUG';
  message: string;
  data?: unknown;
  error?: {
    code?: string;
    severity?: string;
    message: string;
    suggestions?: string[];
  };
}

/** Logger options */
export interface LoggerOptions {
  /** Minimum log level */
  level?: LogLevel;
  /** Output as JSON */
  json?: boolean;
  /** Color output; defaults to terminal detection */
  colors?: boolean;
}

/** Logger instance interface */
export interface Logger {
  error: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  log: (message: string, ...args: unknown[]) => void;
  logError: (error: VcsError | Error) => void;
  dim: (message: string) => void;
  json: (data: unknown) => void;
  isLevelEnabled: (level: LogLevel) => boolean;
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const symbols = getSymbols();
  const useColors = (options.colors ?? shouldUseColors()) && !options.json;

  const level = LOG_LEVEL_MAP[options.level ?? 'info'];
  const useJson = options.json ?? false;

  const plain = (s: string) => s;
  const c = {
    red: useColors ? chalk.red : plain,
    cyan: useColors ? chalk.cyan : plain,
    dim: useColors ? chalk.dim : plain,
  };

  const consola: ConsolaInstance = createConsola({
    level,
    stdout: process.stderr,
    stderr: process.stderr,
    formatOptions: {
      colors: useColors,
      date: false,
    },
  });

  function enabled(levelNum: number): boolean {
    return levelNum <= level;
  }

  function formatLogEntry(levelName: LogEntry['level'], message: string, args: unknown[]): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level: levelName,
      message,
      data: args.length > 0 ? args : undefined,
    };
  }

  const logger: Logger = {
    error: (message, ...args) => {
      if (!enabled(1)) return;

      if (useJson) {
        console.error(JSON.stringify(formatLogEntry('ERROR', message, args)));
      } else {
        console.error(`${c.red(symbols.cross)} ${message}`, ...args);
      }
    },

    debug: (message, ...args) => {
      if (!enabled(4)) return;

      if (useJson) {
        console.error(JSON.stringify(formatLogEntry('DEBUG', message, args)));
      } else {
        consola.debug(message, ...args);
      }
    },

    // Result lines: suppressed only when silent
    log: (message, ...args) => {
      if (!enabled(0)) return;

      if (useJson) {
        console.log(JSON.stringify(formatLogEntry('INFO', message, args)));
      } else {
        console.log(message, ...args);
      }
    },

    logError: (error) => {
      if (useJson) {
        const entry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: 'ERROR',
          message: error.message,
          error: isVcsError(error)
            ? { code: error.code, severity: error.severity, message: error.message, suggestions: error.suggestions }
            : { message: error.message },
        };
        console.error(JSON.stringify(entry));
        return;
      }

      logger.error(error.message);

      if (isVcsError(error)) {
        if (error.context.file) {
          logger.dim(`  Location: ${error.context.file}`);
        }

        for (const suggestion of error.suggestions) {
          console.error(`  ${c.cyan(symbols.arrow)} ${suggestion}`);
        }

        if (error.cause) {
          logger.debug(`Caused by: ${error.cause.message}`);
        }
      }
    },

    dim: (message) => {
      if (!useJson) {
        console.error(c.dim(message));
      }
    },

    json: (data) => {
      console.log(JSON.stringify(data, null, 2));
    },

    isLevelEnabled: (candidate) => enabled(LOG_LEVEL_MAP[candidate]),
  };

  return logger;
}
