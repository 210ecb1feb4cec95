/**
 * Library exports for CLI utilities
 */

// Environment detection and capabilities
export {
  getEnvironment,
  refreshEnvironment,
  getSymbols,
  shouldUseColors,
  isVerbose,
  isQuiet,
  type Environment,
  type SymbolSet,
  type TerminalCapabilities,
} from './environment.js';

// Error handling
export {
  VcsError,
  isVcsError,
  wrapError,
  withTimeout,
  getErrorDefaults,
  type ErrorCode,
  type ErrorSeverity,
  type ErrorContext,
} from './errors.js';

// Logging
export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Settings loading and validation
export {
  loadConfig,
  validateConfig,
  resolveRuntimeOptions,
  configSchema,
  defaultConfig,
  type LoadedConfig,
  type MinivcsConfig,
  type RuntimeOptions,
} from './config.js';

export { CLI_VERSION, CLI_NAME } from './version.js';
