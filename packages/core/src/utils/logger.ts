/**
 * Structured Logger
 *
 * Component-scoped diagnostics for the store engine. Entries go to the
 * `onLog` hook; nothing is written unless the caller asks for debug output.
 */

export type LogLevel = 'debug' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: 'debug';
  component: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  onLog?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'silent',
  component: 'minivcs',
};

/**
 * Create a scoped logger instance
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get component(): string {
    return this.config.component;
  }

  /**
   * Create a child logger with a nested component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.config.level === 'silent' || !this.config.onLog) {
      return;
    }

    this.config.onLog({
      timestamp: new Date().toISOString(),
      level: 'debug',
      component: this.config.component,
      message,
      context,
    });
  }
}

/**
 * Logger that drops everything; the default for store contexts
 */
export function createSilentLogger(component = 'minivcs'): Logger {
  return new Logger({ component, level: 'silent' });
}
