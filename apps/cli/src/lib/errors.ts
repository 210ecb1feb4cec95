/**
 * Error classes with actionable suggestions
 *
 * Expected command conditions (too many arguments, unknown commit, nothing
 * to commit, missing message) are reported as outcomes, not thrown. The
 * codes below name them so JSON output and rendering share one taxonomy;
 * `VcsError` itself carries unexpected failures such as unreadable files.
 */

/** All possible error codes for categorization */
export type ErrorCode =
  | 'INVALID_ARGUMENTS'
  | 'NOT_FOUND'
  | 'NOTHING_TO_COMMIT'
  | 'MESSAGE_MISSING'
  | 'UNKNOWN_COMMAND'
  | 'CONFIG_INVALID'
  | 'CONFIG_PARSE_ERROR'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'PERMISSION_DENIED'
  | 'DIRECTORY_NOT_FOUND'
  | 'UNKNOWN_ERROR';

/** Error severity levels */
export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

/** Context information for debugging */
export interface ErrorContext {
  file?: string;
  operation?: string;
}

/**
 * Custom error class with actionable suggestions and rich context
 */
export class VcsError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly cause?: Error;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      suggestions?: string[];
      cause?: Error;
      severity?: ErrorSeverity;
      context?: ErrorContext;
    }
  ) {
    super(message);
    this.name = 'VcsError';
    this.code = code;
    this.suggestions = options?.suggestions ?? [];
    this.cause = options?.cause;
    this.severity = options?.severity ?? getErrorDefaults(code).severity;
    this.context = options?.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VcsError);
    }
  }

  /**
   * Create error with common suggestions based on error code
   */
  static fromCode(
    code: ErrorCode,
    message?: string,
    options?: { cause?: Error; context?: ErrorContext }
  ): VcsError {
    const defaults = getErrorDefaults(code);
    return new VcsError(message ?? defaults.message, code, {
      suggestions: defaults.suggestions,
      cause: options?.cause,
      context: options?.context,
      severity: defaults.severity,
    });
  }

  /**
   * Create a new error with additional context
   */
  withContext(context: Partial<ErrorContext>): VcsError {
    return new VcsError(this.message, this.code, {
      suggestions: this.suggestions,
      cause: this.cause,
      severity: this.severity,
      context: { ...this.context, ...context },
    });
  }
}

interface ErrorDefaults {
  message: string;
  suggestions: string[];
  severity: ErrorSeverity;
}

const ERROR_DEFAULTS: Record<ErrorCode, ErrorDefaults> = {
  INVALID_ARGUMENTS: {
    message: 'Too many arguments for the command',
    suggestions: ['Run `minivcs --help` to see how each command is used', 'Quote arguments that contain spaces'],
    severity: 'error',
  },
  NOT_FOUND: {
    message: 'Not found',
    suggestions: ['Check the file path or commit id', 'Run `minivcs log` to list commit ids'],
    severity: 'error',
  },
  NOTHING_TO_COMMIT: {
    message: 'Nothing to commit',
    suggestions: ['Track files with `minivcs add <file>`', 'Change a tracked file before committing again'],
    severity: 'info',
  },
  MESSAGE_MISSING: {
    message: 'Required argument was not passed',
    suggestions: ['Pass the commit message or commit id as the only argument'],
    severity: 'error',
  },
  UNKNOWN_COMMAND: {
    message: 'Unknown command',
    suggestions: ['Run `minivcs --help` to list the commands'],
    severity: 'error',
  },
  CONFIG_INVALID: {
    message: 'Settings file is invalid',
    suggestions: ['Check your .minivcsrc for typos', 'Remove unknown values or fix their types'],
    severity: 'error',
  },
  CONFIG_PARSE_ERROR: {
    message: 'Failed to parse settings file',
    suggestions: ['Check the file for JSON or YAML syntax errors'],
    severity: 'error',
  },
  FILE_NOT_FOUND: {
    message: 'File not found',
    suggestions: ['Check that the file path is correct', 'Verify case sensitivity of the filename'],
    severity: 'error',
  },
  FILE_READ_ERROR: {
    message: 'Failed to read file',
    suggestions: ['Check file permissions', 'Ensure the path is a file, not a directory'],
    severity: 'error',
  },
  FILE_WRITE_ERROR: {
    message: 'Failed to write file',
    suggestions: ['Check write permissions on the directory', 'Ensure there is sufficient disk space'],
    severity: 'error',
  },
  PERMISSION_DENIED: {
    message: 'Permission denied',
    suggestions: ['Check file/directory permissions', 'Verify ownership of the vcs directory'],
    severity: 'error',
  },
  DIRECTORY_NOT_FOUND: {
    message: 'Directory not found',
    suggestions: ['Check that the directory path is correct'],
    severity: 'error',
  },
  UNKNOWN_ERROR: {
    message: 'An unexpected error occurred',
    suggestions: ['Run with --verbose for more details', 'Report this issue if it persists'],
    severity: 'error',
  },
};

export function getErrorDefaults(code: ErrorCode): ErrorDefaults {
  return ERROR_DEFAULTS[code];
}

/**
 * Type guard to check if an error is a VcsError
 */
export function isVcsError(error: unknown): error is VcsError {
  return error instanceof VcsError;
}

/**
 * Wrap unknown errors in VcsError with automatic code detection
 */
export function wrapError(error: unknown, context?: ErrorContext): VcsError {
  if (isVcsError(error)) {
    return context ? error.withContext(context) : error;
  }

  if (error instanceof Error) {
    const code = detectErrorCode(error);
    return new VcsError(error.message, code, {
      suggestions: getErrorDefaults(code).suggestions,
      cause: error,
      context: { ...context, file: context?.file ?? errnoPath(error) },
    });
  }

  return new VcsError(String(error), 'UNKNOWN_ERROR', { context });
}

function errnoPath(error: Error): string | undefined {
  if ('path' in error && typeof error.path === 'string') {
    return error.path;
  }
  return undefined;
}

/**
 * Detect appropriate error code from native Error
 */
function detectErrorCode(error: Error): ErrorCode {
  if ('code' in error) {
    switch (error.code) {
      case 'ENOENT':
        return 'FILE_NOT_FOUND';
      case 'EACCES':
      case 'EPERM':
        return 'PERMISSION_DENIED';
      case 'ENOTDIR':
        return 'DIRECTORY_NOT_FOUND';
      case 'EISDIR':
        return 'FILE_READ_ERROR';
      case 'ENOSPC':
      case 'EROFS':
        return 'FILE_WRITE_ERROR';
    }
  }

  const message = error.message.toLowerCase();
  if (message.includes('permission') || message.includes('access denied')) {
    return 'PERMISSION_DENIED';
  }

  if (error.name === 'SyntaxError' || message.includes('parse')) {
    return 'CONFIG_PARSE_ERROR';
  }

  return 'UNKNOWN_ERROR';
}

/**
 * Wrap an operation with a timeout
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  errorCode: ErrorCode = 'UNKNOWN_ERROR'
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(VcsError.fromCode(errorCode, `Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    operation()
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(wrapError(error));
      });
  });
}
