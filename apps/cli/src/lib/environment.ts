/**
 * Terminal capability detection (colors, unicode) for TTY and CI output
 */

import ci from 'ci-info';

/** Terminal capabilities */
export interface TerminalCapabilities {
  /** Supports ANSI colors */
  colors: boolean;
  /** Supports Unicode characters */
  unicode: boolean;
}

/** Environment information */
export interface Environment {
  terminal: TerminalCapabilities;
}

/** Symbol sets for different terminal capabilities */
export interface SymbolSet {
  cross: string;
  arrow: string;
}

const UNICODE_SYMBOLS: SymbolSet = {
  cross: '✖',
  arrow: '→',
};

const ASCII_SYMBOLS: SymbolSet = {
  cross: 'x',
  arrow: '->',
};

let envCache: Environment | null = null;

/**
 * Detect Unicode support
 */
function detectUnicodeSupport(): boolean {
  if (process.env['MINIVCS_NO_UNICODE'] === '1') {
    return false;
  }

  if (process.platform === 'win32') {
    // Windows Terminal and the VS Code terminal render Unicode; legacy consoles do not
    return Boolean(process.env['WT_SESSION']) || process.env['TERM_PROGRAM'] === 'vscode';
  }

  return true;
}

/**
 * Detect color support
 */
function detectColorSupport(): boolean {
  if (process.env['NO_COLOR'] !== undefined || process.env['MINIVCS_NO_COLOR'] === '1') {
    return false;
  }

  const forceColor = process.env['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!process.stdout.isTTY) {
    // Some CI providers render ANSI colors in their logs
    return ci.isCI && Boolean(process.env['GITHUB_ACTIONS'] || process.env['GITLAB_CI']);
  }

  return process.env['TERM'] !== 'dumb';
}

function buildEnvironment(): Environment {
  return {
    terminal: {
      colors: detectColorSupport(),
      unicode: detectUnicodeSupport(),
    },
  };
}

/**
 * Get current environment (cached)
 */
export function getEnvironment(): Environment {
  if (!envCache) {
    envCache = buildEnvironment();
  }
  return envCache;
}

/**
 * Re-run detection, e.g. after environment variables change in tests
 */
export function refreshEnvironment(): Environment {
  envCache = null;
  return getEnvironment();
}

/**
 * Get symbols based on environment capabilities
 */
export function getSymbols(): SymbolSet {
  return getEnvironment().terminal.unicode ? UNICODE_SYMBOLS : ASCII_SYMBOLS;
}

export function shouldUseColors(): boolean {
  return getEnvironment().terminal.colors;
}

/**
 * Check if running in verbose mode (via env or debug)
 */
export function isVerbose(): boolean {
  return process.env['MINIVCS_VERBOSE'] === '1' || process.env['DEBUG'] === '1';
}

/**
 * Check if running in quiet mode
 */
export function isQuiet(): boolean {
  return process.env['MINIVCS_QUIET'] === '1';
}
