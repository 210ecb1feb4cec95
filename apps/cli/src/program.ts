/**
 * Command-line program
 *
 * Global flags are parsed by commander; each registry entry becomes a
 * subcommand that collects its positional arguments and hands them to
 * `runCommand`. The store is opened only once a command actually runs.
 */

import { Command, InvalidArgumentError, type OutputConfiguration } from 'commander';
import {
  createSilentLogger,
  Logger as StoreLogger,
  openStore,
  type StoreContext,
} from '@minivcs/core';
import {
  CLI_NAME,
  CLI_VERSION,
  createLogger,
  loadConfig,
  resolveRuntimeOptions,
  shouldUseColors,
  wrapError,
  type Logger,
  type LogLevel,
} from './lib/index.js';
import { COMMANDS, runCommand, unknownCommand } from './commands/index.js';
import { renderHelp, renderOutcome } from './ui/index.js';
import { COMMAND_KINDS, type CliOptions, type CommandOutcome } from './types.js';

export interface ProgramOptions {
  /** Directory holding the `vcs` store; defaults to `process.cwd()` */
  cwd?: string;
  /** Replaces the logger built from flags and settings */
  logger?: Logger;
  /** Throw a CommanderError instead of exiting on help, version and parse errors */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

type OutcomeProducer = (store: () => StoreContext) => CommandOutcome;

/**
 * Validate file path argument
 */
function validatePath(value: string): string {
  if (!value || value.trim() === '') {
    throw new InvalidArgumentError('Path cannot be empty');
  }
  return value.trim();
}

function flagLevel(flags: CliOptions): LogLevel {
  if (flags.verbose) return 'verbose';
  if (flags.quiet) return 'quiet';
  return 'normal';
}

/**
 * Forward store diagnostics into the terminal logger's debug channel
 */
function bridgeStoreLogger(logger: Logger): StoreLogger {
  if (!logger.isLevelEnabled('verbose')) {
    return createSilentLogger();
  }

  return new StoreLogger({
    level: 'debug',
    onLog: (entry) => {
      const line = `[${entry.component}] ${entry.message}`;
      if (entry.context) {
        logger.debug(line, entry.context);
      } else {
        logger.debug(line);
      }
    },
  });
}

export function createProgram(options: ProgramOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const program = new Command();

  async function respond(flags: CliOptions, operation: string, produce: OutcomeProducer): Promise<void> {
    // Used until settings are loaded, and for reporting a settings failure
    let logger =
      options.logger ??
      createLogger({ level: flagLevel(flags), json: flags.json, colors: flags.color === false ? false : undefined });

    try {
      const { config, filepath } = await loadConfig(cwd, flags.config);
      const runtime = resolveRuntimeOptions(config, flags);
      logger = options.logger ?? createLogger(runtime);

      if (filepath) {
        logger.debug(`Loaded settings from ${filepath}`);
      }

      const outcome = produce(() => openStore(cwd, { logger: bridgeStoreLogger(logger) }));
      renderOutcome(outcome, logger, { json: runtime.json });
    } catch (error) {
      logger.logError(wrapError(error, { operation }));
      process.exitCode = 1;
    }
  }

  program
    .name(CLI_NAME)
    .description('A minimal local version-control tool')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--quiet', 'Print only results and errors')
    .option('--json', 'Output in JSON format')
    .option('-c, --config <path>', 'Path to a settings file', validatePath)
    .option('--no-color', 'Disable colored output')
    .allowUnknownOption()
    // Global flags only before the command name; later words are arguments
    .enablePositionalOptions();

  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  for (const kind of COMMAND_KINDS) {
    program
      .command(kind)
      .description(COMMANDS[kind].description)
      .argument('[args...]', 'Command arguments')
      .action(async (args: string[], _options: CliOptions, command: Command) => {
        const flags = command.optsWithGlobals<CliOptions>();
        await respond(flags, kind, (store) => runCommand(kind, args, store()));
      });
  }

  // Only the top-level listing is replaced; subcommands keep commander's help
  program.configureHelp({
    formatHelp: (cmd) => {
      const colors = cmd.opts<CliOptions>().color !== false && shouldUseColors();
      return `${renderHelp({ colors })}\n`;
    },
  });

  program.action(async (flags: CliOptions, command: Command) => {
    const [name] = command.args;

    if (name === undefined) {
      command.outputHelp();
      return;
    }

    await respond(flags, name, () => unknownCommand(name));
  });

  return program;
}
