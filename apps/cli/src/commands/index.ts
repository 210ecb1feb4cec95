/**
 * Commands exports
 */

export { configCommand } from './config.js';
export { addCommand } from './add.js';
export { logCommand } from './log.js';
export { commitCommand } from './commit.js';
export { checkoutCommand } from './checkout.js';
export { succeeded, failed } from './outcome.js';
export { COMMANDS, runCommand, unknownCommand, type CommandHandler, type CommandSpec } from './registry.js';
