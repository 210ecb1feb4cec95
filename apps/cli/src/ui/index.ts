/**
 * UI exports
 */

export { renderHelp, type HelpOptions } from './help.js';
export { renderOutcome, type RenderOptions } from './output.js';
