/**
 * CLI Module
 *
 * Help rendering and the process boundary
 */

export { getHelpText, getUsageLine } from './help';
export { runParser } from './run';
export type { RunOptions } from './run';
