/**
 * CLI Module
 *
 * Exports for the CLI argument parsing module
 */

export { parseArgs, MIN_WIDTH } from './arg-parser';
export { getUsageText, printUsage } from './help';
export type { CommandName, ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS } from './types';
