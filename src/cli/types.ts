/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import { ModelName } from '../types/effective-config';

/** What the invocation asks for */
export type CommandName = 'start' | 'resume' | 'status' | 'list' | 'recover' | 'init-config' | 'help' | 'version';

/** Parsed CLI arguments */
export interface ParsedArgs {
  command: CommandName;

  /** Initial state file for start */
  file: string | null;

  /** Workflow id for start (optional), resume and status (required) */
  workflowId: string | null;

  /** Budget for a new workflow, in USD */
  budgetUsd: number | null;

  /** Initial input handed to the first state as its result */
  input: string | null;

  /** Create the workflow without running it */
  noRun: boolean;

  /** Skip the per-step debug files */
  noDebug: boolean;

  model: ModelName | null;

  /** Per-step timeout in seconds; 0 disables it */
  timeoutSeconds: number | null;

  dangerouslySkipPermissions: boolean;

  /** Show only errors */
  quiet: boolean;

  /** Log at debug level */
  verbose: boolean;

  /** Exit paused instead of waiting for a usage limit to reset */
  noWait: boolean;

  /** Console width for truncated output */
  width: number | null;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  command: 'help',
  file: null,
  workflowId: null,
  budgetUsd: null,
  input: null,
  noRun: false,
  noDebug: false,
  model: null,
  timeoutSeconds: null,
  dangerouslySkipPermissions: false,
  quiet: false,
  verbose: false,
  noWait: false,
  width: null,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
