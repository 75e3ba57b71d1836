/**
 * What a command needs from the outside world. The CLI entry point builds
 * one from real implementations; tests build one from in-memory doubles.
 */

import { FileSystem } from '../types/file-system';
import { ProcessRunner } from '../types/process-runner';
import { LlmBackend } from '../types/llm-backend';
import { Clock } from '../types/clock';
import { Logger, LogLevel } from '../types/logger';
import { Prompter } from '../types/prompter';
import { OutputConfig } from '../types/effective-config';
import { Platform } from '../core/state-resolver';
import { SpinnerFactory } from '../ui/spinner-service';
import { CliFlags } from '../config/resolve-config';
import { ParsedArgs } from '../cli/types';

export interface CommandEnvironment {
  fs: FileSystem;
  runner: ProcessRunner;
  backend: LlmBackend;
  clock: Clock;
  logger: Logger;
  platform: Platform;
  workingDirectory: string;
  /** Workflow progress and command output (stdout) */
  write: (text: string) => void;
  /** Command errors (stderr) */
  writeError: (text: string) => void;
  /** Terminal title escapes; unset when stdout is not a terminal */
  writeTitle?: (text: string) => void;
  /** Spinner for usage-limit waits; plain lines without one */
  spinners?: SpinnerFactory;
  /** Interactive picker for --recover */
  prompter?: Prompter;
}

/**
 * Flags given on the command line. Unset booleans stay undefined so config
 * files can supply them.
 */
export function cliFlagsFrom(args: ParsedArgs): CliFlags {
  const flags: CliFlags = {};
  if (args.model !== null) flags.model = args.model;
  if (args.budgetUsd !== null) flags.budgetUsd = args.budgetUsd;
  if (args.timeoutSeconds !== null) flags.timeoutSeconds = args.timeoutSeconds;
  if (args.width !== null) flags.width = args.width;
  if (args.dangerouslySkipPermissions) flags.dangerouslySkipPermissions = true;
  if (args.noWait) flags.noWait = true;
  if (args.noDebug) flags.debug = false;
  if (args.quiet) flags.quiet = true;
  if (args.verbose) flags.verbose = true;
  return flags;
}

export function logLevelFor(output: OutputConfig): LogLevel {
  if (output.verbose) {
    return 'debug';
  }
  return output.quiet ? 'error' : 'warn';
}
