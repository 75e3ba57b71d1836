/**
 * ProcessRunner interface
 * Abstracts subprocess execution for the Claude backend and script states
 */

/**
 * Options for spawning a subprocess
 */
export interface SpawnOptions {
  /** Arguments to pass to the command */
  args: string[];
  /** Working directory for the subprocess */
  cwd: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /** Total timeout in milliseconds (0 or undefined = no timeout) */
  timeoutMs?: number;
  /** Kill the process when no output arrives for this long (0 or undefined = off) */
  idleTimeoutMs?: number;
  /** Aborting kills the process and resolves with interrupted=true */
  signal?: AbortSignal;
  /** Callback for stdout data (for streaming) */
  onStdout?: (data: string) => void;
  /** Callback for stderr data */
  onStderr?: (data: string) => void;
}

/**
 * Result from spawning a subprocess
 */
export interface SpawnResult {
  /** Exit code from the subprocess */
  exitCode: number;
  /** Duration of execution in milliseconds */
  durationMs: number;
  /** Full captured stdout */
  stdout: string;
  /** Full captured stderr */
  stderr: string;
  /** Whether the process was killed by the total or idle timeout */
  timedOut: boolean;
  /** Which timeout fired, when timedOut */
  timeoutKind?: 'total' | 'idle';
  /** Whether the process was killed by a signal or an abort */
  interrupted: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

/**
 * Interface for running subprocesses
 * Implementations can be real (child_process) or mock (for testing)
 */
export interface ProcessRunner {
  /**
   * Spawn a subprocess and wait for it to complete
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Kill every process this runner started that is still running
   */
  killAll?(signal?: NodeJS.Signals): void;
}
