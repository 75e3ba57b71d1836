/**
 * Exit codes for the waypoint CLI
 */

export const ExitCode = {
  /** Workflow completed, or a read-only command succeeded */
  SUCCESS: 0,
  /** Unexpected error */
  GENERAL_ERROR: 1,
  /** Invalid command line or configuration */
  INVALID_ARGS: 2,
  /** Workflow aborted by a fatal error */
  WORKFLOW_FAILED: 3,
  /** Every remaining agent is paused; the workflow can be resumed */
  WORKFLOW_PAUSED: 4,
  /** Workflow or state file not found */
  NOT_FOUND: 5,
  /** Interrupted by SIGINT */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description for an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Success';
    case ExitCode.GENERAL_ERROR:
      return 'General error';
    case ExitCode.INVALID_ARGS:
      return 'Invalid arguments or configuration';
    case ExitCode.WORKFLOW_FAILED:
      return 'Workflow failed';
    case ExitCode.WORKFLOW_PAUSED:
      return 'Workflow paused';
    case ExitCode.NOT_FOUND:
      return 'Not found';
    case ExitCode.INTERRUPTED:
      return 'Interrupted';
  }
}
