/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

import { ExitCode, getExitCodeDescription } from '../types/exit-codes';

function exitCodeLines(): string {
  return Object.values(ExitCode)
    .map((code) => `  ${String(code).padEnd(36)}${getExitCodeDescription(code)}`)
    .join('\n');
}

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: waypoint FILE [--workflow-id ID] [--budget USD] [--input TEXT] [--no-run]
       waypoint --resume ID | --status ID | --list | --recover | --init-config

Commands:
  FILE                                Start a workflow at this state file (.md prompt or script),
                                      or at 1_START.md in a workflow directory or .zip archive
  --resume <id>                       Resume a stored workflow
  --status <id>                       Show a stored workflow's agents and cost
  --list                              List stored workflows
  --recover                           Show interrupted or paused workflows and how to resume them
  --init-config                       Write a config template to .waypoint/config.json

Start options:
  --workflow-id <id>                  Workflow id (default: generated from the current time)
  --budget <usd>                      Spend ceiling for the workflow (default: 10.00)
  --input <text>                      Initial input, available to the first state as {{result}}
  --no-run                            Create the workflow without running it

Run options:
  --model <opus|sonnet|haiku>         Model for states whose policy names none
  --timeout <seconds>                 Idle timeout per step, 0 for none (default: 600)
  --dangerously-skip-permissions      Skip Claude permission checks instead of accepting edits
  --no-wait                           Exit paused instead of waiting for a usage limit reset
  --no-debug                          Do not write per-step debug files
  --quiet                             Show only errors
  --verbose                           Show debug logs and the effective configuration
  --width <n>                         Console width for truncated output (default: 80)
  -h, --help                          Show this help message
  -v, --version                       Show version number

Examples:
  waypoint flows/review/START.md
  waypoint flows/review/START.md --workflow-id nightly --budget 2.50
  waypoint flows/triage/START.md --input "issue #42"
  waypoint --resume nightly
  waypoint --status nightly
  waypoint --recover

Exit codes:
${exitCodeLines()}`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
