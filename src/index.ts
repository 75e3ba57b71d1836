#!/usr/bin/env node

import { homedir } from 'os';
import packageJson from '../package.json';
import { parseArgs, printUsage } from './cli';
import { resolveConfig } from './config';
import { CommandEnvironment, cliFlagsFrom, dispatchCommand, initConfig, logLevelFor } from './commands';
import { createClaudeAdapter, createRealProcessRunner } from './engines';
import { createRealFileSystem } from './io/real-file-system';
import { createConsoleLogger } from './logging';
import { SpinnerService, createInquirerPrompter } from './ui';
import { ExitCode } from './types/exit-codes';
import { SystemClock } from './types/clock';
import { Logger } from './types/logger';
import { FileSystem } from './types/file-system';

export { WorkflowScheduler, resetPausedAgents } from './core/scheduler';
export type { WorkflowOutcome, RunOptions } from './core/scheduler';
export type { WorkflowContext, WorkflowSettings } from './core/workflow-context';
export { EventBus } from './events/event-bus';
export type { WorkflowEvent } from './events/events';
export { StateStore, createInitialState, generateWorkflowId, validateWorkflowId } from './io/state-store';
export { ClaudeAdapter } from './engines/claude-adapter';
export type { LlmBackend } from './types/llm-backend';

function buildEnvironment(fs: FileSystem, logger: Logger, spinners: SpinnerService): CommandEnvironment {
  const runner = createRealProcessRunner();
  return {
    fs,
    runner,
    backend: createClaudeAdapter({ processRunner: runner, logger }),
    clock: new SystemClock(),
    logger,
    platform: process.platform,
    workingDirectory: process.cwd(),
    write: (text) => process.stdout.write(text),
    writeError: (text) => process.stderr.write(text),
    writeTitle: process.stdout.isTTY ? (text) => process.stdout.write(text) : undefined,
    spinners,
    prompter: createInquirerPrompter(),
  };
}

async function main(argv: string[]): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    console.error(parsed.error ?? 'Error: Invalid arguments');
    console.error('Run waypoint --help for usage.');
    return ExitCode.INVALID_ARGS;
  }
  const args = parsed.args;

  if (args.command === 'help') {
    printUsage();
    return ExitCode.SUCCESS;
  }
  if (args.command === 'version') {
    console.log(packageJson.version);
    return ExitCode.SUCCESS;
  }

  const fs = createRealFileSystem();
  if (args.command === 'init-config') {
    const logger = createConsoleLogger();
    return initConfig(buildEnvironment(fs, logger, new SpinnerService()));
  }

  const config = await resolveConfig(cliFlagsFrom(args), {
    fs,
    workingDirectory: process.cwd(),
    homeDirectory: homedir(),
  });
  if (!config.ok) {
    console.error(`Error: ${config.error.message}`);
    return ExitCode.INVALID_ARGS;
  }

  const logger = createConsoleLogger({
    minLevel: logLevelFor(config.value.output),
    jsonOutput: config.value.output.jsonLogs,
  });
  const spinners = new SpinnerService({ quiet: config.value.output.quiet });
  const env = buildEnvironment(fs, logger, spinners);

  // First Ctrl+C stops in-flight steps and keeps the state file; a second one exits at once
  const controller = new AbortController();
  process.once('SIGINT', () => {
    spinners.stopAll();
    controller.abort();
  });

  return dispatchCommand(args, config.value, env, controller.signal);
}

if (require.main === module) {
  main(process.argv)
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exit(ExitCode.GENERAL_ERROR);
    });
}
