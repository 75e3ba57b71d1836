/**
 * Run a stored workflow with the console, title and debug observers attached,
 * and map how it ended onto an exit code
 */

import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { errorMessage } from '../core/errors';
import { StepCounter, WorkflowContext } from '../core/workflow-context';
import { WorkflowScheduler } from '../core/scheduler';
import { EventBus } from '../events/event-bus';
import { StateStore } from '../io/state-store';
import { DiagnosticWriter } from '../logging/diagnostics';
import { ConsoleObserver } from '../logging/console-observer';
import { DebugObserver, debugDirectoryFor } from '../logging/debug-observer';
import { TitleBarObserver } from '../logging/titlebar-observer';
import { formatEffectiveConfigForDisplay } from '../config/write-config';
import { CommandEnvironment } from './command-environment';

export async function runWorkflow(
  workflowId: string,
  config: EffectiveConfig,
  env: CommandEnvironment,
  signal?: AbortSignal
): Promise<ExitCode> {
  const logger = env.logger.child({ workflowId });
  const bus = new EventBus(logger, env.clock);

  const consoleObserver = new ConsoleObserver(bus, {
    write: env.write,
    quiet: config.output.quiet,
    width: config.output.width,
    spinners: env.spinners,
  });
  const titleBar = env.writeTitle ? new TitleBarObserver(bus, env.writeTitle) : null;
  let debugObserver: DebugObserver | null = null;
  if (config.behavior.debug) {
    const debugDir = debugDirectoryFor(config.paths.debugDirectory, workflowId, env.clock.now());
    debugObserver = new DebugObserver(env.fs, bus, debugDir, logger);
  }

  if (config.output.verbose) {
    env.write(formatEffectiveConfigForDisplay(config) + '\n');
  }

  const context: WorkflowContext = {
    fs: env.fs,
    store: new StateStore(env.fs, config.paths.stateDirectory),
    backend: env.backend,
    runner: env.runner,
    bus,
    logger,
    clock: env.clock,
    platform: env.platform,
    diagnostics: new DiagnosticWriter(env.fs, config.paths.errorDirectory, logger, env.clock),
    steps: new StepCounter(),
    settings: {
      model: config.defaults.model,
      timeoutSeconds: config.defaults.timeoutSeconds,
      dangerouslySkipPermissions: config.defaults.dangerouslySkipPermissions,
      noWait: config.behavior.noWait,
      processCwd: config.paths.workingDirectory,
    },
  };

  try {
    const outcome = await new WorkflowScheduler(context).run(workflowId, {
      signal,
      debugDir: debugObserver?.debugDir ?? null,
    });
    switch (outcome.status) {
      case 'completed':
        return ExitCode.SUCCESS;
      case 'paused':
        return ExitCode.WORKFLOW_PAUSED;
      case 'interrupted':
        env.write(`Interrupted. Resume with: waypoint --resume ${workflowId}\n`);
        return ExitCode.INTERRUPTED;
    }
  } catch (error) {
    env.writeError(`Error: ${errorMessage(error)}\n`);
    return ExitCode.WORKFLOW_FAILED;
  } finally {
    consoleObserver.close();
    titleBar?.close();
    await debugObserver?.close();
  }
}
