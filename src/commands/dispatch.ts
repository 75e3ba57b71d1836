/**
 * Route parsed arguments to the command they name
 */

import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { ParsedArgs } from '../cli/types';
import { CommandEnvironment } from './command-environment';
import { startWorkflow } from './start';
import { resumeWorkflow } from './resume';
import { showStatus, listWorkflows } from './status';
import { recoverWorkflows } from './recover';

/**
 * Run a command that needs the resolved configuration. help, version and
 * init-config are handled before configuration is loaded.
 */
export async function dispatchCommand(
  args: ParsedArgs,
  config: EffectiveConfig,
  env: CommandEnvironment,
  signal?: AbortSignal
): Promise<ExitCode> {
  switch (args.command) {
    case 'start':
      if (args.file === null) {
        env.writeError('Error: No state file given\n');
        return ExitCode.INVALID_ARGS;
      }
      return startWorkflow(
        { file: args.file, workflowId: args.workflowId, input: args.input, noRun: args.noRun },
        config,
        env,
        signal
      );
    case 'resume':
    case 'status':
      if (args.workflowId === null) {
        env.writeError(`Error: --${args.command} requires a workflow ID\n`);
        return ExitCode.INVALID_ARGS;
      }
      return args.command === 'resume'
        ? resumeWorkflow(args.workflowId, config, env, signal)
        : showStatus(args.workflowId, config, env);
    case 'list':
      return listWorkflows(config, env);
    case 'recover':
      return recoverWorkflows(config, env, signal);
    case 'init-config':
    case 'help':
    case 'version':
      env.writeError(`Error: '${args.command}' does not run against a workflow\n`);
      return ExitCode.INVALID_ARGS;
  }
}
