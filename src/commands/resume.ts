/**
 * Resume a stored workflow
 */

import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { StateStore } from '../io/state-store';
import { isArchiveScope, verifyArchiveHash } from '../io/workflow-scope';
import { CommandEnvironment } from './command-environment';
import { runWorkflow } from './run-workflow';

export async function resumeWorkflow(
  workflowId: string,
  config: EffectiveConfig,
  env: CommandEnvironment,
  signal?: AbortSignal
): Promise<ExitCode> {
  const store = new StateStore(env.fs, config.paths.stateDirectory);
  const state = await store.read(workflowId);
  if (!state.ok) {
    env.writeError(`Error: ${state.error.message}\n`);
    return ExitCode.GENERAL_ERROR;
  }
  if (state.value === null) {
    env.writeError(`Error: Workflow '${workflowId}' not found in ${store.stateDirectory}\n`);
    return ExitCode.NOT_FOUND;
  }

  const { scopeDir } = state.value;
  if (isArchiveScope(scopeDir)) {
    const verified = await verifyArchiveHash(env.fs, scopeDir);
    if (!verified.ok) {
      env.writeError(`Error: ${verified.error.message}\n`);
      return verified.error.code === 'NOT_FOUND' ? ExitCode.NOT_FOUND : ExitCode.INVALID_ARGS;
    }
  }
  return runWorkflow(workflowId, config, env, signal);
}
