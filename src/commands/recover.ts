/**
 * --recover: find workflows left behind by an interrupted or paused run
 */

import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { Result, ok } from '../types/result';
import { DurableStorageError } from '../core/errors';
import { StateStore } from '../io/state-store';
import { CommandEnvironment } from './command-environment';
import { resumeWorkflow } from './resume';

/** Picker value meaning "resume nothing" */
const NO_SELECTION = '';

export interface RecoverableWorkflow {
  workflowId: string;
  /** One-line description, or why the record could not be read */
  summary: string;
}

export async function findRecoverableWorkflows(
  store: StateStore
): Promise<Result<RecoverableWorkflow[], DurableStorageError>> {
  const ids = await store.list();
  if (!ids.ok) {
    return ids;
  }

  const found: RecoverableWorkflow[] = [];
  for (const workflowId of ids.value) {
    const state = await store.read(workflowId);
    if (!state.ok) {
      found.push({ workflowId, summary: `unreadable: ${state.error.message}` });
      continue;
    }
    if (state.value === null) {
      continue;
    }
    const paused = state.value.agents.filter((agent) => agent.status === 'paused').length;
    found.push({
      workflowId,
      summary:
        `${state.value.agents.length} agent(s), ${paused} paused, ` +
        `total cost $${state.value.totalCostUsd.toFixed(4)}`,
    });
  }
  return ok(found);
}

export async function recoverWorkflows(
  config: EffectiveConfig,
  env: CommandEnvironment,
  signal?: AbortSignal
): Promise<ExitCode> {
  const store = new StateStore(env.fs, config.paths.stateDirectory);
  const found = await findRecoverableWorkflows(store);
  if (!found.ok) {
    env.writeError(`Error: ${found.error.message}\n`);
    return ExitCode.GENERAL_ERROR;
  }
  const workflows = found.value;

  if (workflows.length === 0) {
    env.write('No interrupted or paused workflows.\n');
    return ExitCode.SUCCESS;
  }

  if (env.prompter?.isInteractive()) {
    const picked = await env.prompter.select({
      message: 'Resume a workflow?',
      choices: [
        ...workflows.map((workflow) => ({
          name: workflow.workflowId,
          value: workflow.workflowId,
          description: workflow.summary,
        })),
        { name: 'Do nothing', value: NO_SELECTION },
      ],
      default: NO_SELECTION,
    });
    if (!picked.ok) {
      if (picked.error.code === 'CANCELLED') {
        return ExitCode.INTERRUPTED;
      }
      env.writeError(`Error: ${picked.error.message}\n`);
      return ExitCode.GENERAL_ERROR;
    }
    if (picked.value === NO_SELECTION) {
      return ExitCode.SUCCESS;
    }
    return resumeWorkflow(picked.value, config, env, signal);
  }

  const lines = ['Workflows that can be resumed:'];
  for (const workflow of workflows) {
    lines.push(`  ${workflow.workflowId}: ${workflow.summary}`);
    lines.push(`    waypoint --resume ${workflow.workflowId}`);
  }
  env.write(lines.join('\n') + '\n');
  return ExitCode.SUCCESS;
}
