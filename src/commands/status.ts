/**
 * Read-only commands over the state directory: --status and --list
 */

import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { WorkflowState } from '../types/workflow';
import { StateStore } from '../io/state-store';
import { CommandEnvironment } from './command-environment';

export function formatWorkflowStatus(state: WorkflowState): string {
  const lines = [
    `Workflow: ${state.workflowId}`,
    `Scope:    ${state.scopeDir}`,
    `Cost:     $${state.totalCostUsd.toFixed(4)} of $${state.budgetUsd.toFixed(4)} budget`,
    `Agents:   ${state.agents.length}`,
  ];
  for (const agent of state.agents) {
    const reason = agent.pauseReason ? ` - ${agent.pauseReason}` : '';
    lines.push(`  ${agent.id}: ${agent.state} (${agent.status}, stack depth ${agent.stack.length})${reason}`);
  }
  return lines.join('\n') + '\n';
}

export async function showStatus(
  workflowId: string,
  config: EffectiveConfig,
  env: CommandEnvironment
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
  env.write(formatWorkflowStatus(state.value));
  return ExitCode.SUCCESS;
}

export async function listWorkflows(config: EffectiveConfig, env: CommandEnvironment): Promise<ExitCode> {
  const store = new StateStore(env.fs, config.paths.stateDirectory);
  const ids = await store.list();
  if (!ids.ok) {
    env.writeError(`Error: ${ids.error.message}\n`);
    return ExitCode.GENERAL_ERROR;
  }
  env.write(ids.value.length === 0 ? 'No workflows found.\n' : ids.value.map((id) => `${id}\n`).join(''));
  return ExitCode.SUCCESS;
}
