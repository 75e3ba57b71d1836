/**
 * Step executors
 *
 * One implementation per state-unit kind. Executors never touch the workflow
 * record or durable storage; they return a fully resolved transition.
 */

import { AgentState, ExecutionResult, ResolvedStateUnit, StateUnitKind, Transition } from '../types/workflow';
import { Result } from '../types/result';
import { WorkflowError } from '../core/errors';
import { WorkflowContext } from '../core/workflow-context';
import { WorkflowScope } from '../io/workflow-scope';

/**
 * Everything one step needs, copied out of the workflow record
 */
export interface StepInput {
  workflowId: string;
  /** Opened once per run from the workflow's scopeDir */
  scope: WorkflowScope;
  agent: AgentState;
  unit: ResolvedStateUnit;
  /** Workflow total before this step */
  totalCostUsd: number;
  budgetUsd: number;
  signal: AbortSignal;
}

export interface StepExecutor {
  readonly kind: StateUnitKind;
  execute(input: StepInput, context: WorkflowContext): Promise<Result<ExecutionResult, WorkflowError>>;
}

/**
 * The result transition that replaces a step once the budget is spent
 */
export function budgetExceededTransition(totalCostUsd: number, budgetUsd: number): Transition {
  return {
    tag: 'result',
    target: '',
    attributes: {},
    payload: `Workflow terminated: budget exceeded ($${totalCostUsd.toFixed(4)} > $${budgetUsd.toFixed(4)})`,
  };
}
