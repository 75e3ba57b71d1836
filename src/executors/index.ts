/**
 * Executors module - one step executor per state-unit kind
 */

import { StateUnitKind } from '../types/workflow';
import { StepExecutor } from './executor';
import { PromptExecutor } from './prompt-executor';
import { ScriptExecutor } from './script-executor';

export type { StepExecutor, StepInput } from './executor';
export { budgetExceededTransition } from './executor';
export { PromptExecutor, MAX_REMINDER_ATTEMPTS } from './prompt-executor';
export { ScriptExecutor, buildScriptEnv, scriptCommand } from './script-executor';

export type ExecutorRegistry = Record<StateUnitKind, StepExecutor>;

export function createExecutors(): ExecutorRegistry {
  return {
    prompt: new PromptExecutor(),
    script: new ScriptExecutor(),
  };
}
