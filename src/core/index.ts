/**
 * Core module - transition engine and scheduler
 * This module must not import from ui/ or spawn processes directly.
 */

// Error taxonomy
export {
  WorkflowError,
  ParseError,
  PolicyViolationError,
  TargetResolutionError,
  RateLimitError,
  StepTimeoutError,
  InvocationError,
  PromptFileError,
  ScriptError,
  DurableStorageError,
  ConfigError,
  isWorkflowError,
  errorMessage,
} from './errors';
export type { WorkflowErrorCode, ErrorDetails } from './errors';

// Transition tags and policies
export { parseTransitions, validateSingle, formatTransition } from './transition-parser';
export {
  parseFrontmatter,
  validateTransitionPolicy,
  shouldUseReminderPrompt,
  getImplicitTransition,
  generateReminderPrompt,
} from './policy';
export { loadPrompt, renderPrompt } from './prompt-loader';

// State resolution and transitions
export { resolveState, resolveTransitionTargets, stateUnitKind } from './state-resolver';
export type { Platform } from './state-resolver';
export { applyTransition, forkChildId, validateRequiredAttributes } from './transitions';
export type { TransitionContext, TransitionOutcome } from './transitions';

// Failure handling
export { MAX_RETRIES, classifyFailure } from './outcome';
export type { StepOutcome, PauseReason } from './outcome';
export { planLimitWait, formatWaitMessage, LONG_WAIT_THRESHOLD_HOURS } from './limit-wait';
export type { WaitPlan } from './limit-wait';

// Scheduling
export { StepCounter } from './workflow-context';
export type { WorkflowContext, WorkflowSettings } from './workflow-context';
export { WorkflowScheduler, resetPausedAgents } from './scheduler';
export type { WorkflowOutcome, RunOptions } from './scheduler';
