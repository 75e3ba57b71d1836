/**
 * Workflow error taxonomy
 * Each class carries a `code` so failures can be classified without instanceof chains
 */

export type WorkflowErrorCode =
  | 'PARSE_ERROR'
  | 'POLICY_VIOLATION'
  | 'TARGET_RESOLUTION'
  | 'RATE_LIMIT'
  | 'STEP_TIMEOUT'
  | 'INVOCATION'
  | 'PROMPT_FILE'
  | 'SCRIPT'
  | 'DURABLE_STORAGE'
  | 'CONFIG';

/**
 * Extra data attached to an error for diagnostic reports
 */
export interface ErrorDetails {
  /** Raw backend output (stream objects or script stdout) */
  rawOutput?: unknown;
  /** Text extracted from the backend output */
  outputText?: string;
  /** Spend already incurred by the failed step, in USD */
  costUsd?: number;
}

export abstract class WorkflowError extends Error {
  abstract readonly code: WorkflowErrorCode;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Transition tag content is empty or unsafe, or the tag count is wrong */
export class ParseError extends WorkflowError {
  readonly code = 'PARSE_ERROR';
}

export class PolicyViolationError extends WorkflowError {
  readonly code = 'POLICY_VIOLATION';
}

/** State name not found, ambiguous, or only present for another platform */
export class TargetResolutionError extends WorkflowError {
  readonly code = 'TARGET_RESOLUTION';
}

/** The provider reported a usage limit; the agent pauses */
export class RateLimitError extends WorkflowError {
  readonly code = 'RATE_LIMIT';
}

export class StepTimeoutError extends WorkflowError {
  readonly code = 'STEP_TIMEOUT';
}

/** Backend invocation failed for any other reason */
export class InvocationError extends WorkflowError {
  readonly code = 'INVOCATION';
}

/** A prompt file is missing or its frontmatter is malformed */
export class PromptFileError extends WorkflowError {
  readonly code = 'PROMPT_FILE';
}

/** Any script failure; always fatal for the workflow */
export class ScriptError extends WorkflowError {
  readonly code = 'SCRIPT';
}

export class DurableStorageError extends WorkflowError {
  readonly code = 'DURABLE_STORAGE';
}

export class ConfigError extends WorkflowError {
  readonly code = 'CONFIG';
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
