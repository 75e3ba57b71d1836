/**
 * Failure classification
 *
 * Maps a failed step onto what the scheduler does with the agent.
 */

import { WorkflowError } from './errors';

/** Attempts per agent before a retryable failure stops retrying */
export const MAX_RETRIES = 3;

export type PauseReason = 'usage limit' | 'timeout';

export type StepOutcome =
  | { kind: 'retry'; error: WorkflowError; retryCount: number }
  | { kind: 'pause'; error: WorkflowError; retryCount: number; reason: PauseReason }
  | { kind: 'fail'; error: WorkflowError; retryCount: number }
  | { kind: 'fatal'; error: WorkflowError };

/**
 * Decide the outcome of a failed step given the agent's retry count before it
 */
export function classifyFailure(error: WorkflowError, previousRetries: number): StepOutcome {
  switch (error.code) {
    case 'RATE_LIMIT':
      return { kind: 'pause', error, retryCount: previousRetries, reason: 'usage limit' };

    case 'STEP_TIMEOUT': {
      const retryCount = previousRetries + 1;
      return retryCount >= MAX_RETRIES
        ? { kind: 'pause', error, retryCount, reason: 'timeout' }
        : { kind: 'retry', error, retryCount };
    }

    case 'INVOCATION':
    case 'PROMPT_FILE': {
      const retryCount = previousRetries + 1;
      return retryCount >= MAX_RETRIES
        ? { kind: 'fail', error, retryCount }
        : { kind: 'retry', error, retryCount };
    }

    // Scripts, storage, and transitions that stayed invalid after reminders
    case 'SCRIPT':
    case 'DURABLE_STORAGE':
    case 'PARSE_ERROR':
    case 'POLICY_VIOLATION':
    case 'TARGET_RESOLUTION':
    case 'CONFIG':
      return { kind: 'fatal', error };
  }
}

