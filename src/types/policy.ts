/**
 * Policy types
 * Per-state allow-list of transition shapes, declared in prompt frontmatter
 */

import { TransitionTag } from './workflow';

/**
 * One allowed transition shape. Fields other than tag and target are
 * attribute constraints (return, next, or any fork attribute).
 */
export interface AllowedTransition {
  tag: TransitionTag;
  target?: string;
  attributes: Record<string, string>;
}

export interface Policy {
  allowedTransitions: AllowedTransition[];
  /** Model hint for Claude invocations of this state */
  model?: string;
}

/**
 * A prompt template together with its optional policy
 */
export interface LoadedPrompt {
  template: string;
  policy: Policy | null;
}
