/**
 * Workflow domain types
 * Durable workflow state, agents, frames and transitions
 */

/**
 * The six transition tags a step may emit
 */
export type TransitionTag = 'goto' | 'reset' | 'function' | 'call' | 'fork' | 'result';

export const TRANSITION_TAGS: readonly TransitionTag[] = [
  'goto',
  'reset',
  'function',
  'call',
  'fork',
  'result',
];

export function isTransitionTag(value: string): value is TransitionTag {
  return TRANSITION_TAGS.some((tag) => tag === value);
}

/**
 * A single declared next-action parsed from step output
 */
export interface Transition {
  tag: TransitionTag;
  /** Target state name; empty for result */
  target: string;
  attributes: Record<string, string>;
  /** Raw tag content for result, empty otherwise */
  payload: string;
}

/**
 * A saved (caller session, return state) pair
 */
export interface Frame {
  session: string | null;
  state: string;
}

export type AgentStatus = 'active' | 'paused' | 'failed';

/**
 * One independently scheduled sequence of state-unit executions
 */
export interface AgentState {
  id: string;
  /** Current state unit name (always carries an extension once resolved) */
  state: string;
  session: string | null;
  stack: Frame[];
  status: AgentStatus;
  retryCount: number;
  /** Absolute working directory override set by reset/fork `cd` */
  cwd?: string;
  /** Last error message; parsed for reset times when paused */
  error?: string;
  pauseReason?: string;

  // One-shot fields, cleared before each transition is applied
  pendingResult?: string;
  forkSessionId?: string;
  forkAttributes?: Record<string, string>;
}

/**
 * The complete durable record for one workflow
 */
export interface WorkflowState {
  schemaVersion: 1;
  workflowId: string;
  /** Directory holding the workflow's state units */
  scopeDir: string;
  agents: AgentState[];
  totalCostUsd: number;
  budgetUsd: number;
  /** Monotonic per-parent fork counters */
  forkCounters: Record<string, number>;
  createdAt: string;
}

/**
 * Kinds of state unit, decided once per step
 */
export type StateUnitKind = 'prompt' | 'script';

export interface ResolvedStateUnit {
  /** Concrete file name, e.g. CHECK.sh */
  name: string;
  kind: StateUnitKind;
}

/**
 * The executor's output contract
 */
export interface ExecutionResult {
  /** Fully resolved transition */
  transition: Transition;
  sessionId: string | null;
  costUsd: number;
}

/**
 * Return a copy of the agent without its one-shot fields
 */
export function clearTransientFields(agent: AgentState): AgentState {
  const { pendingResult: _result, forkSessionId: _fork, forkAttributes: _attrs, ...rest } = agent;
  return {
    ...rest,
    stack: rest.stack.map((frame) => ({ ...frame })),
  };
}

/**
 * Deep copy an agent record
 */
export function cloneAgent(agent: AgentState): AgentState {
  return {
    ...agent,
    stack: agent.stack.map((frame) => ({ ...frame })),
    forkAttributes: agent.forkAttributes ? { ...agent.forkAttributes } : undefined,
  };
}
