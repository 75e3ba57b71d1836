/**
 * Workflow lifecycle events
 *
 * The scheduler and executors describe what happened through these records;
 * observers subscribe on the event bus and never feed back into control flow.
 */

import { StateUnitKind, TransitionTag } from '../types/workflow';
import { WorkflowErrorCode } from '../core/errors';

interface BaseEvent {
  /** ISO 8601 time the event was emitted */
  timestamp: string;
}

export interface WorkflowStartedEvent extends BaseEvent {
  type: 'workflow_started';
  workflowId: string;
  scopeDir: string;
  /** Present when the debug observer is active */
  debugDir: string | null;
}

export interface WorkflowCompletedEvent extends BaseEvent {
  type: 'workflow_completed';
  workflowId: string;
  totalCostUsd: number;
}

export interface WorkflowPausedEvent extends BaseEvent {
  type: 'workflow_paused';
  workflowId: string;
  totalCostUsd: number;
  pausedAgentCount: number;
}

export interface WorkflowWaitingEvent extends BaseEvent {
  type: 'workflow_waiting';
  workflowId: string;
  totalCostUsd: number;
  pausedAgentCount: number;
  /** Wall-clock time the wait ends, buffer included */
  resetTime: Date;
  waitSeconds: number;
  /** Zone named in the limit message */
  timeZone: string;
}

export interface WorkflowResumingEvent extends BaseEvent {
  type: 'workflow_resuming';
  workflowId: string;
}

export interface StateStartedEvent extends BaseEvent {
  type: 'state_started';
  agentId: string;
  stateName: string;
  stateType: StateUnitKind;
}

export interface StateCompletedEvent extends BaseEvent {
  type: 'state_completed';
  agentId: string;
  stateName: string;
  costUsd: number;
  totalCostUsd: number;
  sessionId: string | null;
  durationMs: number;
}

export interface TransitionOccurredEvent extends BaseEvent {
  type: 'transition_occurred';
  agentId: string;
  fromState: string;
  /** Null when the agent terminated */
  toState: string | null;
  transitionType: TransitionTag;
  metadata: Record<string, string | number>;
}

export interface AgentSpawnedEvent extends BaseEvent {
  type: 'agent_spawned';
  parentAgentId: string;
  newAgentId: string;
  initialState: string;
}

export interface AgentTerminatedEvent extends BaseEvent {
  type: 'agent_terminated';
  agentId: string;
  resultPayload: string;
}

export interface AgentPausedEvent extends BaseEvent {
  type: 'agent_paused';
  agentId: string;
  reason: string;
}

/** One raw line of backend stream output */
export interface StreamOutputEvent extends BaseEvent {
  type: 'stream_output';
  agentId: string;
  stepNumber: number;
  data: string;
}

export interface InvocationStartedEvent extends BaseEvent {
  type: 'invocation_started';
  agentId: string;
  stateName: string;
  sessionId: string | null;
  isFork: boolean;
  isReminder: boolean;
  reminderAttempt: number;
}

export interface ScriptOutputEvent extends BaseEvent {
  type: 'script_output';
  agentId: string;
  stateName: string;
  stepNumber: number;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  executionTimeMs: number;
  /** Only the WAYPOINT_* and fork variables handed to the script */
  env: Record<string, string>;
}

export interface ToolInvocationEvent extends BaseEvent {
  type: 'tool_invocation';
  agentId: string;
  toolName: string;
  detail: string;
}

export interface ProgressMessageEvent extends BaseEvent {
  type: 'progress_message';
  agentId: string;
  message: string;
}

export interface ErrorOccurredEvent extends BaseEvent {
  type: 'error_occurred';
  agentId: string;
  errorType: WorkflowErrorCode | 'UNEXPECTED';
  errorMessage: string;
  currentState: string;
  isRetryable: boolean;
  retryCount: number;
  maxRetries: number;
}

export type WorkflowEvent =
  | WorkflowStartedEvent
  | WorkflowCompletedEvent
  | WorkflowPausedEvent
  | WorkflowWaitingEvent
  | WorkflowResumingEvent
  | StateStartedEvent
  | StateCompletedEvent
  | TransitionOccurredEvent
  | AgentSpawnedEvent
  | AgentTerminatedEvent
  | AgentPausedEvent
  | StreamOutputEvent
  | InvocationStartedEvent
  | ScriptOutputEvent
  | ToolInvocationEvent
  | ProgressMessageEvent
  | ErrorOccurredEvent;

export type WorkflowEventType = WorkflowEvent['type'];

/** Lookup from event type to its record */
export type WorkflowEventMap = { [E in WorkflowEvent as E['type']]: E };

/**
 * Event payload without the timestamp, as callers build it
 */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type EventInput = DistributiveOmit<WorkflowEvent, 'timestamp'>;

export function isEventOfType<K extends WorkflowEventType>(
  event: WorkflowEvent,
  type: K
): event is WorkflowEventMap[K] {
  return event.type === type;
}
