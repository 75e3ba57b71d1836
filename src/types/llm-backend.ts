/**
 * LLM backend interface
 * One invocation of an agentic CLI, consumed as a stream of JSON messages
 */

import { WorkflowError } from '../core/errors';
import { Result } from './result';

/**
 * One JSON object from the backend's output stream
 */
export type StreamMessage = Record<string, unknown>;

export interface InvocationRequest {
  prompt: string;
  /** Model alias; frontmatter values outside the known set pass through */
  model?: string;
  /** Session to resume, or to branch from when forkSession is set */
  sessionId: string | null;
  forkSession: boolean;
  /** Idle timeout; 0 disables it */
  timeoutSeconds: number;
  dangerouslySkipPermissions: boolean;
  cwd: string;
  signal?: AbortSignal;
}

export interface InvocationResponse {
  messages: StreamMessage[];
  /** Last session id reported by the stream */
  sessionId: string | null;
}

/**
 * Called for each parsed stream message as it arrives
 */
export type StreamMessageHandler = (message: StreamMessage, rawLine: string) => void;

export interface LlmBackend {
  readonly name: string;

  /**
   * Run one invocation. Fails with StepTimeoutError on idle timeout,
   * RateLimitError on a usage-limit result and InvocationError otherwise.
   */
  invoke(
    request: InvocationRequest,
    onMessage?: StreamMessageHandler
  ): Promise<Result<InvocationResponse, WorkflowError>>;

  isAvailable(): Promise<boolean>;
}
