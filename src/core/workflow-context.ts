/**
 * Collaborators for one workflow run, threaded explicitly through the
 * scheduler and executors
 */

import { FileSystem } from '../types/file-system';
import { LlmBackend } from '../types/llm-backend';
import { ProcessRunner } from '../types/process-runner';
import { Logger } from '../types/logger';
import { Clock } from '../types/clock';
import { EventBus } from '../events/event-bus';
import { StateStore } from '../io/state-store';
import { DiagnosticWriter } from '../logging/diagnostics';
import { Platform } from './state-resolver';

export interface WorkflowSettings {
  /** Model used when a state's policy names none */
  model?: string;
  /** Per-step timeout in seconds; 0 disables it */
  timeoutSeconds: number;
  dangerouslySkipPermissions: boolean;
  /** Exit paused instead of sleeping until a usage limit resets */
  noWait: boolean;
  /** Directory steps run in unless the agent has a `cd` override */
  processCwd: string;
}

/**
 * Per-agent step numbers for debug file names
 */
export class StepCounter {
  private readonly counters = new Map<string, number>();

  next(agentId: string): number {
    const value = (this.counters.get(agentId) ?? 0) + 1;
    this.counters.set(agentId, value);
    return value;
  }
}

export interface WorkflowContext {
  fs: FileSystem;
  store: StateStore;
  backend: LlmBackend;
  runner: ProcessRunner;
  bus: EventBus;
  logger: Logger;
  clock: Clock;
  platform: Platform;
  diagnostics: DiagnosticWriter;
  steps: StepCounter;
  settings: WorkflowSettings;
}
