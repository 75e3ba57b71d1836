/**
 * Debug observer
 *
 * Mirrors raw step output into a per-run debug directory:
 * - {agent}_{state}_{NNN}.jsonl        backend stream lines
 * - {agent}_{state}_{NNN}.stdout.txt   script stdout
 * - {agent}_{state}_{NNN}.stderr.txt   script stderr
 * - {agent}_{state}_{NNN}.meta.json    script exit code, timing and env
 * - transitions.log                    one block per transition
 *
 * Bus handlers are synchronous, so writes are chained and drained by close().
 */

import { join } from 'path';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Result } from '../types/result';
import { EventBus } from '../events/event-bus';
import {
  ScriptOutputEvent,
  StateStartedEvent,
  StreamOutputEvent,
  TransitionOccurredEvent,
} from '../events/events';
import { stripStateExtension } from '../core/state-resolver';
import { compactTimestamp } from './diagnostics';

/**
 * Directory for one run: {debugRoot}/{workflowId}_{YYYYMMDD_HHMMSS}
 */
export function debugDirectoryFor(debugRoot: string, workflowId: string, now: Date): string {
  return join(debugRoot, `${workflowId}_${compactTimestamp(now)}`);
}

function stepFileBase(agentId: string, stateName: string, stepNumber: number): string {
  return `${agentId}_${stripStateExtension(stateName)}_${String(stepNumber).padStart(3, '0')}`;
}

/**
 * Render one transitions.log block, blank line included
 */
export function formatTransitionLogEntry(event: TransitionOccurredEvent): string {
  const head = event.toState
    ? `${event.timestamp} [${event.agentId}] ${event.fromState} -> ${event.toState} (${event.transitionType})`
    : `${event.timestamp} [${event.agentId}] ${event.fromState} -> (result, terminated)`;
  const metadata = Object.entries(event.metadata).map(([key, value]) => `  ${key}: ${value}`);
  return [head, ...metadata, '', ''].join('\n');
}

export class DebugObserver {
  private readonly agentStates = new Map<string, string>();
  private pending: Promise<void> = Promise.resolve();

  private readonly onStateStarted = (event: StateStartedEvent): void => {
    this.agentStates.set(event.agentId, event.stateName);
  };

  private readonly onStreamOutput = (event: StreamOutputEvent): void => {
    const stateName = this.agentStates.get(event.agentId) ?? 'unknown';
    const path = join(this.debugDir, `${stepFileBase(event.agentId, stateName, event.stepNumber)}.jsonl`);
    this.enqueue(path, () => this.fs.appendFile(path, `${event.data}\n`));
  };

  private readonly onScriptOutput = (event: ScriptOutputEvent): void => {
    const base = join(this.debugDir, stepFileBase(event.agentId, event.stateName, event.stepNumber));
    const meta = {
      exit_code: event.exitCode,
      execution_time_ms: event.executionTimeMs,
      env_vars: event.env,
    };
    this.enqueue(`${base}.stdout.txt`, () => this.fs.writeFile(`${base}.stdout.txt`, event.stdout));
    this.enqueue(`${base}.stderr.txt`, () => this.fs.writeFile(`${base}.stderr.txt`, event.stderr));
    this.enqueue(`${base}.meta.json`, () =>
      this.fs.writeFile(`${base}.meta.json`, JSON.stringify(meta, null, 2))
    );
  };

  private readonly onTransition = (event: TransitionOccurredEvent): void => {
    const path = join(this.debugDir, 'transitions.log');
    this.enqueue(path, () => this.fs.appendFile(path, formatTransitionLogEntry(event)));
  };

  constructor(
    private readonly fs: FileSystem,
    private readonly bus: EventBus,
    readonly debugDir: string,
    private readonly logger: Logger
  ) {
    this.enqueue(debugDir, () => this.fs.mkdir(debugDir, true));
    bus.on('state_started', this.onStateStarted);
    bus.on('stream_output', this.onStreamOutput);
    bus.on('script_output', this.onScriptOutput);
    bus.on('transition_occurred', this.onTransition);
  }

  /**
   * Unsubscribe and wait for queued writes
   */
  async close(): Promise<void> {
    this.bus.off('state_started', this.onStateStarted);
    this.bus.off('stream_output', this.onStreamOutput);
    this.bus.off('script_output', this.onScriptOutput);
    this.bus.off('transition_occurred', this.onTransition);
    await this.pending;
  }

  private enqueue(path: string, write: () => Promise<Result<void, { message: string }>>): void {
    this.pending = this.pending.then(async () => {
      const result = await write();
      if (!result.ok) {
        this.logger.warn(`Failed to write debug file ${path}: ${result.error.message}`);
      }
    });
  }
}
