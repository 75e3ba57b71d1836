/**
 * Console observer
 * Human-readable progress for the CLI, driven entirely by bus events
 */

import { EventBus } from '../events/event-bus';
import { WorkflowEvent } from '../events/events';
import { StateUnitKind } from '../types/workflow';
import { formatWaitMessage } from '../core/limit-wait';
import { Spinner, SpinnerFactory } from '../ui/spinner-service';

export const DEFAULT_CONSOLE_WIDTH = 80;

export interface ConsoleObserverOptions {
  /** Receives each output line, newline included */
  write?: (text: string) => void;
  /** Only errors are shown */
  quiet?: boolean;
  /** Columns available for truncated content */
  width?: number;
  spinners?: SpinnerFactory;
}

const BRANCH = '  ├─ ';
const END = '  └─ ';

/**
 * Cut text to a width, marking the cut with "..."
 */
export function truncate(text: string, width: number): string {
  if (text.length <= width) {
    return text;
  }
  return `${text.slice(0, Math.max(0, width - 3))}...`;
}

function usd(value: number): string {
  return `$${value.toFixed(4)}`;
}

export class ConsoleObserver {
  private readonly write: (text: string) => void;
  private readonly quiet: boolean;
  private readonly width: number;
  private readonly spinners: SpinnerFactory | undefined;
  private waiting: Spinner | null = null;
  private readonly stateTypes = new Map<string, StateUnitKind>();

  private readonly handler = (event: WorkflowEvent): void => {
    this.render(event);
  };

  constructor(
    private readonly bus: EventBus,
    options: ConsoleObserverOptions = {}
  ) {
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.quiet = options.quiet ?? false;
    this.width = options.width ?? DEFAULT_CONSOLE_WIDTH;
    this.spinners = options.spinners;
    bus.onAny(this.handler);
  }

  close(): void {
    this.waiting?.stop();
    this.waiting = null;
    this.bus.offAny(this.handler);
  }

  private line(text: string): void {
    this.write(`${text}\n`);
  }

  private render(event: WorkflowEvent): void {
    if (event.type === 'error_occurred') {
      const retry = event.isRetryable ? ` (retry ${event.retryCount}/${event.maxRetries})` : '';
      this.line(`[${event.agentId}] ! ${event.errorMessage}${retry}`);
      return;
    }
    if (this.quiet) {
      return;
    }

    switch (event.type) {
      case 'workflow_started':
        this.line(`Workflow: ${event.workflowId}`);
        if (event.debugDir) {
          this.line(`Debug output: ${event.debugDir}`);
        }
        return;

      case 'state_started':
        this.stateTypes.set(event.agentId, event.stateType);
        this.line(`[${event.agentId}] ${event.stateName}${event.stateType === 'script' ? ' (script)' : ''}`);
        return;

      case 'tool_invocation': {
        const label = event.detail ? `${event.toolName}: ${event.detail}` : event.toolName;
        this.line(`${BRANCH}${truncate(label, this.width - BRANCH.length)}`);
        return;
      }

      case 'progress_message': {
        const [first] = event.message.split('\n');
        this.line(`${BRANCH}${truncate(first, this.width - BRANCH.length)}`);
        return;
      }

      case 'script_output':
        this.line(
          event.exitCode === null
            ? `${END}Script stopped (${event.executionTimeMs}ms)`
            : `${END}Script exited ${event.exitCode} (${event.executionTimeMs}ms)`
        );
        return;

      case 'state_completed':
        // Script blocks are closed by their exit line
        if (this.stateTypes.get(event.agentId) !== 'script') {
          this.line(`${END}Done (${usd(event.costUsd)}, total: ${usd(event.totalCostUsd)})`);
        }
        return;

      case 'transition_occurred':
        if (event.toState !== null) {
          this.line(`  → ${event.toState} (${event.transitionType})`);
        }
        return;

      case 'agent_spawned':
        this.line(`  ⑂ ${event.newAgentId} started at ${event.initialState}`);
        return;

      case 'agent_terminated':
        this.line(`[${event.agentId}] ⇒ Result: "${truncate(event.resultPayload.trim(), this.width - 20)}"`);
        return;

      case 'agent_paused':
        this.line(`[${event.agentId}] paused (${event.reason})`);
        return;

      case 'workflow_waiting': {
        const text = formatWaitMessage(event.resetTime, event.waitSeconds, event.timeZone);
        if (this.spinners) {
          this.waiting = this.spinners.start(text);
        } else {
          this.line(text);
        }
        return;
      }

      case 'workflow_resuming':
        if (this.waiting) {
          this.waiting.succeed('Usage limit reset, resuming');
          this.waiting = null;
        } else {
          this.line('Usage limit reset, resuming');
        }
        return;

      case 'workflow_completed':
        this.line(`Workflow completed. Total cost: ${usd(event.totalCostUsd)}`);
        return;

      case 'workflow_paused':
        this.line(`Workflow paused (${event.pausedAgentCount} agent(s), total cost: ${usd(event.totalCostUsd)})`);
        this.line(`Resume with: waypoint --resume ${event.workflowId}`);
        return;

      case 'stream_output':
      case 'invocation_started':
        return;
    }
  }
}
