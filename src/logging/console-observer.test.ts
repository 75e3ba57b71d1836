import { describe, it, expect } from 'vitest';
import { ConsoleObserver, truncate } from './console-observer';
import { Spinner, SpinnerFactory } from '../ui/spinner-service';
import { EventBus } from '../events/event-bus';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';

function setup(options: { quiet?: boolean; width?: number; spinners?: SpinnerFactory } = {}) {
  const bus = new EventBus(new BufferLogger(), new MockClock());
  const output: string[] = [];
  const observer = new ConsoleObserver(bus, { write: (text) => output.push(text), ...options });
  return { bus, output, observer };
}

class RecordingSpinners implements SpinnerFactory {
  readonly log: string[] = [];

  start(text: string): Spinner {
    const log = this.log;
    log.push(`start ${text}`);
    return {
      start: () => undefined,
      succeed: (done?: string) => log.push(`succeed ${done ?? ''}`),
      fail: () => undefined,
      setText: () => undefined,
      stop: () => log.push('stop'),
      isSpinning: true,
    };
  }
}

describe('truncate', () => {
  it('should keep short text and cut long text with an ellipsis', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghijkl', 10)).toBe('abcdefg...');
  });
});

describe('ConsoleObserver', () => {
  it('should render a prompt step from start to transition', () => {
    const { bus, output } = setup();

    bus.emit({ type: 'workflow_started', workflowId: 'wf1', scopeDir: '/flows/demo', debugDir: null });
    bus.emit({ type: 'state_started', agentId: 'main', stateName: 'START.md', stateType: 'prompt' });
    bus.emit({ type: 'tool_invocation', agentId: 'main', toolName: 'Read', detail: 'plan.md' });
    bus.emit({ type: 'progress_message', agentId: 'main', message: 'Looking around\nsecond line' });
    bus.emit({
      type: 'state_completed',
      agentId: 'main',
      stateName: 'START.md',
      costUsd: 0.25,
      totalCostUsd: 0.75,
      sessionId: 's1',
      durationMs: 10,
    });
    bus.emit({
      type: 'transition_occurred',
      agentId: 'main',
      fromState: 'START.md',
      toState: 'NEXT.md',
      transitionType: 'goto',
      metadata: {},
    });

    expect(output.join('')).toBe(
      'Workflow: wf1\n' +
        '[main] START.md\n' +
        '  ├─ Read: plan.md\n' +
        '  ├─ Looking around\n' +
        '  └─ Done ($0.2500, total: $0.7500)\n' +
        '  → NEXT.md (goto)\n'
    );
  });

  it('should close script blocks with the exit status only', () => {
    const { bus, output } = setup();

    bus.emit({ type: 'state_started', agentId: 'main', stateName: 'CHECK.sh', stateType: 'script' });
    bus.emit({
      type: 'script_output',
      agentId: 'main',
      stateName: 'CHECK.sh',
      stepNumber: 1,
      stdout: '',
      stderr: '',
      exitCode: 0,
      executionTimeMs: 42,
      env: {},
    });
    bus.emit({
      type: 'state_completed',
      agentId: 'main',
      stateName: 'CHECK.sh',
      costUsd: 0,
      totalCostUsd: 0,
      sessionId: null,
      durationMs: 42,
    });

    expect(output).toEqual(['[main] CHECK.sh (script)\n', '  └─ Script exited 0 (42ms)\n']);
  });

  it('should truncate progress text to the configured width', () => {
    const { bus, output } = setup({ width: 20 });

    bus.emit({ type: 'progress_message', agentId: 'main', message: 'a fairly long progress message' });

    expect(output).toEqual(['  ├─ a fairly lon...\n']);
  });

  it('should print the resume command when paused', () => {
    const { bus, output } = setup();

    bus.emit({ type: 'workflow_paused', workflowId: 'wf1', totalCostUsd: 1.5, pausedAgentCount: 2 });

    expect(output).toEqual([
      'Workflow paused (2 agent(s), total cost: $1.5000)\n',
      'Resume with: waypoint --resume wf1\n',
    ]);
  });

  it('should show only errors in quiet mode', () => {
    const { bus, output } = setup({ quiet: true });

    bus.emit({ type: 'workflow_completed', workflowId: 'wf1', totalCostUsd: 1 });
    bus.emit({
      type: 'error_occurred',
      agentId: 'main',
      errorType: 'STEP_TIMEOUT',
      errorMessage: 'Timed out',
      currentState: 'START.md',
      isRetryable: true,
      retryCount: 1,
      maxRetries: 3,
    });

    expect(output).toEqual(['[main] ! Timed out (retry 1/3)\n']);
  });

  it('should spin while waiting for a usage-limit reset', () => {
    const spinners = new RecordingSpinners();
    const { bus, output } = setup({ spinners });

    bus.emit({
      type: 'workflow_waiting',
      workflowId: 'wf1',
      totalCostUsd: 0,
      pausedAgentCount: 1,
      resetTime: new Date('2026-01-15T21:05:00.000Z'),
      waitSeconds: 2520,
      timeZone: 'America/Chicago',
    });
    bus.emit({ type: 'workflow_resuming', workflowId: 'wf1' });

    expect(spinners.log).toEqual([
      'start Waiting for usage limit reset at 3:05pm America/Chicago (42 minutes)...',
      'succeed Usage limit reset, resuming',
    ]);
    expect(output).toEqual([]);
  });

  it('should stop writing once closed', () => {
    const { bus, output, observer } = setup();

    observer.close();
    bus.emit({ type: 'workflow_completed', workflowId: 'wf1', totalCostUsd: 1 });

    expect(output).toEqual([]);
  });
});
