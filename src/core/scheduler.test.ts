import { describe, it, expect, vi } from 'vitest';
import { WorkflowScheduler, resetPausedAgents } from './scheduler';
import { InvocationError, RateLimitError, StepTimeoutError } from './errors';
import { createInitialState } from '../io/state-store';
import { AgentState, WorkflowState } from '../types/workflow';
import { ERROR_DIR, SCOPE_DIR, TestHarness, createTestHarness } from '../../tests/utils/test-context';

function initialState(overrides: Partial<WorkflowState> = {}, initial = 'START.md'): WorkflowState {
  return {
    ...createInitialState({
      workflowId: 'wf1',
      scopeDir: SCOPE_DIR,
      initialState: initial,
      budgetUsd: 10,
      createdAt: '2026-01-15T18:00:00.000Z',
    }),
    ...overrides,
  };
}

function agent(id: string, state: string): AgentState {
  return { id, state, session: null, stack: [], status: 'active', retryCount: 0 };
}

async function seed(harness: TestHarness, state: WorkflowState): Promise<void> {
  const written = await harness.store.write(state);
  expect(written.ok).toBe(true);
}

describe('resetPausedAgents', () => {
  it('should clear pause markers and keep sessions', () => {
    const state = initialState();
    state.agents = [
      { ...agent('main', 'A.md'), status: 'paused', retryCount: 3, error: 'limit', pauseReason: 'timeout', session: 's1' },
      agent('main_b1', 'B.md'),
    ];

    expect(resetPausedAgents(state)).toEqual(['main']);
    expect(state.agents[0]).toEqual({ ...agent('main', 'A.md'), session: 's1' });
  });
});

describe('WorkflowScheduler', () => {
  it('should run a linear workflow to completion and delete its state', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin', 'NEXT.md': 'Finish' } });
    harness.backend
      .when(/Begin/, { text: '<goto>NEXT</goto>', costUsd: 0.5, sessionId: 's1' })
      .when(/Finish/, { text: '<result>done</result>', costUsd: 0.25 });
    await seed(harness, initialState());

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome).toEqual({ status: 'completed', workflowId: 'wf1', totalCostUsd: 0.75 });
    expect(await harness.store.exists('wf1')).toBe(false);
    expect(harness.backend.requests[1]).toMatchObject({ prompt: 'Finish', sessionId: 's1', forkSession: false });
    expect(harness.events.find((event) => event.type === 'agent_terminated')).toMatchObject({
      agentId: 'main',
      resultPayload: 'done',
    });
    expect(harness.events.filter((event) => event.type === 'transition_occurred')).toMatchObject([
      { fromState: 'START.md', toState: 'NEXT.md', transitionType: 'goto', metadata: { state_type: 'prompt' } },
      {
        fromState: 'NEXT.md',
        toState: null,
        transitionType: 'result',
        metadata: { result_payload: 'done', state_type: 'prompt' },
      },
    ]);
  });

  it('should branch a call from the caller session and return to it', async () => {
    const harness = createTestHarness({
      files: { 'START.md': 'Begin', 'CHILD.md': 'Child task', 'BACK.md': 'Got {{result}}' },
    });
    harness.backend
      .when(/Begin/, { text: '<call return="BACK">CHILD</call>', sessionId: 's1' })
      .when(/Child task/, { text: '<result>child out</result>', sessionId: 'c1' })
      .when(/Got/, { text: '<result>final</result>' });
    await seed(harness, initialState());

    await new WorkflowScheduler(harness.context).run('wf1');

    expect(harness.backend.requests.map(({ prompt, sessionId, forkSession }) => ({ prompt, sessionId, forkSession }))).toEqual([
      { prompt: 'Begin', sessionId: null, forkSession: false },
      { prompt: 'Child task', sessionId: 's1', forkSession: true },
      { prompt: 'Got child out', sessionId: 's1', forkSession: false },
    ]);
  });

  it('should give forked agents monotonic ids and one step at a time', async () => {
    const harness = createTestHarness({
      files: {
        'START.md': 'Plan',
        'SECOND.md': 'Second',
        'DONE.md': 'Done',
        'WORKER.md': 'Work on {{item}}',
      },
    });
    harness.backend
      .when(/Plan/, { text: '<fork next="SECOND" item="a">WORKER</fork>' })
      .when(/Second/, { text: '<fork next="DONE" item="b">WORKER</fork>' })
      .when(/Done/, { text: '<result>main done</result>' })
      .when(/Work on/, { text: '<result>worked</result>', delayMs: 5 });
    await seed(harness, initialState());

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome.status).toBe('completed');
    const spawned = harness.events.filter((event) => event.type === 'agent_spawned');
    expect(spawned).toMatchObject([
      { parentAgentId: 'main', newAgentId: 'main_worker1', initialState: 'WORKER.md' },
      { parentAgentId: 'main', newAgentId: 'main_worker2', initialState: 'WORKER.md' },
    ]);
    expect(harness.backend.requests).toHaveLength(5);
    expect(
      harness.backend.requests
        .map((request) => request.prompt)
        .filter((prompt) => prompt.startsWith('Work on'))
        .sort()
    ).toEqual(['Work on a', 'Work on b']);
  });

  it('should terminate instead of invoking once the budget is already spent', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' } });
    await seed(harness, initialState({ totalCostUsd: 2, budgetUsd: 1 }));

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome).toEqual({ status: 'completed', workflowId: 'wf1', totalCostUsd: 2 });
    expect(harness.backend.requests).toHaveLength(0);
    expect(harness.events.find((event) => event.type === 'agent_terminated')).toMatchObject({
      resultPayload: 'Workflow terminated: budget exceeded ($2.0000 > $1.0000)',
    });
  });

  it('should terminate an agent whose step pushed the shared total over budget', async () => {
    const harness = createTestHarness({ files: { 'ALPHA.md': 'Alpha', 'BETA.md': 'Beta', 'NEXT.md': 'Finish' } });
    harness.backend
      .when(/Alpha/, { text: '<goto>NEXT</goto>', costUsd: 0.6, delayMs: 10 })
      .when(/Beta/, { text: '<goto>NEXT</goto>', costUsd: 0.6, delayMs: 30 })
      .when(/Finish/, { text: '<result>done</result>' });
    const state = initialState({ budgetUsd: 1 }, 'ALPHA.md');
    state.agents.push(agent('main_beta1', 'BETA.md'));
    await seed(harness, state);

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome.status).toBe('completed');
    expect(outcome.totalCostUsd).toBeCloseTo(1.2);
    expect(
      harness.events.filter((event) => event.type === 'transition_occurred' && event.agentId === 'main_beta1')
    ).toMatchObject([{ fromState: 'BETA.md', toState: null, transitionType: 'result' }]);
    expect(
      harness.events.find((event) => event.type === 'agent_terminated' && event.agentId === 'main_beta1')
    ).toMatchObject({ resultPayload: 'Workflow terminated: budget exceeded ($1.2000 > $1.0000)' });
    expect(harness.backend.requests.map((request) => request.prompt).sort()).toEqual(['Alpha', 'Beta', 'Finish']);
    expect(harness.logger.hasEventType('budget_exceeded')).toBe(true);
  });

  it('should pause on a usage limit without waiting and resume on the next run', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' }, settings: { noWait: true } });
    harness.backend.enqueue(
      { error: new RateLimitError("You've hit your limit · resets 3pm (America/Chicago)") },
      { text: '<result>ok</result>', costUsd: 0.1 }
    );
    await seed(harness, initialState());
    const scheduler = new WorkflowScheduler(harness.context);

    const paused = await scheduler.run('wf1');

    expect(paused).toEqual({ status: 'paused', workflowId: 'wf1', totalCostUsd: 0, pausedAgentCount: 1 });
    const stored = await harness.store.read('wf1');
    expect(stored.ok && stored.value?.agents[0]).toMatchObject({
      status: 'paused',
      retryCount: 0,
      pauseReason: 'usage limit',
      error: "You've hit your limit · resets 3pm (America/Chicago)",
    });
    expect(harness.events.find((event) => event.type === 'agent_paused')).toMatchObject({
      agentId: 'main',
      reason: 'usage limit',
    });
    expect(harness.logger.hasEventType('diagnostic_written')).toBe(true);

    const resumed = await scheduler.run('wf1');

    expect(resumed).toEqual({ status: 'completed', workflowId: 'wf1', totalCostUsd: 0.1 });
  });

  it('should wait for the latest usage-limit reset and then resume', async () => {
    const harness = createTestHarness({ files: { 'ALPHA.md': 'Alpha', 'BETA.md': 'Beta' } });
    harness.backend
      .when(
        /Alpha/,
        { error: new RateLimitError("You've hit your limit · resets 3pm (America/Chicago)") },
        { text: '<result>a</result>' }
      )
      .when(
        /Beta/,
        { error: new RateLimitError("You've hit your limit · resets 5pm (America/Chicago)") },
        { text: '<result>b</result>' }
      );
    const state = initialState({}, 'ALPHA.md');
    state.agents.push(agent('main_beta1', 'BETA.md'));
    await seed(harness, state);

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome.status).toBe('completed');
    // 12:00 in Chicago; 5pm plus the five minute buffer is 23:05 UTC
    expect(harness.clock.getRequestedDelays()).toEqual([18_300_000]);
    expect(harness.events.find((event) => event.type === 'workflow_waiting')).toMatchObject({
      resetTime: new Date('2026-01-15T23:05:00.000Z'),
      waitSeconds: 18_300,
      timeZone: 'America/Chicago',
      pausedAgentCount: 2,
    });
    expect(harness.events.some((event) => event.type === 'workflow_resuming')).toBe(true);
    expect(harness.logger.getEventsMatching(/exceeds 5 hours/)).toHaveLength(1);
    expect(harness.backend.requests).toHaveLength(4);
  });

  it('should retry invocation failures and drop the agent when they persist', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' } });
    harness.backend.enqueue(
      { error: new InvocationError('connection reset') },
      { error: new InvocationError('connection reset') },
      { error: new InvocationError('connection reset') }
    );
    await seed(harness, initialState());

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome).toEqual({ status: 'completed', workflowId: 'wf1', totalCostUsd: 0 });
    expect(harness.backend.requests).toHaveLength(3);
    expect(harness.events.filter((event) => event.type === 'error_occurred')).toMatchObject([
      { errorType: 'INVOCATION', isRetryable: true, retryCount: 1, maxRetries: 3 },
      { errorType: 'INVOCATION', isRetryable: true, retryCount: 2, maxRetries: 3 },
      { errorType: 'INVOCATION', isRetryable: false, retryCount: 3, maxRetries: 3 },
    ]);
    expect(harness.logger.hasEventType('agent_failed')).toBe(true);
  });

  it('should pause an agent whose prompt keeps timing out', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' } });
    harness.backend.enqueue(
      { error: new StepTimeoutError('Step timeout: START.md produced no output for 5 seconds') },
      { error: new StepTimeoutError('Step timeout: START.md produced no output for 5 seconds') },
      { error: new StepTimeoutError('Step timeout: START.md produced no output for 5 seconds') }
    );
    await seed(harness, initialState());

    const outcome = await new WorkflowScheduler(harness.context).run('wf1');

    expect(outcome).toEqual({ status: 'paused', workflowId: 'wf1', totalCostUsd: 0, pausedAgentCount: 1 });
    expect(harness.backend.requests).toHaveLength(3);
    const stored = await harness.store.read('wf1');
    expect(stored.ok && stored.value?.agents[0]).toMatchObject({
      status: 'paused',
      retryCount: 3,
      pauseReason: 'timeout',
      error: 'Step timeout: START.md produced no output for 5 seconds',
    });
    expect(harness.events.filter((event) => event.type === 'error_occurred')).toMatchObject([
      { errorType: 'STEP_TIMEOUT', isRetryable: true, retryCount: 1 },
      { errorType: 'STEP_TIMEOUT', isRetryable: true, retryCount: 2 },
      { errorType: 'STEP_TIMEOUT', isRetryable: false, retryCount: 3 },
    ]);
    expect(harness.clock.getRequestedDelays()).toEqual([]);
  });

  it('should abort the workflow when its state file cannot be written', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin', 'NEXT.md': 'Finish' } });
    harness.backend.when(/Begin/, { text: '<goto>NEXT</goto>', costUsd: 0.5 });
    await seed(harness, initialState());
    harness.fs.failWritesMatching(/^\/repo\/\.waypoint\/state\//);

    const running = new WorkflowScheduler(harness.context).run('wf1');

    await expect(running).rejects.toMatchObject({ code: 'DURABLE_STORAGE' });
    await expect(running).rejects.toThrow(/^Could not write state file .*Simulated write failure/);
    expect(harness.backend.requests).toHaveLength(1);
    expect(harness.events.some((event) => event.type === 'workflow_completed')).toBe(false);
    const diagnostics = await harness.fs.list(ERROR_DIR);
    expect(diagnostics.ok && diagnostics.value).toEqual([expect.stringMatching(/^wf1_workflow_\d{8}_\d{6}\.txt$/)]);
  });

  it('should treat a script without a transition as fatal on the first attempt', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo' } });
    harness.runner.setCommandConfig('bash', { stdoutLines: ['nothing to report'] });
    await seed(harness, initialState({}, 'CHECK.sh'));

    await expect(new WorkflowScheduler(harness.context).run('wf1')).rejects.toThrow(
      "Script 'CHECK.sh' produced no transition tag in stdout"
    );

    expect(harness.runner.getCallHistory()).toHaveLength(1);
    expect(await harness.store.exists('wf1')).toBe(true);
    const diagnostics = await harness.fs.list(ERROR_DIR);
    expect(diagnostics.ok && diagnostics.value).toEqual([expect.stringMatching(/^wf1_main_\d{8}_\d{6}\.txt$/)]);
  });

  it('should cancel sibling steps when one agent fails fatally', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo', 'SLOW.md': 'Slow' } });
    harness.runner.setCommandConfig('bash', { exitCode: 1, stderrLines: ['broken'], simulatedDelayMs: 5 });
    harness.backend.when(/Slow/, { text: '<result>late</result>', delayMs: 60_000 });
    const state = initialState({}, 'CHECK.sh');
    state.agents.push(agent('main_slow1', 'SLOW.md'));
    await seed(harness, state);

    await expect(new WorkflowScheduler(harness.context).run('wf1')).rejects.toThrow(
      "Script 'CHECK.sh' failed with exit code 1. stderr: broken\n"
    );
    expect(harness.events.some((event) => event.type === 'agent_terminated')).toBe(false);
  });

  it('should stop on an external abort and keep the state file', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' } });
    harness.backend.enqueue({ text: '<result>late</result>', delayMs: 60_000 });
    await seed(harness, initialState());
    const controller = new AbortController();

    const running = new WorkflowScheduler(harness.context).run('wf1', { signal: controller.signal });
    await vi.waitFor(() => expect(harness.backend.requests).toHaveLength(1));
    controller.abort();

    expect(await running).toEqual({ status: 'interrupted', workflowId: 'wf1', totalCostUsd: 0 });
    expect(await harness.store.exists('wf1')).toBe(true);
  });

  it('should report an interrupt during a usage-limit wait as interrupted', async () => {
    const harness = createTestHarness({ files: { 'START.md': 'Begin' } });
    harness.backend.enqueue({ error: new RateLimitError("You've hit your limit · resets 3pm (America/Chicago)") });
    await seed(harness, initialState());
    const controller = new AbortController();
    harness.context.bus.on('workflow_waiting', () => controller.abort());

    const outcome = await new WorkflowScheduler(harness.context).run('wf1', { signal: controller.signal });

    expect(outcome).toEqual({ status: 'interrupted', workflowId: 'wf1', totalCostUsd: 0 });
    expect(harness.events.some((event) => event.type === 'workflow_paused')).toBe(false);
    const stored = await harness.store.read('wf1');
    expect(stored.ok && stored.value?.agents[0]).toMatchObject({ status: 'paused', pauseReason: 'usage limit' });
  });

  it('should fail when the workflow has no state file', async () => {
    const harness = createTestHarness();

    await expect(new WorkflowScheduler(harness.context).run('missing')).rejects.toThrow(
      "No state file for workflow 'missing' in /repo/.waypoint/state"
    );
  });
});
