/**
 * Workflow scheduler
 *
 * Keeps exactly one in-flight step per live agent, applies completions in the
 * order they finish, and writes a full snapshot of the workflow after every
 * batch. The in-memory WorkflowState is only touched here, between awaits.
 */

import {
  AgentState,
  ExecutionResult,
  StateUnitKind,
  WorkflowState,
  cloneAgent,
} from '../types/workflow';
import { Logger } from '../types/logger';
import {
  DurableStorageError,
  TargetResolutionError,
  WorkflowError,
  errorMessage,
  isWorkflowError,
} from './errors';
import { MAX_RETRIES, StepOutcome, classifyFailure } from './outcome';
import { applyTransition } from './transitions';
import { resolveState, stateUnitKind } from './state-resolver';
import { LONG_WAIT_THRESHOLD_HOURS, planLimitWait } from './limit-wait';
import { WorkflowContext } from './workflow-context';
import { ExecutorRegistry, budgetExceededTransition, createExecutors } from '../executors';
import { WorkflowScope, openScope } from '../io/workflow-scope';

export type WorkflowOutcome =
  | { status: 'completed'; workflowId: string; totalCostUsd: number }
  | { status: 'paused'; workflowId: string; totalCostUsd: number; pausedAgentCount: number }
  | { status: 'interrupted'; workflowId: string; totalCostUsd: number };

export interface RunOptions {
  /** Aborting stops in-flight steps and leaves the last snapshot in place */
  signal?: AbortSignal;
  /** Reported in workflow_started when a debug observer is attached */
  debugDir?: string | null;
}

type StepReport =
  | { agentId: string; kind: 'success'; stateType: StateUnitKind; result: ExecutionResult }
  | { agentId: string; kind: 'failure'; error: WorkflowError }
  | { agentId: string; kind: 'crash'; error: unknown };

/**
 * Raised out of run() once siblings are cancelled; carries the original error
 */
class WorkflowAbort {
  constructor(
    readonly error: unknown,
    readonly agent: AgentState | null
  ) {}
}

/**
 * Clear pause markers so paused agents run again. Sessions are kept for resume.
 */
export function resetPausedAgents(state: WorkflowState): string[] {
  const reset: string[] = [];
  for (const agent of state.agents) {
    if (agent.status === 'paused') {
      agent.status = 'active';
      agent.retryCount = 0;
      delete agent.error;
      delete agent.pauseReason;
      reset.push(agent.id);
    }
  }
  return reset;
}

function abortableDelay(context: WorkflowContext, ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    void context.clock.delay(ms).then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}

export class WorkflowScheduler {
  private readonly executors: ExecutorRegistry;

  constructor(
    private readonly context: WorkflowContext,
    executors?: ExecutorRegistry
  ) {
    this.executors = executors ?? createExecutors();
  }

  /**
   * Run a stored workflow until it completes, pauses or is interrupted.
   * Fatal step errors and unexpected exceptions are rethrown after every
   * other in-flight step has been cancelled and awaited.
   */
  async run(workflowId: string, options: RunOptions = {}): Promise<WorkflowOutcome> {
    const { store, bus } = this.context;
    const log = this.context.logger.child({ workflowId });

    const loaded = await store.read(workflowId);
    if (!loaded.ok) {
      throw loaded.error;
    }
    if (!loaded.value) {
      throw new DurableStorageError(`No state file for workflow '${workflowId}' in ${store.stateDirectory}`);
    }
    const state = loaded.value;

    for (const agentId of resetPausedAgents(state)) {
      log.info(`Reset paused agent ${agentId} for resume`, { agentId });
    }

    const scope = await openScope(this.context.fs, state.scopeDir);
    if (!scope.ok) {
      throw new TargetResolutionError(scope.error.message);
    }

    bus.emit({
      type: 'workflow_started',
      workflowId,
      scopeDir: state.scopeDir,
      debugDir: options.debugDir ?? null,
    });
    log.event('workflow_started', `Starting workflow in ${state.scopeDir}`, {
      agents: state.agents.map((agent) => agent.id).join(', '),
    });

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    const tasks = new Map<string, Promise<StepReport>>();
    const finished = new Map<string, StepReport>();

    try {
      for (;;) {
        if (options.signal?.aborted) {
          await Promise.all(tasks.values());
          log.warn('Workflow interrupted; state file left in place');
          return { status: 'interrupted', workflowId, totalCostUsd: state.totalCostUsd };
        }

        if (state.agents.length === 0) {
          const deleted = await store.delete(workflowId);
          if (!deleted.ok) {
            throw deleted.error;
          }
          bus.emit({ type: 'workflow_completed', workflowId, totalCostUsd: state.totalCostUsd });
          log.event('workflow_completed', `Workflow completed. Total cost: $${state.totalCostUsd.toFixed(4)}`);
          return { status: 'completed', workflowId, totalCostUsd: state.totalCostUsd };
        }

        const runnable = state.agents.filter((agent) => agent.status !== 'paused');
        if (runnable.length === 0) {
          if (await this.waitForLimitReset(state, controller.signal, log)) {
            continue;
          }
          if (options.signal?.aborted) {
            continue;
          }
          await this.persist(state, log);
          bus.emit({
            type: 'workflow_paused',
            workflowId,
            totalCostUsd: state.totalCostUsd,
            pausedAgentCount: state.agents.length,
          });
          log.event('workflow_paused', `Workflow paused with ${state.agents.length} paused agent(s)`);
          return {
            status: 'paused',
            workflowId,
            totalCostUsd: state.totalCostUsd,
            pausedAgentCount: state.agents.length,
          };
        }

        for (const agent of runnable) {
          if (!tasks.has(agent.id)) {
            const task = this.runStep(state, agent, scope.value, controller.signal).then((report) => {
              finished.set(report.agentId, report);
              return report;
            });
            tasks.set(agent.id, task);
          }
        }

        await Promise.race(tasks.values());

        if (options.signal?.aborted) {
          continue;
        }

        for (const [agentId, report] of [...finished]) {
          finished.delete(agentId);
          tasks.delete(agentId);
          await this.handleReport(state, report, log);
        }

        await this.persist(state, log);
      }
    } catch (caught) {
      const abort = caught instanceof WorkflowAbort ? caught : new WorkflowAbort(caught, null);
      controller.abort();
      await Promise.all(tasks.values());
      if (!abort.agent) {
        await this.writeDiagnostic(state, null, abort.error);
      }
      throw abort.error;
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Execute one step for a copy of the agent. Never rejects.
   */
  private async runStep(
    state: WorkflowState,
    agent: AgentState,
    scope: WorkflowScope,
    signal: AbortSignal
  ): Promise<StepReport> {
    const snapshot = cloneAgent(agent);
    const { context } = this;

    try {
      if (state.totalCostUsd > state.budgetUsd) {
        context.logger.event(
          'budget_exceeded',
          `Budget already exceeded before ${snapshot.state}; terminating ${snapshot.id}`,
          { workflowId: state.workflowId, agentId: snapshot.id }
        );
        return {
          agentId: snapshot.id,
          kind: 'success',
          stateType: stateUnitKind(snapshot.state) ?? 'prompt',
          result: {
            transition: budgetExceededTransition(state.totalCostUsd, state.budgetUsd),
            sessionId: snapshot.session,
            costUsd: 0,
          },
        };
      }

      const unit = await resolveState(scope, snapshot.state, context.platform);
      if (!unit.ok) {
        return { agentId: snapshot.id, kind: 'failure', error: unit.error };
      }

      const result = await this.executors[unit.value.kind].execute(
        {
          workflowId: state.workflowId,
          scope,
          agent: snapshot,
          unit: unit.value,
          totalCostUsd: state.totalCostUsd,
          budgetUsd: state.budgetUsd,
          signal,
        },
        context
      );
      return result.ok
        ? { agentId: snapshot.id, kind: 'success', stateType: unit.value.kind, result: result.value }
        : { agentId: snapshot.id, kind: 'failure', error: result.error };
    } catch (error) {
      return { agentId: snapshot.id, kind: 'crash', error };
    }
  }

  private async handleReport(state: WorkflowState, report: StepReport, log: Logger): Promise<void> {
    const index = state.agents.findIndex((agent) => agent.id === report.agentId);
    const agent = state.agents[index];
    if (!agent) {
      throw new Error(`Completed step for unknown agent '${report.agentId}'`);
    }
    const agentLog = log.child({ agentId: agent.id, stateName: agent.state });

    switch (report.kind) {
      case 'success':
        this.applyResult(state, index, report.result, report.stateType, agentLog);
        return;

      case 'failure':
        state.totalCostUsd += report.error.details.costUsd ?? 0;
        await this.applyFailure(state, index, classifyFailure(report.error, agent.retryCount), agentLog);
        return;

      case 'crash':
        this.emitError(agent, report.error, false);
        agentLog.error(`Unexpected error: ${errorMessage(report.error)}`);
        await this.writeDiagnostic(state, agent, report.error);
        throw new WorkflowAbort(report.error, agent);
    }
  }

  private applyResult(
    state: WorkflowState,
    index: number,
    result: ExecutionResult,
    stateType: StateUnitKind,
    log: Logger
  ): void {
    const { bus } = this.context;
    const current = state.agents[index];
    state.totalCostUsd += result.costUsd;

    // Agents running alongside this step may have spent the budget meanwhile
    let { transition } = result;
    if (transition.tag !== 'result' && state.totalCostUsd > state.budgetUsd) {
      log.event(
        'budget_exceeded',
        `Budget exceeded: $${state.totalCostUsd.toFixed(4)} > $${state.budgetUsd.toFixed(4)}. ` +
          `Terminating ${current.id} instead of <${transition.tag}> ${transition.target}.`
      );
      transition = budgetExceededTransition(state.totalCostUsd, state.budgetUsd);
    }

    const caller: AgentState = { ...current, session: result.sessionId ?? current.session };
    const applied = applyTransition(caller, transition, {
      forkCounters: state.forkCounters,
      processCwd: this.context.settings.processCwd,
    });
    if (!applied.ok) {
      throw applied.error;
    }
    const outcome = applied.value;
    for (const warning of outcome.warnings) {
      log.warn(warning);
    }
    log.event('transition_applied', outcome.description, { tag: transition.tag });

    const settle = (agent: AgentState): AgentState => {
      const { error: _error, pauseReason: _reason, ...rest } = agent;
      return { ...rest, status: 'active', retryCount: 0 };
    };

    switch (outcome.kind) {
      case 'advance':
        state.agents[index] = settle(outcome.agent);
        bus.emit({
          type: 'transition_occurred',
          agentId: current.id,
          fromState: current.state,
          toState: outcome.agent.state,
          transitionType: transition.tag,
          metadata: { state_type: stateType },
        });
        return;

      case 'spawn':
        state.agents[index] = settle(outcome.agent);
        state.agents.push(outcome.child);
        state.forkCounters = outcome.forkCounters;
        bus.emit({
          type: 'transition_occurred',
          agentId: current.id,
          fromState: current.state,
          toState: outcome.agent.state,
          transitionType: transition.tag,
          metadata: { spawned_agent_id: outcome.child.id, state_type: stateType },
        });
        bus.emit({
          type: 'agent_spawned',
          parentAgentId: current.id,
          newAgentId: outcome.child.id,
          initialState: outcome.child.state,
        });
        log.event('agent_spawned', `Spawned ${outcome.child.id} at ${outcome.child.state}`);
        return;

      case 'terminate':
        state.agents.splice(index, 1);
        bus.emit({
          type: 'transition_occurred',
          agentId: current.id,
          fromState: current.state,
          toState: null,
          transitionType: transition.tag,
          metadata: { result_payload: outcome.payload, state_type: stateType },
        });
        bus.emit({ type: 'agent_terminated', agentId: current.id, resultPayload: outcome.payload });
        log.event('agent_terminated', `Agent ${current.id} terminated`);
        return;
    }
  }

  private async applyFailure(
    state: WorkflowState,
    index: number,
    outcome: StepOutcome,
    log: Logger
  ): Promise<void> {
    const agent = state.agents[index];
    const { error } = outcome;

    switch (outcome.kind) {
      case 'retry':
        agent.retryCount = outcome.retryCount;
        agent.error = error.message;
        this.emitError(agent, error, true);
        log.warn(`Step failed (attempt ${outcome.retryCount}/${MAX_RETRIES}), retrying: ${error.message}`);
        return;

      case 'pause':
        agent.status = 'paused';
        agent.retryCount = outcome.retryCount;
        agent.error = error.message;
        agent.pauseReason = outcome.reason;
        this.emitError(agent, error, false);
        this.context.bus.emit({ type: 'agent_paused', agentId: agent.id, reason: outcome.reason });
        log.event('agent_paused', `Agent paused (${outcome.reason}): ${error.message}`);
        await this.writeDiagnostic(state, agent, error);
        return;

      case 'fail':
        agent.retryCount = outcome.retryCount;
        this.emitError(agent, error, false);
        log.event('agent_failed', `Agent failed after ${outcome.retryCount} attempts: ${error.message}`);
        await this.writeDiagnostic(state, agent, error);
        state.agents.splice(index, 1);
        return;

      case 'fatal':
        this.emitError(agent, error, false);
        log.error(`Fatal error: ${error.message}`);
        await this.writeDiagnostic(state, agent, error);
        throw new WorkflowAbort(error, agent);
    }
  }

  private emitError(agent: AgentState, error: unknown, isRetryable: boolean): void {
    this.context.bus.emit({
      type: 'error_occurred',
      agentId: agent.id,
      errorType: isWorkflowError(error) ? error.code : 'UNEXPECTED',
      errorMessage: errorMessage(error),
      currentState: agent.state,
      isRetryable,
      retryCount: agent.retryCount,
      maxRetries: MAX_RETRIES,
    });
  }

  /**
   * Sleep until the latest stated reset when every paused agent hit a usage
   * limit. Returns false when the workflow should exit paused instead.
   */
  private async waitForLimitReset(state: WorkflowState, signal: AbortSignal, log: Logger): Promise<boolean> {
    const { settings, clock, bus } = this.context;
    if (settings.noWait) {
      return false;
    }

    const plan = planLimitWait(
      state.agents.map((agent) => agent.error ?? ''),
      clock.now()
    );
    if (!plan) {
      return false;
    }

    if (plan.waitSeconds > LONG_WAIT_THRESHOLD_HOURS * 3600) {
      log.warn(
        `Usage limit wait of ${(plan.waitSeconds / 3600).toFixed(1)} hours exceeds ` +
          `${LONG_WAIT_THRESHOLD_HOURS} hours; waiting anyway`
      );
    }

    await this.persist(state, log);
    bus.emit({
      type: 'workflow_waiting',
      workflowId: state.workflowId,
      totalCostUsd: state.totalCostUsd,
      pausedAgentCount: state.agents.length,
      resetTime: plan.targetTime,
      waitSeconds: plan.waitSeconds,
      timeZone: plan.timeZone,
    });
    log.event('workflow_waiting', `Waiting ${Math.round(plan.waitSeconds)}s for usage limit reset`);

    await abortableDelay(this.context, plan.waitSeconds * 1000, signal);
    if (signal.aborted) {
      return false;
    }

    bus.emit({ type: 'workflow_resuming', workflowId: state.workflowId });
    log.event('workflow_resuming', 'Usage limit reset; resuming paused agents');
    resetPausedAgents(state);
    return true;
  }

  private async persist(state: WorkflowState, log: Logger): Promise<void> {
    const written = await this.context.store.write(state);
    if (!written.ok) {
      throw written.error;
    }
    log.event('state_persisted', `Saved state (${state.agents.length} agent(s))`);
  }

  private async writeDiagnostic(state: WorkflowState, agent: AgentState | null, error: unknown): Promise<void> {
    await this.context.diagnostics.write(error, {
      workflowId: state.workflowId,
      agentId: agent?.id ?? 'workflow',
      currentState: agent?.state ?? '(none)',
      sessionId: agent?.session ?? null,
      scopeDir: state.scopeDir,
      extra: {
        retry_count: agent?.retryCount ?? null,
        stack_depth: agent?.stack.length ?? null,
        total_cost_usd: state.totalCostUsd,
        budget_usd: state.budgetUsd,
      },
    });
  }
}
