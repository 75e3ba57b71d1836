/**
 * Prompt executor
 *
 * Runs a Markdown state unit through the LLM backend. Re-prompts with a
 * reminder when the output carries no usable transition and the state's
 * policy allows it; forces a result once the budget is spent.
 */

import { ExecutionResult, Transition } from '../types/workflow';
import { Policy } from '../types/policy';
import { StreamMessageHandler } from '../types/llm-backend';
import { Result, ok, err } from '../types/result';
import { Logger } from '../types/logger';
import { ParseError, WorkflowError } from '../core/errors';
import { loadPrompt, renderPrompt } from '../core/prompt-loader';
import { parseTransitions, validateSingle } from '../core/transition-parser';
import { validateRequiredAttributes } from '../core/transitions';
import { resolveTransitionTargets } from '../core/state-resolver';
import {
  generateReminderPrompt,
  getImplicitTransition,
  shouldUseReminderPrompt,
  validateTransitionPolicy,
} from '../core/policy';
import { WorkflowContext } from '../core/workflow-context';
import { EventBus } from '../events/event-bus';
import {
  extractCost,
  extractOutputText,
  extractProgressText,
  extractToolUses,
} from '../engines/stream-output';
import { StepExecutor, StepInput, budgetExceededTransition } from './executor';

/** Invocations per step before an invalid transition becomes fatal */
export const MAX_REMINDER_ATTEMPTS = 3;

type AttemptOutcome =
  | { ok: true; transition: Transition }
  | { ok: false; error: WorkflowError; noTransition: boolean };

function templateVariables(input: StepInput): Record<string, string> {
  const variables: Record<string, string> = {};
  if (input.agent.pendingResult !== undefined) {
    variables.result = input.agent.pendingResult;
  }
  return { ...variables, ...(input.agent.forkAttributes ?? {}) };
}

function relayStream(bus: EventBus, agentId: string, stepNumber: number): StreamMessageHandler {
  return (message, rawLine) => {
    bus.emit({ type: 'stream_output', agentId, stepNumber, data: rawLine });
    for (const use of extractToolUses(message)) {
      bus.emit({ type: 'tool_invocation', agentId, toolName: use.toolName, detail: use.detail });
    }
    for (const text of extractProgressText(message)) {
      bus.emit({ type: 'progress_message', agentId, message: text });
    }
  };
}

export class PromptExecutor implements StepExecutor {
  readonly kind = 'prompt';

  async execute(
    input: StepInput,
    context: WorkflowContext
  ): Promise<Result<ExecutionResult, WorkflowError>> {
    const { agent, unit } = input;
    const log = context.logger.child({
      workflowId: input.workflowId,
      agentId: agent.id,
      stateName: unit.name,
    });
    const startedAt = context.clock.timestamp();

    context.bus.emit({ type: 'state_started', agentId: agent.id, stateName: unit.name, stateType: 'prompt' });

    const loaded = await loadPrompt(input.scope, unit.name, log);
    if (!loaded.ok) {
      log.error(loaded.error.message);
      return loaded;
    }
    const { template, policy } = loaded.value;
    const basePrompt = renderPrompt(template, templateVariables(input));
    const model = policy?.model ?? context.settings.model;

    let sessionId = agent.session;
    let spent = 0;
    let transition: Transition;

    for (let attempt = 0; ; attempt++) {
      // Only the first invocation branches from the caller; reminders resume the branch
      const forkFrom = attempt === 0 ? agent.forkSessionId : undefined;
      const reminder = attempt > 0 && policy ? generateReminderPrompt(policy) : '';
      const stepNumber = context.steps.next(agent.id);

      context.bus.emit({
        type: 'invocation_started',
        agentId: agent.id,
        stateName: unit.name,
        sessionId: forkFrom ?? sessionId,
        isFork: forkFrom !== undefined,
        isReminder: attempt > 0,
        reminderAttempt: attempt,
      });
      if (attempt > 0) {
        log.event('reminder_sent', `Re-prompting with reminder (attempt ${attempt})`);
      }
      log.event('invocation_started', `Invoking ${context.backend.name}`, {
        model: model ?? 'default',
        sessionId: forkFrom ?? sessionId,
        fork: forkFrom !== undefined,
      });

      const response = await context.backend.invoke(
        {
          prompt: basePrompt + reminder,
          model,
          sessionId: forkFrom ?? sessionId,
          forkSession: forkFrom !== undefined,
          timeoutSeconds: context.settings.timeoutSeconds,
          dangerouslySkipPermissions: context.settings.dangerouslySkipPermissions,
          cwd: agent.cwd ?? context.settings.processCwd,
          signal: input.signal,
        },
        relayStream(context.bus, agent.id, stepNumber)
      );
      if (!response.ok) {
        log.event('invocation_failed', response.error.message);
        Object.assign(response.error.details, { costUsd: spent });
        return response;
      }

      sessionId = response.value.sessionId ?? sessionId;
      const messages = response.value.messages;
      const outputText = extractOutputText(messages);
      const cost = extractCost(messages);
      spent += cost;
      const total = input.totalCostUsd + spent;
      log.event('invocation_completed', `Invocation cost $${cost.toFixed(4)}, total $${total.toFixed(4)}`, {
        sessionId,
        messageCount: messages.length,
      });

      if (total > input.budgetUsd) {
        log.event(
          'budget_exceeded',
          `Budget exceeded: $${total.toFixed(4)} > $${input.budgetUsd.toFixed(4)}. Terminating workflow.`
        );
        transition = budgetExceededTransition(total, input.budgetUsd);
        break;
      }

      const outcome = await this.resolveOutput(outputText, policy, input, context, log);
      if (outcome.ok) {
        transition = outcome.transition;
        break;
      }

      const { error } = outcome;
      Object.assign(error.details, { rawOutput: messages, outputText, costUsd: spent });

      if (shouldUseReminderPrompt(policy) && attempt + 1 < MAX_REMINDER_ATTEMPTS) {
        log.warn(`No usable transition: ${error.message}`);
        context.bus.emit({
          type: 'error_occurred',
          agentId: agent.id,
          errorType: error.code,
          errorMessage: error.message,
          currentState: unit.name,
          isRetryable: true,
          retryCount: attempt + 1,
          maxRetries: MAX_REMINDER_ATTEMPTS,
        });
        continue;
      }

      if (outcome.noTransition && shouldUseReminderPrompt(policy)) {
        return err(
          new ParseError(
            `Expected exactly one transition, found 0 after ${MAX_REMINDER_ATTEMPTS} reminder attempts`,
            error.details
          )
        );
      }
      return err(error);
    }

    context.bus.emit({
      type: 'state_completed',
      agentId: agent.id,
      stateName: unit.name,
      costUsd: spent,
      totalCostUsd: input.totalCostUsd + spent,
      sessionId,
      durationMs: context.clock.timestamp() - startedAt,
    });

    return ok({ transition, sessionId, costUsd: spent });
  }

  /**
   * Turn output text into one validated, resolved transition
   */
  private async resolveOutput(
    text: string,
    policy: Policy | null,
    input: StepInput,
    context: WorkflowContext,
    log: Logger
  ): Promise<AttemptOutcome> {
    const parsed = parseTransitions(text);
    if (!parsed.ok) {
      return { ok: false, error: parsed.error, noTransition: false };
    }

    let transition: Transition;
    if (parsed.value.length === 0) {
      const implicit = getImplicitTransition(policy);
      if (!implicit) {
        return {
          ok: false,
          error: new ParseError('Expected exactly one transition, found 0'),
          noTransition: true,
        };
      }
      log.debug(`Using implicit transition <${implicit.tag}> ${implicit.target}`);
      transition = implicit;
    } else {
      const single = validateSingle(parsed.value);
      if (!single.ok) {
        return { ok: false, error: single.error, noTransition: false };
      }
      transition = single.value;
    }

    const required = validateRequiredAttributes(transition);
    if (!required.ok) {
      return { ok: false, error: required.error, noTransition: false };
    }

    const resolved = await resolveTransitionTargets(input.scope, transition, context.platform);
    if (!resolved.ok) {
      return { ok: false, error: resolved.error, noTransition: false };
    }

    const allowed = validateTransitionPolicy(resolved.value, policy);
    if (!allowed.ok) {
      return { ok: false, error: allowed.error, noTransition: false };
    }

    return { ok: true, transition: resolved.value };
  }
}
