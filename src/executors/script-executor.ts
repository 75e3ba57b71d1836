/**
 * Script executor
 *
 * Runs a shell or batch state unit as a subprocess and reads exactly one
 * transition from its stdout. Scripts are session-less and free; every
 * failure is a ScriptError, which ends the workflow.
 */

import { AgentState, ExecutionResult } from '../types/workflow';
import { SpawnResult } from '../types/process-runner';
import { Result, ok, err } from '../types/result';
import { ErrorDetails, ScriptError, WorkflowError, errorMessage } from '../core/errors';
import { parseTransitions } from '../core/transition-parser';
import { validateRequiredAttributes } from '../core/transitions';
import { Platform, resolveTransitionTargets } from '../core/state-resolver';
import { WorkflowContext } from '../core/workflow-context';
import { StepExecutor, StepInput } from './executor';
import { Logger } from '../types/logger';

const STDERR_PREVIEW_LENGTH = 500;

/**
 * Environment handed to a script, on top of the orchestrator's own
 */
export function buildScriptEnv(
  workflowId: string,
  agent: AgentState,
  scopeDir: string,
  scriptPath: string
): Record<string, string> {
  const env: Record<string, string> = {
    WAYPOINT_WORKFLOW_ID: workflowId,
    WAYPOINT_AGENT_ID: agent.id,
    WAYPOINT_STATE_DIR: scopeDir,
    WAYPOINT_STATE_FILE: scriptPath,
  };
  if (agent.pendingResult !== undefined) {
    env.WAYPOINT_RESULT = agent.pendingResult;
  }
  return { ...env, ...(agent.forkAttributes ?? {}) };
}

/**
 * Interpreter invocation for a script on the given platform
 */
export function scriptCommand(scriptPath: string, platform: Platform): { command: string; args: string[] } {
  return platform === 'win32'
    ? { command: 'cmd.exe', args: ['/c', scriptPath] }
    : { command: 'bash', args: [scriptPath] };
}

export class ScriptExecutor implements StepExecutor {
  readonly kind = 'script';

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

    context.bus.emit({ type: 'state_started', agentId: agent.id, stateName: unit.name, stateType: 'script' });

    // Archive scopes hand out a scratch copy; release() removes it
    const checkedOut = await input.scope.checkout(unit.name);
    if (!checkedOut.ok) {
      log.error(checkedOut.error.message);
      return err(new ScriptError(`Script execution error: ${checkedOut.error.message}`));
    }
    try {
      return await this.runScript(input, context, checkedOut.value.path, log);
    } finally {
      const released = await checkedOut.value.release();
      if (!released.ok) {
        log.warn(released.error.message);
      }
    }
  }

  private async runScript(
    input: StepInput,
    context: WorkflowContext,
    scriptPath: string,
    log: Logger
  ): Promise<Result<ExecutionResult, WorkflowError>> {
    const { agent, unit } = input;
    const env = buildScriptEnv(input.workflowId, agent, input.scope.location, scriptPath);
    const { timeoutSeconds } = context.settings;
    log.info(`Executing script ${scriptPath}`);

    const stepNumber = context.steps.next(agent.id);
    const { command, args } = scriptCommand(scriptPath, context.platform);

    let run: SpawnResult;
    try {
      run = await context.runner.spawn(command, {
        args,
        cwd: agent.cwd ?? context.settings.processCwd,
        env,
        timeoutMs: timeoutSeconds > 0 ? timeoutSeconds * 1000 : undefined,
        signal: input.signal,
      });
    } catch (error) {
      return err(new ScriptError(`Script execution error: ${errorMessage(error)}`));
    }

    context.bus.emit({
      type: 'script_output',
      agentId: agent.id,
      stateName: unit.name,
      stepNumber,
      stdout: run.stdout,
      stderr: run.stderr,
      exitCode: run.timedOut || run.interrupted ? null : run.exitCode,
      executionTimeMs: run.durationMs,
      env,
    });

    const details: ErrorDetails = {
      rawOutput: { scriptPath, exitCode: run.exitCode, stdout: run.stdout, stderr: run.stderr },
      outputText: run.stdout,
    };
    const fail = (message: string): Result<ExecutionResult, WorkflowError> => {
      log.error(message);
      return err(new ScriptError(message, details));
    };

    if (run.timedOut) {
      return fail(`Script timeout: ${unit.name} did not finish within ${timeoutSeconds} seconds`);
    }
    if (run.interrupted) {
      return fail(`Script '${unit.name}' was interrupted`);
    }
    if (run.exitCode !== 0) {
      return fail(
        `Script '${unit.name}' failed with exit code ${run.exitCode}. ` +
          `stderr: ${run.stderr.slice(0, STDERR_PREVIEW_LENGTH)}`
      );
    }

    const parsed = parseTransitions(run.stdout);
    if (!parsed.ok) {
      return fail(`Script '${unit.name}' produced an invalid transition: ${parsed.error.message}`);
    }
    if (parsed.value.length === 0) {
      return fail(`Script '${unit.name}' produced no transition tag in stdout`);
    }
    if (parsed.value.length > 1) {
      return fail(`Script '${unit.name}' produced ${parsed.value.length} transition tags (expected 1)`);
    }

    const [transition] = parsed.value;
    const required = validateRequiredAttributes(transition);
    if (!required.ok) {
      return fail(required.error.message);
    }

    const resolved = await resolveTransitionTargets(input.scope, transition, context.platform);
    if (!resolved.ok) {
      return fail(`Transition target not found: ${resolved.error.message}`);
    }

    log.debug(`Script transition <${resolved.value.tag}> ${resolved.value.target}`);
    context.bus.emit({
      type: 'state_completed',
      agentId: agent.id,
      stateName: unit.name,
      costUsd: 0,
      totalCostUsd: input.totalCostUsd,
      sessionId: agent.session,
      durationMs: run.durationMs,
    });

    return ok({ transition: resolved.value, sessionId: agent.session, costUsd: 0 });
  }
}
