/**
 * Start a new workflow from a state file, a workflow directory or a zip archive
 */

import { basename, dirname, resolve } from 'path';
import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { resolveState } from '../core/state-resolver';
import { StateStore, createInitialState, generateWorkflowId } from '../io/state-store';
import {
  ENTRY_STATE,
  WorkflowScope,
  directoryScope,
  isArchiveScope,
  openScope,
  verifyArchiveHash,
} from '../io/workflow-scope';
import { Result, ok, err } from '../types/result';
import { CommandEnvironment } from './command-environment';
import { runWorkflow } from './run-workflow';

export interface StartOptions {
  /** State file, workflow directory or zip archive, relative to the working directory or absolute */
  file: string;
  workflowId: string | null;
  input: string | null;
  noRun: boolean;
}

interface StartPoint {
  scope: WorkflowScope;
  stateName: string;
}

interface StartFailure {
  code: ExitCode;
  message: string;
}

/**
 * Scope and first state for a start path. Directories and archives start at
 * their entry state; a single file starts at itself within its directory.
 */
async function locateStart(path: string, env: CommandEnvironment): Promise<Result<StartPoint, StartFailure>> {
  if (isArchiveScope(path)) {
    const verified = await verifyArchiveHash(env.fs, path);
    if (!verified.ok) {
      const code = verified.error.code === 'NOT_FOUND' ? ExitCode.NOT_FOUND : ExitCode.INVALID_ARGS;
      return err({ code, message: verified.error.message });
    }
    const scope = await openScope(env.fs, path);
    if (!scope.ok) {
      const code = scope.error.code === 'NOT_FOUND' ? ExitCode.NOT_FOUND : ExitCode.INVALID_ARGS;
      return err({ code, message: scope.error.message });
    }
    return withEntryState(scope.value);
  }

  if (!(await env.fs.exists(path))) {
    return err({ code: ExitCode.NOT_FOUND, message: `State file not found: ${path}` });
  }
  if ((await env.fs.list(path)).ok) {
    return withEntryState(directoryScope(env.fs, path));
  }
  // The file's directory is the scope every later transition resolves in
  return ok({ scope: directoryScope(env.fs, dirname(path)), stateName: basename(path) });
}

async function withEntryState(scope: WorkflowScope): Promise<Result<StartPoint, StartFailure>> {
  if (!(await scope.has(ENTRY_STATE))) {
    return err({ code: ExitCode.INVALID_ARGS, message: `No ${ENTRY_STATE} found in ${scope.location}` });
  }
  return ok({ scope, stateName: ENTRY_STATE });
}

export async function startWorkflow(
  options: StartOptions,
  config: EffectiveConfig,
  env: CommandEnvironment,
  signal?: AbortSignal
): Promise<ExitCode> {
  const path = resolve(config.paths.workingDirectory, options.file);
  const start = await locateStart(path, env);
  if (!start.ok) {
    env.writeError(`Error: ${start.error.message}\n`);
    return start.error.code;
  }

  const { scope } = start.value;
  const resolved = await resolveState(scope, start.value.stateName, env.platform);
  if (!resolved.ok) {
    env.writeError(`Error: ${resolved.error.message}\n`);
    return ExitCode.INVALID_ARGS;
  }

  const workflowId = options.workflowId ?? generateWorkflowId(env.clock);
  const store = new StateStore(env.fs, config.paths.stateDirectory);
  if (await store.exists(workflowId)) {
    env.writeError(
      `Error: Workflow '${workflowId}' already exists. Resume it with: waypoint --resume ${workflowId}\n`
    );
    return ExitCode.INVALID_ARGS;
  }

  const state = createInitialState({
    workflowId,
    scopeDir: scope.location,
    initialState: resolved.value.name,
    budgetUsd: config.defaults.budgetUsd,
    initialInput: options.input ?? undefined,
    createdAt: env.clock.iso(),
  });
  const written = await store.write(state);
  if (!written.ok) {
    env.writeError(`Error: ${written.error.message}\n`);
    return ExitCode.GENERAL_ERROR;
  }
  env.logger.event('state_persisted', `Created workflow ${workflowId}`, {
    workflowId,
    stateName: resolved.value.name,
  });

  if (options.noRun) {
    env.write(`Created workflow ${workflowId}\nRun it with: waypoint --resume ${workflowId}\n`);
    return ExitCode.SUCCESS;
  }
  return runWorkflow(workflowId, config, env, signal);
}
