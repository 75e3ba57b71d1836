/**
 * Durable workflow state
 * One JSON record per workflow under the state directory, written atomically
 */

import { join } from 'path';
import { FileSystem } from '../types/file-system';
import { AgentState, WorkflowState } from '../types/workflow';
import { Clock, SystemClock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { DurableStorageError } from '../core/errors';
import { parseWorkflowState } from '../schemas/validators';

const WORKFLOW_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_WORKFLOW_ID_LENGTH = 255;
const RESERVED_NAMES = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

/**
 * Check a workflow id; returns the reason it is invalid, or null
 */
export function validateWorkflowId(workflowId: string): string | null {
  if (!workflowId) {
    return 'Workflow ID cannot be empty';
  }
  if (workflowId.length > MAX_WORKFLOW_ID_LENGTH) {
    return `Workflow ID is too long (${workflowId.length} > ${MAX_WORKFLOW_ID_LENGTH} characters)`;
  }
  if (!WORKFLOW_ID_PATTERN.test(workflowId)) {
    return `Invalid workflow ID '${workflowId}': use only letters, digits, '_' and '-'`;
  }
  if (RESERVED_NAMES.has(workflowId.toUpperCase())) {
    return `Invalid workflow ID '${workflowId}': '${workflowId.toUpperCase()}' is a reserved device name`;
  }
  return null;
}

/**
 * e.g. workflow_2026-10-19_14-05-09-123456
 */
export function generateWorkflowId(clock: Clock = new SystemClock()): string {
  const now = clock.now();
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  // Millisecond clock, padded to microsecond width
  const micros = pad(now.getMilliseconds() * 1000, 6);
  return `workflow_${date}_${time}-${micros}`;
}

export interface InitialStateOptions {
  workflowId: string;
  scopeDir: string;
  initialState: string;
  budgetUsd: number;
  /** Passed to the first step as its {{result}} */
  initialInput?: string;
  createdAt: string;
}

export function createInitialState(options: InitialStateOptions): WorkflowState {
  const main: AgentState = {
    id: 'main',
    state: options.initialState,
    session: null,
    stack: [],
    status: 'active',
    retryCount: 0,
  };
  if (options.initialInput !== undefined) {
    main.pendingResult = options.initialInput;
  }
  return {
    schemaVersion: 1,
    workflowId: options.workflowId,
    scopeDir: options.scopeDir,
    agents: [main],
    totalCostUsd: 0,
    budgetUsd: options.budgetUsd,
    forkCounters: {},
    createdAt: options.createdAt,
  };
}

/**
 * File-backed store of workflow records
 */
export class StateStore {
  constructor(
    private readonly fs: FileSystem,
    readonly stateDirectory: string
  ) {}

  pathFor(workflowId: string): string {
    return join(this.stateDirectory, `${workflowId}.json`);
  }

  async exists(workflowId: string): Promise<boolean> {
    return this.fs.exists(this.pathFor(workflowId));
  }

  /**
   * Read a workflow record; null when none exists
   */
  async read(workflowId: string): Promise<Result<WorkflowState | null, DurableStorageError>> {
    const path = this.pathFor(workflowId);
    const content = await this.fs.readFile(path);
    if (!content.ok) {
      if (content.error.code === 'NOT_FOUND') {
        return ok(null);
      }
      return err(new DurableStorageError(`Could not read state file ${path}: ${content.error.message}`));
    }
    const parsed = parseWorkflowState(content.value);
    if (!parsed.success || !parsed.data) {
      return err(
        new DurableStorageError(`Malformed state file ${path}: ${(parsed.errors ?? []).join('; ')}`)
      );
    }
    return ok(parsed.data);
  }

  /**
   * Write a complete snapshot (temp file + rename)
   */
  async write(state: WorkflowState): Promise<Result<void, DurableStorageError>> {
    const path = this.pathFor(state.workflowId);
    const written = await this.fs.writeFile(path, JSON.stringify(state, null, 2), {
      atomic: true,
      createParents: true,
    });
    if (!written.ok) {
      return err(new DurableStorageError(`Could not write state file ${path}: ${written.error.message}`));
    }
    return ok(undefined);
  }

  async delete(workflowId: string): Promise<Result<void, DurableStorageError>> {
    const path = this.pathFor(workflowId);
    const removed = await this.fs.remove(path);
    if (!removed.ok && removed.error.code !== 'NOT_FOUND') {
      return err(new DurableStorageError(`Could not delete state file ${path}: ${removed.error.message}`));
    }
    return ok(undefined);
  }

  /**
   * Workflow ids with a record, sorted
   */
  async list(): Promise<Result<string[], DurableStorageError>> {
    const entries = await this.fs.list(this.stateDirectory);
    if (!entries.ok) {
      if (entries.error.code === 'NOT_FOUND') {
        return ok([]);
      }
      return err(
        new DurableStorageError(`Could not list state directory ${this.stateDirectory}: ${entries.error.message}`)
      );
    }
    return ok(
      entries.value
        .filter((name) => name.endsWith('.json'))
        .map((name) => name.slice(0, -'.json'.length))
        .sort()
    );
  }
}
