/**
 * Schema validation with zod
 * Runtime validation of durable workflow state and config files
 */

import { z } from 'zod';
import { AgentState, WorkflowState } from '../types/workflow';
import { MODEL_NAMES } from '../types/effective-config';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError, validKeys?: (path: string) => string[]): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    const where = path || '(root)';
    if (issue.code === 'unrecognized_keys' && validKeys) {
      const valid = validKeys(path);
      return `${where}: Unknown key(s) ${issue.keys.map((key) => `'${key}'`).join(', ')}. Valid keys: ${valid.join(', ')}`;
    }
    return `${where}: ${issue.message}`;
  });
}

// =============================================================================
// Workflow State Schema
// =============================================================================

const frameSchema = z.object({
  session: z.string().nullable(),
  state: z.string().min(1),
});

const agentStateSchema: z.ZodType<AgentState> = z.object({
  id: z.string().min(1),
  state: z.string().min(1),
  session: z.string().nullable(),
  stack: z.array(frameSchema),
  status: z.enum(['active', 'paused', 'failed']),
  retryCount: z.number().int().min(0),
  cwd: z.string().optional(),
  error: z.string().optional(),
  pauseReason: z.string().optional(),
  pendingResult: z.string().optional(),
  forkSessionId: z.string().optional(),
  forkAttributes: z.record(z.string()).optional(),
});

export const workflowStateSchema: z.ZodType<WorkflowState> = z.object({
  schemaVersion: z.literal(1),
  workflowId: z.string().min(1),
  scopeDir: z.string().min(1),
  agents: z.array(agentStateSchema),
  totalCostUsd: z.number().min(0),
  budgetUsd: z.number().positive(),
  forkCounters: z.record(z.number().int().min(0)),
  createdAt: z.string(),
});

export function validateWorkflowState(data: unknown): ValidationResult<WorkflowState> {
  const result = workflowStateSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse workflow state from a JSON string
 */
export function parseWorkflowState(json: string): ValidationResult<WorkflowState> {
  try {
    const data: unknown = JSON.parse(json);
    return validateWorkflowState(data);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
}

// =============================================================================
// Config File Schema
// =============================================================================

const defaultsSchema = z
  .object({
    model: z.enum(MODEL_NAMES).optional(),
    budgetUsd: z.number().positive().optional(),
    timeoutSeconds: z.number().min(0).optional(),
    dangerouslySkipPermissions: z.boolean().optional(),
  })
  .strict();

const behaviorSchema = z
  .object({
    noWait: z.boolean().optional(),
    debug: z.boolean().optional(),
  })
  .strict();

const outputSchema = z
  .object({
    quiet: z.boolean().optional(),
    verbose: z.boolean().optional(),
    width: z.number().int().min(40).optional(),
    jsonLogs: z.boolean().optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    defaults: defaultsSchema.optional(),
    behavior: behaviorSchema.optional(),
    output: outputSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const CONFIG_KEYS: Record<string, string[]> = {
  '': Object.keys(configFileSchema.shape),
  defaults: Object.keys(defaultsSchema.shape),
  behavior: Object.keys(behaviorSchema.shape),
  output: Object.keys(outputSchema.shape),
};

export function validateConfigFile(data: unknown): ValidationResult<ConfigFile> {
  const result = configFileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error, (path) => CONFIG_KEYS[path] ?? []) };
}

/**
 * Parse a config file from a JSON string
 */
export function parseConfigFile(json: string): ValidationResult<ConfigFile> {
  try {
    const data: unknown = JSON.parse(json);
    return validateConfigFile(data);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
}
