/**
 * EffectiveConfig type
 * Centralized configuration object passed through a workflow run
 */

/**
 * Model aliases understood by the Claude CLI
 */
export const MODEL_NAMES = ['opus', 'sonnet', 'haiku'] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export function isModelName(value: string): value is ModelName {
  return MODEL_NAMES.some((name) => name === value);
}

/**
 * Defaults applied to every step unless a state's policy overrides them
 */
export interface StepDefaults {
  /** Default model; undefined lets the CLI pick */
  model?: ModelName;
  /** Budget ceiling for new workflows, in USD */
  budgetUsd: number;
  /** Per-step timeout in seconds (0 = none) */
  timeoutSeconds: number;
  /** Pass --dangerously-skip-permissions instead of --permission-mode acceptEdits */
  dangerouslySkipPermissions: boolean;
}

export interface BehaviorConfig {
  /** Exit paused instead of sleeping until a usage limit resets */
  noWait: boolean;
  /** Write per-step debug files under the debug directory */
  debug: boolean;
}

export interface OutputConfig {
  quiet: boolean;
  verbose: boolean;
  /** Console width used for truncating progress lines */
  width: number;
  /** Emit log lines as JSON */
  jsonLogs: boolean;
}

/**
 * Path configuration
 */
export interface PathConfig {
  /** Working directory for the run */
  workingDirectory: string;
  /** Base directory for waypoint artifacts (.waypoint) */
  baseDirectory: string;
  stateDirectory: string;
  debugDirectory: string;
  errorDirectory: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'repo' | 'user' | 'default';

/**
 * The complete effective configuration for a run
 */
export interface EffectiveConfig {
  defaults: StepDefaults;
  behavior: BehaviorConfig;
  output: OutputConfig;
  paths: PathConfig;
  /** Source of each configuration value, keyed by config file key */
  sources: Record<string, ConfigSource>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'paths' | 'sources'> = {
  defaults: {
    model: undefined,
    budgetUsd: 10.0,
    timeoutSeconds: 600,
    dangerouslySkipPermissions: false,
  },
  behavior: {
    noWait: false,
    debug: true,
  },
  output: {
    quiet: false,
    verbose: false,
    width: 80,
    jsonLogs: false,
  },
};
