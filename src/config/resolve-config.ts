/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > repo config > user config > defaults
 */

import { dirname, join } from 'path';
import { FileSystem } from '../types/file-system';
import { EffectiveConfig, DEFAULT_CONFIG, ConfigSource, ModelName } from '../types/effective-config';
import { Result, ok, err } from '../types/result';
import { ConfigError } from '../core/errors';
import { ConfigFile, parseConfigFile } from '../schemas/validators';

/** Name of the per-project artifact directory */
export const WAYPOINT_DIR = '.waypoint';
export const CONFIG_FILE = 'config.json';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  model?: ModelName;
  budgetUsd?: number;
  timeoutSeconds?: number;
  dangerouslySkipPermissions?: boolean;
  noWait?: boolean;
  debug?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  width?: number;
  jsonLogs?: boolean;
}

export interface ResolveConfigOptions {
  fs: FileSystem;
  workingDirectory: string;
  homeDirectory: string;
}

/**
 * Locate the .waypoint directory: the nearest existing one walking up from
 * cwd, stopping at the project root (a directory containing .git). Without
 * one, it belongs at the project root, or at cwd outside a repository.
 */
export async function findBaseDirectory(fs: FileSystem, cwd: string): Promise<string> {
  let current = cwd;
  for (;;) {
    const candidate = join(current, WAYPOINT_DIR);
    if (await fs.exists(candidate)) {
      return candidate;
    }
    if (await fs.exists(join(current, '.git'))) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) {
      return join(cwd, WAYPOINT_DIR);
    }
    current = parent;
  }
}

export function userConfigPath(homeDirectory: string): string {
  return join(homeDirectory, '.config', 'waypoint', CONFIG_FILE);
}

/**
 * Load and validate a JSON config file; absent files yield null
 */
async function loadConfigFile(fs: FileSystem, path: string): Promise<Result<ConfigFile | null, ConfigError>> {
  const content = await fs.readFile(path);
  if (!content.ok) {
    if (content.error.code === 'NOT_FOUND') {
      return ok(null);
    }
    return err(new ConfigError(`Could not read config file ${path}: ${content.error.message}`));
  }
  const parsed = parseConfigFile(content.value);
  if (!parsed.success || !parsed.data) {
    const details = (parsed.errors ?? []).map((line) => `  ${line}`).join('\n');
    return err(new ConfigError(`Invalid config file ${path}:\n${details}`));
  }
  return ok(parsed.data);
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export async function resolveConfig(
  cliFlags: CliFlags,
  options: ResolveConfigOptions
): Promise<Result<EffectiveConfig, ConfigError>> {
  const { fs, workingDirectory: cwd } = options;
  const baseDirectory = await findBaseDirectory(fs, cwd);

  const repoResult = await loadConfigFile(fs, join(baseDirectory, CONFIG_FILE));
  if (!repoResult.ok) {
    return repoResult;
  }
  const userResult = await loadConfigFile(fs, userConfigPath(options.homeDirectory));
  if (!userResult.ok) {
    return userResult;
  }
  const repo = repoResult.value ?? {};
  const user = userResult.value ?? {};

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  function resolveValue<T>(key: string, cli: T | undefined, repoValue: T | undefined, userValue: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (repoValue !== undefined) {
      sources[key] = 'repo';
      return repoValue;
    }
    if (userValue !== undefined) {
      sources[key] = 'user';
      return userValue;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const defaults = DEFAULT_CONFIG.defaults;
  const behavior = DEFAULT_CONFIG.behavior;
  const output = DEFAULT_CONFIG.output;

  const config: EffectiveConfig = {
    defaults: {
      model: resolveValue('model', cliFlags.model, repo.defaults?.model, user.defaults?.model, defaults.model),
      budgetUsd: resolveValue(
        'budgetUsd',
        cliFlags.budgetUsd,
        repo.defaults?.budgetUsd,
        user.defaults?.budgetUsd,
        defaults.budgetUsd
      ),
      timeoutSeconds: resolveValue(
        'timeoutSeconds',
        cliFlags.timeoutSeconds,
        repo.defaults?.timeoutSeconds,
        user.defaults?.timeoutSeconds,
        defaults.timeoutSeconds
      ),
      dangerouslySkipPermissions: resolveValue(
        'dangerouslySkipPermissions',
        cliFlags.dangerouslySkipPermissions,
        repo.defaults?.dangerouslySkipPermissions,
        user.defaults?.dangerouslySkipPermissions,
        defaults.dangerouslySkipPermissions
      ),
    },

    behavior: {
      noWait: resolveValue('noWait', cliFlags.noWait, repo.behavior?.noWait, user.behavior?.noWait, behavior.noWait),
      debug: resolveValue('debug', cliFlags.debug, repo.behavior?.debug, user.behavior?.debug, behavior.debug),
    },

    output: {
      quiet: resolveValue('quiet', cliFlags.quiet, repo.output?.quiet, user.output?.quiet, output.quiet),
      verbose: resolveValue('verbose', cliFlags.verbose, repo.output?.verbose, user.output?.verbose, output.verbose),
      width: resolveValue('width', cliFlags.width, repo.output?.width, user.output?.width, output.width),
      jsonLogs: resolveValue(
        'jsonLogs',
        cliFlags.jsonLogs,
        repo.output?.jsonLogs,
        user.output?.jsonLogs,
        output.jsonLogs
      ),
    },

    paths: {
      workingDirectory: cwd,
      baseDirectory,
      stateDirectory: join(baseDirectory, 'state'),
      debugDirectory: join(baseDirectory, 'debug'),
      errorDirectory: join(baseDirectory, 'errors'),
    },

    sources,
  };

  return ok(config);
}
