/**
 * Config file template and display
 */

import { join } from 'path';
import { FileSystem } from '../types/file-system';
import { EffectiveConfig, DEFAULT_CONFIG } from '../types/effective-config';
import { Result, ok, err } from '../types/result';
import { ConfigError } from '../core/errors';
import { ConfigFile } from '../schemas/validators';
import { CONFIG_FILE } from './resolve-config';

/**
 * Every key a config file accepts, at its default. `model` is left out:
 * without it the CLI picks its own default.
 */
export function configTemplate(): ConfigFile {
  return {
    defaults: {
      budgetUsd: DEFAULT_CONFIG.defaults.budgetUsd,
      timeoutSeconds: DEFAULT_CONFIG.defaults.timeoutSeconds,
      dangerouslySkipPermissions: DEFAULT_CONFIG.defaults.dangerouslySkipPermissions,
    },
    behavior: { ...DEFAULT_CONFIG.behavior },
    output: { ...DEFAULT_CONFIG.output },
  };
}

/**
 * Write the template to {baseDirectory}/config.json, refusing to overwrite
 */
export async function writeConfigTemplate(
  fs: FileSystem,
  baseDirectory: string
): Promise<Result<string, ConfigError>> {
  const path = join(baseDirectory, CONFIG_FILE);
  if (await fs.exists(path)) {
    return err(new ConfigError(`Config file already exists: ${path}`));
  }
  const written = await fs.writeFile(path, JSON.stringify(configTemplate(), null, 2) + '\n', {
    createParents: true,
  });
  if (!written.ok) {
    return err(new ConfigError(`Could not write config file ${path}: ${written.error.message}`));
  }
  return ok(path);
}

/**
 * Format effective config for human-readable display
 */
export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const source = (key: string): string => config.sources[key] ?? 'default';
  const lines: string[] = [];

  lines.push('┌─ Effective Configuration ─────────────────────────────────────┐');
  lines.push(`│ Model:       ${config.defaults.model ?? '(CLI default)'} [${source('model')}]`);
  lines.push(`│ Budget:      $${config.defaults.budgetUsd.toFixed(2)} [${source('budgetUsd')}]`);
  lines.push(
    `│ Timeout:     ${config.defaults.timeoutSeconds === 0 ? 'none' : `${config.defaults.timeoutSeconds}s`} [${source('timeoutSeconds')}]`
  );
  lines.push(
    `│ Permissions: ${config.defaults.dangerouslySkipPermissions ? 'skipped (dangerous)' : 'acceptEdits'} [${source('dangerouslySkipPermissions')}]`
  );
  lines.push(`│ Auto-wait:   ${config.behavior.noWait ? 'no' : 'yes'} [${source('noWait')}]`);
  lines.push(`│ Debug:       ${config.behavior.debug ? 'yes' : 'no'} [${source('debug')}]`);
  lines.push(`│ State:       ${config.paths.stateDirectory}`);
  lines.push('└───────────────────────────────────────────────────────────────┘');

  return lines.join('\n');
}
