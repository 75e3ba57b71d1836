/**
 * Config module - configuration resolution and management
 */

export type { CliFlags, ResolveConfigOptions } from './resolve-config';
export {
  WAYPOINT_DIR,
  CONFIG_FILE,
  findBaseDirectory,
  userConfigPath,
  resolveConfig,
} from './resolve-config';

export { configTemplate, writeConfigTemplate, formatEffectiveConfigForDisplay } from './write-config';
