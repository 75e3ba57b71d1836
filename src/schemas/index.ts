/**
 * Zod schemas for durable state and config files
 */
export {
  workflowStateSchema,
  validateWorkflowState,
  parseWorkflowState,
  configFileSchema,
  validateConfigFile,
  parseConfigFile,
} from './validators';
export type { ValidationResult, ConfigFile } from './validators';
