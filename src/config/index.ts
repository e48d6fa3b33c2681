export { loadRunConfigFromJson, loadRunConfigFromPath, requireRunConfig } from './loader.js';
export type { RunConfigLoadResult } from './loader.js';
export {
  DEFAULT_RULES,
  DEFAULT_RUN_SETTINGS,
  RUN_CONFIG_SCHEMA_VERSION,
  RunConfigValidationError,
  validateRunConfig,
} from './schema.js';
export type {
  RunConfig,
  RunConfigMetadata,
  RunConfigValidationIssue,
  RunConfigValidationResult,
  RunSettings,
} from './types.js';
