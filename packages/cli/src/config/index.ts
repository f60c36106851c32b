/**
 * Configuration module exports
 */

// Schema types
export type {
  OutputConfigSchema,
  InputConfigSchema,
  ColorizerConfig,
  PartialColorizerConfig,
  CliOptions,
} from './schema.js';

// Defaults
export { DEFAULT_OUTPUT_CONFIG, DEFAULT_INPUT_CONFIG, DEFAULT_CONFIG } from './defaults.js';

// Validation
export {
  colorRuleSchema,
  colorRulesSchema,
  outputSuffixSchema,
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  CONFIG_MODULE_NAME,
  ENV_VAR_MAP,
  loadConfig,
  loadEnvConfig,
  formatConfig,
  type LoadConfigOptions,
} from './loader.js';
