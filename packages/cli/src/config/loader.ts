/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ColorizerConfig, CliOptions, PartialColorizerConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * Module name used for config file discovery
 */
export const CONFIG_MODULE_NAME = 'gpxcolorizer';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
export const ENV_VAR_MAP: Record<string, string> = {
  GPX_COLORIZER_DIR: 'input.directory',
  GPX_COLORIZER_SUFFIX: 'output.suffix',
  GPX_COLORIZER_ATOMIC: 'output.atomic',
};

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Directory to start the config file search from (default: cwd) */
  searchFrom?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Deep merge two configurations
 * Source values override target values; a rules list replaces the target's
 */
function deepMerge(target: ColorizerConfig, source: PartialColorizerConfig): ColorizerConfig {
  const result = structuredClone(target);

  if (source.rules) {
    result.rules = source.rules.map((rule) => ({ ...rule }));
  }

  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  if (source.input) {
    result.input = { ...result.input, ...source.input };
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    return;
  }

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastPart] = value;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (path === 'output.atomic') {
    const lower = value.toLowerCase();
    if (lower === 'true' || value === '1') return true;
    if (lower === 'false' || value === '0') return false;
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialColorizerConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(
  configPath?: string,
  searchFrom?: string,
): Promise<PartialColorizerConfig | null> {
  const explorer = cosmiconfig(CONFIG_MODULE_NAME, {
    searchPlaces: [
      'package.json',
      `.${CONFIG_MODULE_NAME}rc`,
      `.${CONFIG_MODULE_NAME}rc.json`,
      `.${CONFIG_MODULE_NAME}rc.yaml`,
      `.${CONFIG_MODULE_NAME}rc.yml`,
      `.${CONFIG_MODULE_NAME}rc.js`,
      `.${CONFIG_MODULE_NAME}rc.cjs`,
      `${CONFIG_MODULE_NAME}.config.js`,
      `${CONFIG_MODULE_NAME}.config.cjs`,
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Cannot load config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialColorizerConfig {
  const config: PartialColorizerConfig = {};

  if (options.suffix !== undefined) {
    config.output = { ...config.output, suffix: options.suffix };
  }

  if (options.atomic !== undefined) {
    config.output = { ...config.output, atomic: options.atomic };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  options: LoadConfigOptions = {},
): Promise<ColorizerConfig> {
  // 1. Start with defaults
  let config = structuredClone(DEFAULT_CONFIG);

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config, options.searchFrom);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  // 3. Apply environment variables
  config = deepMerge(config, loadEnvConfig(options.env));

  // 4. Apply CLI arguments (highest priority)
  config = deepMerge(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ColorizerConfig): string {
  return JSON.stringify(config, null, 2);
}
