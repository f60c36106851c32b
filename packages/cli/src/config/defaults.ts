/**
 * Default configuration values
 */

import { DEFAULT_COLOR_RULES, DEFAULT_OUTPUT_SUFFIX } from '@gpx-colorizer/core';

import type { ColorizerConfig, InputConfigSchema, OutputConfigSchema } from './schema.js';

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  suffix: DEFAULT_OUTPUT_SUFFIX,
  atomic: true,
};

/**
 * Default input configuration (relative paths resolve against the cwd)
 */
export const DEFAULT_INPUT_CONFIG: InputConfigSchema = {};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ColorizerConfig = {
  rules: DEFAULT_COLOR_RULES.map((rule) => ({ ...rule })),
  output: DEFAULT_OUTPUT_CONFIG,
  input: DEFAULT_INPUT_CONFIG,
};
