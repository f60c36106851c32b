/**
 * Configuration schema types for the gpx-colorize CLI
 */

import type { ColorRule } from '@gpx-colorizer/core';

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Inserted before the extension of the derived output path */
  suffix: string;
  /** Write via a temporary file and rename */
  atomic: boolean;
}

/**
 * Input configuration
 */
export interface InputConfigSchema {
  /** Directory that relative input paths are resolved against */
  directory?: string;
}

/**
 * Complete colorizer configuration
 */
export interface ColorizerConfig {
  /** Ordered keyword table; the first matching rule wins */
  rules: ColorRule[];
  output: OutputConfigSchema;
  input: InputConfigSchema;
}

/**
 * Configuration as read from a file or the environment
 */
export interface PartialColorizerConfig {
  rules?: ColorRule[];
  output?: Partial<OutputConfigSchema>;
  input?: Partial<InputConfigSchema>;
}

/**
 * CLI options (parsed from command line)
 */
export interface CliOptions {
  output?: string;
  config?: string;
  suffix?: string;
  /** False when --no-atomic is given */
  atomic?: boolean;
  dryRun?: boolean;
  showConfig?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}
