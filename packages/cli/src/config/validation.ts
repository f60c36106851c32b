/**
 * Zod validation schemas for configuration
 */

import { isArgbColor } from '@gpx-colorizer/core';
import { z } from 'zod';

/**
 * A single keyword rule
 */
export const colorRuleSchema = z.object({
  keyword: z
    .string()
    .min(1, 'keyword must not be empty')
    .refine((keyword) => keyword === keyword.toLowerCase(), 'keyword must be lowercase'),
  color: z.string().refine(isArgbColor, 'color must be an ARGB hex code like #FF249CF2'),
});

/**
 * Ordered rule table
 */
export const colorRulesSchema = z.array(colorRuleSchema).min(1, 'at least one rule is required');

/**
 * Output suffix: inserted into a file name, so no path separators
 */
export const outputSuffixSchema = z
  .string()
  .min(1, 'suffix must not be empty')
  .refine((suffix) => !/[\\/]/.test(suffix), 'suffix must not contain path separators');

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  suffix: outputSuffixSchema,
  atomic: z.boolean(),
});

/**
 * Input configuration schema
 */
export const inputConfigSchema = z.object({
  directory: z.string().min(1).optional(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  rules: colorRulesSchema,
  output: outputConfigSchema,
  input: inputConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment)
 */
export const partialConfigSchema = z.object({
  rules: colorRulesSchema.optional(),
  output: outputConfigSchema.partial().optional(),
  input: inputConfigSchema.partial().optional(),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
export type ValidatedPartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): ValidatedConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): ValidatedPartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
