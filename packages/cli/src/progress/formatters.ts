/**
 * Output formatting utilities
 */

import { getPaletteName, type ColorRules } from '@gpx-colorizer/core';

import type { ColorizerConfig } from '../config/schema.js';

import { createColorFns } from './colors.js';
import type { ColorFunctions } from './types.js';

/**
 * Format the ordered keyword table, one rule per line
 *
 *   1. camp       #FF804633  brown
 */
export function formatRulesTable(
  rules: ColorRules,
  c: ColorFunctions = createColorFns(false),
): string[] {
  const width = Math.max(0, ...rules.map((rule) => rule.keyword.length));

  return rules.map((rule, i) => {
    const position = `${String(i + 1).padStart(3)}.`;
    const palette = getPaletteName(rule.color);
    const line = `${position} ${rule.keyword.padEnd(width)}  ${c.cyan(rule.color)}`;
    return palette ? `${line}  ${c.dim(palette)}` : line;
  });
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(
  config: ColorizerConfig,
  c: ColorFunctions = createColorFns(false),
): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  // Output
  lines.push(c.dim('Output:'));
  lines.push(`  Suffix: ${config.output.suffix}`);
  lines.push(`  Atomic write: ${config.output.atomic ? 'yes' : c.yellow('no')}`);
  lines.push('');

  // Input
  lines.push(c.dim('Input:'));
  lines.push(`  Directory: ${config.input.directory ?? '(current directory)'}`);
  lines.push('');

  // Rules
  lines.push(c.dim(`Rules (${config.rules.length}, first match wins):`));
  lines.push(...formatRulesTable(config.rules, c).map((line) => `  ${line}`));

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Pluralize a waypoint count: "1 waypoint", "3 waypoints"
 */
export function formatWaypointCount(count: number): string {
  return `${count} waypoint${count === 1 ? '' : 's'}`;
}
