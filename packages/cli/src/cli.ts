/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';

import type { CliOptions } from './config/index.js';

export const VERSION = '0.1.0';

/**
 * Output path help text
 */
const OUTPUT_HELP = `Output file (default: input name with the suffix before the extension,
    e.g. hike.gpx -> hike_color.gpx)`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('gpx-colorize')
    .description('Color GPX waypoints by keywords in their names for mapping apps')
    .version(VERSION);

  // Colorize command (default)
  program
    .command('colorize <file>', { isDefault: true })
    .description('Add color extensions to the waypoints of a GPX file')
    .option('-o, --output <file>', OUTPUT_HELP)
    .option('-c, --config <file>', 'Path to config file')
    .option('-s, --suffix <suffix>', 'Suffix for the derived output file name (default: _color)')
    .option('--no-atomic', 'Write the output file directly instead of via a temporary file')
    .option('--dry-run', 'Classify waypoints and report without writing a file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--verbose', 'Log every colored waypoint')
    .option('--quiet', 'Suppress progress and summary output')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (file: string, options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { colorizeCommand } = await import('./commands/colorize.js');
      await colorizeCommand(file, options);
    });

  // Rules command
  program
    .command('rules')
    .description('Print the keyword table in match order')
    .option('-c, --config <file>', 'Path to config file')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { rulesCommand } = await import('./commands/rules.js');
      await rulesCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const output = stringOption(options, 'output');
  if (output !== undefined) result.output = output;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const suffix = stringOption(options, 'suffix');
  if (suffix !== undefined) result.suffix = suffix;

  const dryRun = booleanOption(options, 'dryRun');
  if (dryRun !== undefined) result.dryRun = dryRun;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  const verbose = booleanOption(options, 'verbose');
  if (verbose !== undefined) result.verbose = verbose;
  const quiet = booleanOption(options, 'quiet');
  if (quiet !== undefined) result.quiet = quiet;

  // Note: Commander.js sets 'atomic' and 'color' (negated) to true unless --no-* is used,
  // so only the negated form is carried over and config keeps the final say otherwise
  if (options['atomic'] === false) result.atomic = false;
  if (options['color'] === false) result.noColor = true;

  return result;
}
