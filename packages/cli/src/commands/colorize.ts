/**
 * Colorize command implementation
 */

import {
  InputReadError,
  OutputPathError,
  OutputWriteError,
  colorizeFile,
  type ColorizeResult,
} from '@gpx-colorizer/core';
import { GpxParseError } from '@gpx-colorizer/gpx';

import { parseCliOptions, VERSION } from '../cli.js';
import {
  loadConfig,
  formatConfig,
  type CliOptions,
  type LoadConfigOptions,
} from '../config/index.js';
import {
  CliError,
  GpxError,
  InputError,
  OutputError,
  handleError,
  resolveAbsolutePath,
} from '../errors/index.js';
import { ProgressReporter, createPipelineProgressCallback } from '../progress/index.js';

/**
 * Map a pipeline error to the CLI error shown to the user
 */
export function toCliError(error: unknown, inputPath: string): Error {
  if (error instanceof GpxParseError) {
    return new GpxError(error.reason, inputPath, error.line, error.column);
  }
  if (error instanceof InputReadError) {
    return new InputError(error.message, 'Check the file path and try again');
  }
  if (error instanceof OutputPathError) {
    return new OutputError(
      error.message,
      'Choose a different --output path or a non-empty --suffix',
    );
  }
  if (error instanceof OutputWriteError) {
    return new OutputError(
      error.message,
      'Check that the output directory exists and is writable',
    );
  }
  if (error instanceof Error) {
    return error;
  }
  return new CliError(String(error));
}

/**
 * Run the colorize command without exiting the process
 *
 * @returns The pipeline result, or null when only the configuration was shown
 */
export async function runColorize(
  file: string,
  options: CliOptions,
  reporter: ProgressReporter,
  loadOptions: LoadConfigOptions = {},
): Promise<ColorizeResult | null> {
  const config = await loadConfig(options, loadOptions);

  // Show config and exit if requested
  if (options.showConfig) {
    reporter.printConfig(config, formatConfig(config));
    return null;
  }

  reporter.printHeader(VERSION);

  const inputPath = resolveAbsolutePath(file, config.input.directory);
  const outputPath = options.output ? resolveAbsolutePath(options.output) : undefined;

  reporter.startRun(inputPath);

  try {
    const result = colorizeFile(inputPath, {
      rules: config.rules,
      suffix: config.output.suffix,
      outputPath,
      atomic: config.output.atomic,
      dryRun: options.dryRun ?? false,
      onWaypoint: (outcome) => reporter.reportWaypoint(outcome),
      onProgress: createPipelineProgressCallback(reporter),
    });

    reporter.printSummary(result);
    return result;
  } catch (error) {
    const cliError = toCliError(error, inputPath);
    reporter.failPhase(cliError.message);
    throw cliError;
  }
}

/**
 * Main colorize command handler
 */
export async function colorizeCommand(
  file: string,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    silent: options.quiet ?? false,
    verbose: options.verbose ?? false,
  });

  try {
    await runColorize(file, options, reporter);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
