/**
 * Progress reporter with ora spinners
 */

import type {
  ColorizePhase,
  ColorizeProgressCallback,
  ColorizeResult,
  ColorRules,
  WaypointColoring,
} from '@gpx-colorizer/core';
import ora, { type Ora, type Color } from 'ora';

import type { ColorizerConfig } from '../config/schema.js';

import { createColorFns } from './colors.js';
import {
  formatConfigDisplay,
  formatDuration,
  formatFileSize,
  formatRulesTable,
  formatWaypointCount,
} from './formatters.js';
import { type ColorFunctions, type ProgressReporterOptions, PHASE_NAMES } from './types.js';

export type { ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private silent: boolean;
  private useColor: boolean;
  private verbose: boolean;
  private currentPhaseName: string = '';

  // Color functions
  private c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;

    // Create color functions based on color setting
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`GPX Colorizer v${version}`));
    console.log('');
  }

  /**
   * Start timing the overall run
   */
  startRun(inputPath: string): void {
    this.startTime = Date.now();
    if (this.silent) return;
    console.log(`Input: ${this.c.cyan(inputPath)}`);
  }

  /**
   * Start a new pipeline phase
   */
  startPhase(phase: ColorizePhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];

    // Stop any existing spinner
    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: '  ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update phase progress with a counter
   */
  updateProgress(current: number, total: number): void {
    if (this.silent || !this.spinner) return;
    this.spinner.text = `${this.currentPhaseName}... ${current}/${total}`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: ColorizePhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const phaseName = PHASE_NAMES[phase];
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${phaseName}${detailStr}${durationStr}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${phaseName}${detailStr}${durationStr}`);
    }
  }

  /**
   * Fail the running phase
   */
  failPhase(error: string): void {
    if (this.silent || !this.spinner) return;

    this.spinner.fail(`${this.currentPhaseName}: ${error}`);
    this.spinner = null;
  }

  /**
   * Log a colored waypoint (verbose mode only)
   * Temporarily stops the spinner so the line does not interleave with it.
   */
  reportWaypoint(outcome: WaypointColoring): void {
    if (this.silent || !this.verbose || !outcome.color) return;

    const keyword = outcome.keyword ? this.c.dim(` (${outcome.keyword})`) : '';
    const line = ` -> colored '${outcome.name}' with ${this.c.cyan(outcome.color)}${keyword}`;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      console.log(line);
      this.spinner.start(currentText);
    } else {
      console.log(line);
    }
  }

  /**
   * Print the outcome of a run
   */
  printSummary(result: ColorizeResult): void {
    if (this.silent) return;

    const totalTime = Date.now() - this.startTime;

    console.log('');
    if (result.processedCount > 0) {
      console.log(this.c.green(`Successfully added color to ${result.processedCount} waypoints.`));
    } else {
      console.log(this.c.yellow('No waypoints were modified based on the keyword list.'));
    }

    if (!result.written) {
      console.log(`Dry run: no file written (would write ${this.c.cyan(result.outputPath)})`);
    } else if (result.processedCount > 0) {
      console.log(`Colored file saved to: ${this.c.cyan(result.outputPath)}`);
    } else {
      console.log(`Original file copied to: ${this.c.cyan(result.outputPath)}`);
    }

    console.log(
      this.c.dim(
        `  ${result.processedCount} of ${formatWaypointCount(result.totalWaypoints)} colored, ` +
          `${formatFileSize(result.outputBytes)}, ${formatDuration(totalTime)}`,
      ),
    );
  }

  /**
   * Print the resolved configuration
   */
  printConfig(config: ColorizerConfig, raw: string): void {
    console.log(formatConfigDisplay(config, this.c));
    console.log('');
    console.log('Raw configuration:');
    console.log(raw);
  }

  /**
   * Print the keyword table
   */
  printRules(rules: ColorRules): void {
    console.log(this.c.bold('Keyword rules (first match wins):'));
    for (const line of formatRulesTable(rules, this.c)) {
      console.log(line);
    }
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

/**
 * Create a progress callback for the colorize pipeline
 *
 * Starts a spinner on the first event of each phase and completes the
 * previous one. The annotating phase completes with the waypoint count.
 */
export function createPipelineProgressCallback(
  reporter: ProgressReporter,
): ColorizeProgressCallback {
  let currentPhase: ColorizePhase | null = null;
  let waypointTotal = 0;

  return (phase, current, total) => {
    // Start new phase
    if (phase !== currentPhase) {
      if (currentPhase) {
        const detail =
          currentPhase === 'annotating' ? formatWaypointCount(waypointTotal) : undefined;
        reporter.completePhase(currentPhase, detail);
      }
      currentPhase = phase;
      if (phase === 'complete') {
        currentPhase = null;
        return;
      }
      reporter.startPhase(phase);
    }

    if (phase === 'annotating') {
      waypointTotal = total;
    }

    // Update progress
    if (total > 0) {
      reporter.updateProgress(current, total);
    }
  };
}
