/**
 * Shared types for progress reporter components
 */

import type { ColorizePhase } from '@gpx-colorizer/core';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<ColorizePhase, string> = {
  reading: 'Reading GPX file',
  parsing: 'Parsing GPX',
  annotating: 'Coloring waypoints',
  rendering: 'Rendering output',
  writing: 'Writing output',
  complete: 'Complete',
};

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Log every colored waypoint (default: false) */
  verbose?: boolean;
}
