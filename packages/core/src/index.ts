/**
 * @gpx-colorizer/core - Waypoint coloring for GPX Colorizer
 *
 * This package contains:
 * - The keyword rule table and name classifier
 * - The annotator that appends color extensions to waypoints
 * - The file pipeline (read, parse, annotate, render, write)
 */

export const VERSION = '0.1.0';

// Re-export classifier utilities
export * from './classifier/index.js';

// Re-export annotator
export {
  annotateWaypoints,
  appendColorExtension,
  UNNAMED_WAYPOINT,
  COLOR_EXTENSION,
} from './annotator/waypoint-annotator.js';
export type {
  WaypointColoring,
  AnnotateOptions,
  AnnotationResult,
} from './annotator/waypoint-annotator.js';

// Re-export pipeline
export { colorizeFile, colorizeGpx } from './pipeline/colorize-pipeline.js';
export type {
  ColorizePhase,
  ColorizeProgressCallback,
  ColorizeOptions,
  ColorizeResult,
  ColorizedGpx,
} from './pipeline/colorize-pipeline.js';

// Re-export file helpers
export {
  DEFAULT_OUTPUT_SUFFIX,
  deriveOutputPath,
  assertDistinctOutput,
  readInputFile,
  writeTextFile,
  temporaryPathFor,
} from './io/file-io.js';
export type { WriteOptions } from './io/file-io.js';

// Re-export error types
export { ColorizeError, InputReadError, OutputWriteError, OutputPathError } from './errors.js';
