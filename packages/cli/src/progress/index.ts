/**
 * Progress module exports
 */

export type { ProgressReporterOptions } from './reporter.js';
export { ProgressReporter, createPipelineProgressCallback } from './reporter.js';
export { createColorFns } from './colors.js';
export { PHASE_NAMES, type ColorFn, type ColorFunctions } from './types.js';
export {
  formatConfigDisplay,
  formatRulesTable,
  formatDuration,
  formatFileSize,
  formatWaypointCount,
} from './formatters.js';
