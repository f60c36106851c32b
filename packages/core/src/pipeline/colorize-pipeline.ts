/**
 * Colorize Pipeline
 *
 * Runs one GPX file through the full process:
 * 1. Read the input file
 * 2. Decode it by its declared encoding and parse it into a document
 * 3. Annotate matching waypoints
 * 4. Render the document
 * 5. Write it to the output path (skipped in dry-run mode)
 *
 * A parse failure stops the run before anything is written.
 */

import { decodeGpx, parseGpx, renderGpx } from '@gpx-colorizer/gpx';

import { annotateWaypoints, type WaypointColoring } from '../annotator/waypoint-annotator.js';
import { DEFAULT_COLOR_RULES, type ColorRules } from '../classifier/color-rules.js';
import {
  DEFAULT_OUTPUT_SUFFIX,
  assertDistinctOutput,
  deriveOutputPath,
  readInputFile,
  writeTextFile,
} from '../io/file-io.js';

/**
 * Pipeline phases reported through onProgress
 */
export type ColorizePhase =
  | 'reading'
  | 'parsing'
  | 'annotating'
  | 'rendering'
  | 'writing'
  | 'complete';

/**
 * Progress callback: `current` of `total` units done within `phase`
 */
export type ColorizeProgressCallback = (
  phase: ColorizePhase,
  current: number,
  total: number,
) => void;

/**
 * Options for colorizing a file
 */
export interface ColorizeOptions {
  /** Ordered rule table (default: DEFAULT_COLOR_RULES) */
  rules?: ColorRules;
  /** Suffix for the derived output path (default: _color) */
  suffix?: string;
  /** Explicit output path; overrides the derived one */
  outputPath?: string;
  /** Write via temporary file and rename (default: true) */
  atomic?: boolean;
  /** Classify and count without writing the output */
  dryRun?: boolean;
  /** Called for each waypoint after it is handled */
  onWaypoint?: (outcome: WaypointColoring) => void;
  /** Called as the pipeline moves through its phases */
  onProgress?: ColorizeProgressCallback;
}

/**
 * Result of colorizing a file
 */
export interface ColorizeResult {
  inputPath: string;
  outputPath: string;
  /** Waypoints that received a color extension */
  processedCount: number;
  /** Waypoints in the document */
  totalWaypoints: number;
  /** Per-waypoint outcomes in document order */
  colorings: WaypointColoring[];
  /** False in dry-run mode */
  written: boolean;
  /** Size of the rendered output in bytes */
  outputBytes: number;
}

/**
 * Colorize the waypoints of a GPX file and write the result beside it
 *
 * @throws InputReadError if the input cannot be read
 * @throws GpxParseError if the input cannot be decoded or is not well-formed XML
 * @throws OutputPathError if the output path is the input path
 * @throws OutputWriteError if the output cannot be written
 */
export function colorizeFile(inputPath: string, options: ColorizeOptions = {}): ColorizeResult {
  const rules = options.rules ?? DEFAULT_COLOR_RULES;
  const outputPath =
    options.outputPath ?? deriveOutputPath(inputPath, options.suffix ?? DEFAULT_OUTPUT_SUFFIX);
  const progress = options.onProgress;

  assertDistinctOutput(inputPath, outputPath);

  progress?.('reading', 0, 1);
  const bytes = readInputFile(inputPath);
  progress?.('reading', 1, 1);

  progress?.('parsing', 0, 1);
  const document = parseGpx(decodeGpx(bytes));
  progress?.('parsing', 1, 1);

  const total = document.waypoints().length;
  progress?.('annotating', 0, total);
  const annotation = annotateWaypoints(document, rules, {
    onWaypoint: (outcome) => {
      options.onWaypoint?.(outcome);
      progress?.('annotating', outcome.index + 1, total);
    },
  });

  progress?.('rendering', 0, 1);
  const output = renderGpx(annotation.document);
  progress?.('rendering', 1, 1);

  let outputBytes = Buffer.byteLength(output, 'utf-8');
  if (!options.dryRun) {
    progress?.('writing', 0, 1);
    outputBytes = writeTextFile(outputPath, output, { atomic: options.atomic ?? true });
    progress?.('writing', 1, 1);
  }

  progress?.('complete', 1, 1);

  return {
    inputPath,
    outputPath,
    processedCount: annotation.processedCount,
    totalWaypoints: annotation.totalWaypoints,
    colorings: annotation.colorings,
    written: !options.dryRun,
    outputBytes,
  };
}

/**
 * Result of colorizing GPX text in memory
 */
export interface ColorizedGpx {
  output: string;
  processedCount: number;
  totalWaypoints: number;
  colorings: WaypointColoring[];
}

/**
 * Colorize GPX text in memory
 *
 * @throws GpxParseError if the text is not well-formed XML
 */
export function colorizeGpx(text: string, rules: ColorRules = DEFAULT_COLOR_RULES): ColorizedGpx {
  const annotation = annotateWaypoints(parseGpx(text), rules);
  return {
    output: renderGpx(annotation.document),
    processedCount: annotation.processedCount,
    totalWaypoints: annotation.totalWaypoints,
    colorings: annotation.colorings,
  };
}
