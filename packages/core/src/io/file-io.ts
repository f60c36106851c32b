/**
 * File input and output for GPX documents
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { InputReadError, OutputPathError, OutputWriteError } from '../errors.js';

/**
 * Suffix inserted before the extension of the output file
 */
export const DEFAULT_OUTPUT_SUFFIX = '_color';

/**
 * Derive the output path: same directory and base name, with the suffix
 * inserted before the extension (`hike.gpx` -> `hike_color.gpx`)
 */
export function deriveOutputPath(
  inputPath: string,
  suffix: string = DEFAULT_OUTPUT_SUFFIX,
): string {
  const ext = path.extname(inputPath);
  const base = inputPath.slice(0, inputPath.length - ext.length);
  return `${base}${suffix}${ext}`;
}

/**
 * Throw if writing to `outputPath` would replace `inputPath`
 */
export function assertDistinctOutput(inputPath: string, outputPath: string): void {
  if (path.resolve(inputPath) === path.resolve(outputPath)) {
    throw new OutputPathError(outputPath);
  }
}

/**
 * Read the raw bytes of an input file; decoding is left to the GPX parser,
 * which honours the declared encoding
 *
 * @throws InputReadError if the file is missing or unreadable
 */
export function readInputFile(filePath: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    throw new InputReadError(filePath, describeFsError(error));
  }
}

/**
 * Options for writing output
 */
export interface WriteOptions {
  /** Write to a temporary sibling and rename over the target (default: true) */
  atomic?: boolean;
}

/**
 * Write UTF-8 text to a file
 *
 * In atomic mode the target is either the complete new content or left as
 * it was; the temporary file is removed on failure.
 *
 * @returns Number of bytes written
 * @throws OutputWriteError if the file cannot be written
 */
export function writeTextFile(
  filePath: string,
  content: string,
  options: WriteOptions = {},
): number {
  const atomic = options.atomic ?? true;
  const bytes = Buffer.byteLength(content, 'utf-8');

  if (!atomic) {
    try {
      fs.writeFileSync(filePath, content, 'utf-8');
    } catch (error) {
      throw new OutputWriteError(filePath, describeFsError(error));
    }
    return bytes;
  }

  const tempPath = temporaryPathFor(filePath);
  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw new OutputWriteError(filePath, describeFsError(error));
  }
  return bytes;
}

/**
 * Hidden sibling path used while an atomic write is in progress
 */
export function temporaryPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const name = path.basename(filePath);
  return path.join(dir, `.${name}.${process.pid}.${Date.now()}.tmp`);
}

function describeFsError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? `${code} (${error.message})` : error.message;
  }
  return String(error);
}
