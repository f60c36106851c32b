/**
 * Temporary directories for tests that touch the filesystem
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Create a fresh temporary directory
 */
export function createTempDir(prefix = 'gpx-colorizer-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a temporary directory and everything in it
 */
export function removeTempDir(directory: string): void {
  fs.rmSync(directory, { recursive: true, force: true });
}

/**
 * List file names in a directory, sorted
 */
export function listFiles(directory: string): string[] {
  return fs.readdirSync(directory).sort();
}
