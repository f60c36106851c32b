/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(__dirname, 'gpx', relativePath);
}

/**
 * Load a GPX fixture file synchronously
 */
export function loadGpxFixture(relativePath: string): string {
  return fs.readFileSync(getFixturePath(relativePath), 'utf-8');
}

/**
 * List all GPX fixtures
 */
export function listGpxFixtures(): string[] {
  return fs
    .readdirSync(path.join(__dirname, 'gpx'))
    .filter((f) => f.endsWith('.gpx'))
    .sort();
}

/**
 * Copy a fixture into a directory (for tests that write beside their input)
 */
export function copyFixtureTo(relativePath: string, directory: string): string {
  const target = path.join(directory, path.basename(relativePath));
  fs.copyFileSync(getFixturePath(relativePath), target);
  return target;
}
