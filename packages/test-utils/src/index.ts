/**
 * @gpx-colorizer/test-utils
 *
 * Shared test utilities for GPX Colorizer tests
 */

// Fixture loading
export {
  getFixturePath,
  loadGpxFixture,
  listGpxFixtures,
  copyFixtureTo,
} from './fixtures/loader.js';

export { createTempDir, removeTempDir, listFiles } from './fixtures/temp-dir.js';

// Builders
export {
  GpxBuilder,
  gpx,
  escapeXml,
  GPX_NAMESPACE,
  type WaypointSpec,
  type PointSpec,
} from './builders/gpx-builder.js';
