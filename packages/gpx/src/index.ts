/**
 * @gpx-colorizer/gpx - GPX document model for the colorizer
 *
 * This package handles:
 * - Decoding GPX bytes by their declared encoding
 * - Parsing GPX text into a namespace-aware tree
 * - Finding, creating and appending nodes in the GPX 1.1 namespace
 * - Rendering the tree back to text with a UTF-8 declaration
 */

export const VERSION = '0.1.0';

export { GpxDocument, GPX_NAMESPACE } from './document/gpx-document.js';

export { parseGpxString as parseGpx } from './parser/gpx-parser.js';
export { decodeGpx, detectGpxEncoding } from './parser/gpx-decoder.js';

export { renderGpxString as renderGpx, XML_DECLARATION } from './renderer/gpx-renderer.js';

export { GpxParseError } from './errors.js';
