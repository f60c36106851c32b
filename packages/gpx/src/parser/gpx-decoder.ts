/**
 * Decode raw GPX bytes using the encoding named in the XML declaration
 */

import { GpxParseError } from '../errors.js';

const DECLARED_ENCODING = /^<\?xml\s[^?]*?encoding\s*=\s*["']([A-Za-z][\w.:-]*)["']/;
const DECLARATION_SCAN_BYTES = 256;

/**
 * Detect the encoding of a GPX file
 *
 * A UTF-16 byte-order mark wins; otherwise the `encoding` pseudo-attribute
 * of the declaration is used, defaulting to UTF-8.
 *
 * @returns Lowercased encoding label
 */
export function detectGpxEncoding(bytes: Uint8Array): string {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';

  const start = bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf ? 3 : 0;
  // The declaration itself is ASCII in every encoding detected here
  const head = String.fromCharCode(...bytes.subarray(start, start + DECLARATION_SCAN_BYTES));
  return DECLARED_ENCODING.exec(head)?.[1]?.toLowerCase() ?? 'utf-8';
}

/**
 * Decode GPX bytes to text
 *
 * @throws GpxParseError if the encoding is unknown or the bytes are not
 * valid in it
 */
export function decodeGpx(bytes: Uint8Array): string {
  const encoding = detectGpxEncoding(bytes);

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    const reason = `unsupported encoding "${encoding}"`;
    throw new GpxParseError(`Failed to parse GPX: ${reason}`, reason);
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    const reason = `content is not valid ${encoding}`;
    throw new GpxParseError(`Failed to parse GPX: ${reason}`, reason);
  }
}
