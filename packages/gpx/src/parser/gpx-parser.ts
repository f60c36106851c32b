import { DOMParser } from '@xmldom/xmldom';

import { GpxDocument } from '../document/gpx-document.js';
import { GpxParseError } from '../errors.js';

import { findWellFormednessProblem } from './well-formedness.js';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Location suffix xmldom appends to messages when given a locator
 */
const LOCATION_PATTERN = /#\[line:(\d+),col:(\d+)\]/;

/**
 * Parse GPX text into a GpxDocument
 *
 * @param xml - The GPX content to parse
 * @returns The parsed document
 * @throws GpxParseError if the XML is malformed or has no root element
 */
export function parseGpxString(xml: string): GpxDocument {
  const source = xml.startsWith(BYTE_ORDER_MARK) ? xml.slice(1) : xml;
  if (!source.trim()) {
    throw new GpxParseError('Failed to parse GPX: document is empty', 'empty document');
  }

  const structural = findWellFormednessProblem(source);
  if (structural) {
    throw new GpxParseError(
      `Failed to parse GPX: ${structural.reason}`,
      structural.reason,
      structural.line,
      structural.column,
    );
  }

  const problems: string[] = [];
  const collect = (message: string): void => {
    problems.push(message);
  };

  // xmldom recovers after a warning by restructuring the tree
  const parser = new DOMParser({
    locator: {},
    errorHandler: {
      warning: collect,
      error: collect,
      fatalError: collect,
    },
  });

  let dom: Document;
  try {
    dom = parser.parseFromString(source, 'text/xml');
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
    throw toParseError(problems);
  }

  if (problems.length > 0) {
    throw toParseError(problems);
  }
  if (!dom.documentElement) {
    throw new GpxParseError('Failed to parse GPX: no root element', 'no root element');
  }

  return new GpxDocument(dom);
}

function toParseError(problems: string[]): GpxParseError {
  const first = problems[0] ?? 'unknown error';
  const reason = first
    .replace(/^\[xmldom \w+\]\s*/, '')
    .replace(/\s*@[^@]*$/, '')
    .trim();
  const location = LOCATION_PATTERN.exec(first);

  if (location) {
    return new GpxParseError(
      `Failed to parse GPX: ${reason}`,
      reason,
      Number(location[1]),
      Number(location[2]),
    );
  }
  return new GpxParseError(`Failed to parse GPX: ${reason}`, reason);
}
