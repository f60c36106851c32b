import { XMLSerializer } from '@xmldom/xmldom';

import type { GpxDocument } from '../document/gpx-document.js';

/**
 * Declaration line written at the top of every rendered document
 */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const TEXT_NODE = 3;
const PROCESSING_INSTRUCTION_NODE = 7;

/**
 * Render a GpxDocument back to GPX text
 *
 * Namespace declarations and node order are kept as they are in the tree.
 * Any declaration carried over from the input is replaced by XML_DECLARATION.
 *
 * @param document - The document to render
 * @returns GPX text ending with a newline
 */
export function renderGpxString(document: GpxDocument): string {
  const serializer = new XMLSerializer();
  const parts: string[] = [XML_DECLARATION];

  const nodes = document.dom.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    // Whitespace between top-level nodes is replaced by the line breaks below
    if (!node || node.nodeType === TEXT_NODE || isXmlDeclaration(node)) {
      continue;
    }
    parts.push(serializer.serializeToString(node));
  }

  return `${parts.join('\n')}\n`;
}

function isXmlDeclaration(node: Node): boolean {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE && node.nodeName.toLowerCase() === 'xml';
}
