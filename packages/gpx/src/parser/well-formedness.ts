/**
 * Structural pre-check run before the DOM parser
 *
 * @xmldom/xmldom 0.8 recovers silently from a mismatched end tag, an
 * unclosed element and a bare ampersand. This scan reports them with a
 * location instead.
 */

/**
 * First structural problem found in a document
 */
export interface WellFormednessProblem {
  reason: string;
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
}

export const UNEXPECTED_END = 'unexpected end of document';

const NAME_PATTERN = /^[^\s/>="'<]+/;
const REFERENCE_PATTERN = /^&(?:[A-Za-z_:][\w.:-]*|#[0-9]+|#x[0-9A-Fa-f]+);/;

interface OpenElement {
  name: string;
  offset: number;
}

/**
 * Scan `source` for unbalanced tags, content outside the root element and
 * unescaped ampersands
 *
 * @returns The first problem, or undefined when none is found
 */
export function findWellFormednessProblem(source: string): WellFormednessProblem | undefined {
  const open: OpenElement[] = [];
  let rootClosed = false;
  let offset = 0;

  const problem = (reason: string, at: number): WellFormednessProblem => ({
    reason,
    ...locate(source, at),
  });

  while (offset < source.length) {
    const tagStart = source.indexOf('<', offset);
    const textEnd = tagStart < 0 ? source.length : tagStart;
    const text = source.slice(offset, textEnd);

    const ampersand = findBareAmpersand(text);
    if (ampersand >= 0) {
      return problem("unescaped '&' (write it as &amp;)", offset + ampersand);
    }
    if (open.length === 0 && text.trim()) {
      return problem('text outside the root element', offset + text.search(/\S/));
    }
    if (tagStart < 0) {
      break;
    }

    if (source.startsWith('<!--', tagStart)) {
      const end = source.indexOf('-->', tagStart + 4);
      if (end < 0) return problem(`${UNEXPECTED_END}: comment is not closed`, source.length);
      offset = end + 3;
    } else if (source.startsWith('<![CDATA[', tagStart)) {
      if (open.length === 0) return problem('text outside the root element', tagStart);
      const end = source.indexOf(']]>', tagStart + 9);
      if (end < 0) return problem(`${UNEXPECTED_END}: CDATA section is not closed`, source.length);
      offset = end + 3;
    } else if (source.startsWith('<?', tagStart)) {
      const end = source.indexOf('?>', tagStart + 2);
      if (end < 0) return problem(`${UNEXPECTED_END}: processing instruction is not closed`, source.length);
      offset = end + 2;
    } else if (source.startsWith('<!', tagStart)) {
      const end = findDeclarationEnd(source, tagStart + 2);
      if (end < 0) return problem(`${UNEXPECTED_END}: declaration is not closed`, source.length);
      offset = end + 1;
    } else if (source.startsWith('</', tagStart)) {
      const name = NAME_PATTERN.exec(source.slice(tagStart + 2))?.[0];
      if (!name) return problem("unescaped '<' (write it as &lt;)", tagStart);
      const end = source.indexOf('>', tagStart + 2 + name.length);
      if (end < 0) return problem(UNEXPECTED_END, source.length);

      const expected = open.pop();
      if (!expected) return problem(`unexpected end tag </${name}>`, tagStart);
      if (expected.name !== name) {
        return problem(`mismatched end tag: expected </${expected.name}> but found </${name}>`, tagStart);
      }
      if (open.length === 0) rootClosed = true;
      offset = end + 1;
    } else {
      const name = NAME_PATTERN.exec(source.slice(tagStart + 1))?.[0];
      if (!name) return problem("unescaped '<' (write it as &lt;)", tagStart);
      if (rootClosed && open.length === 0) {
        return problem(`element <${name}> after the root element`, tagStart);
      }

      const end = findTagEnd(source, tagStart + 1 + name.length);
      if (end < 0) return problem(UNEXPECTED_END, source.length);
      if (source[end] === '<') return problem(`start tag <${name}> is not complete`, tagStart);

      const attributes = source.slice(tagStart, end);
      const attributeAmpersand = findBareAmpersand(attributes);
      if (attributeAmpersand >= 0) {
        return problem("unescaped '&' (write it as &amp;)", tagStart + attributeAmpersand);
      }

      if (source[end - 1] === '/') {
        if (open.length === 0) rootClosed = true;
      } else {
        open.push({ name, offset: tagStart });
      }
      offset = end + 1;
    }
  }

  const unclosed = open[open.length - 1];
  if (unclosed) {
    return problem(`${UNEXPECTED_END}: <${unclosed.name}> is not closed`, source.length);
  }
  return undefined;
}

/**
 * Index of the first `&` that does not start an entity or character
 * reference, or -1
 */
function findBareAmpersand(text: string): number {
  let index = text.indexOf('&');
  while (index >= 0) {
    if (!REFERENCE_PATTERN.test(text.slice(index))) {
      return index;
    }
    index = text.indexOf('&', index + 1);
  }
  return -1;
}

/**
 * Index of the `>` closing a start tag, or of a stray `<` before it;
 * quoted attribute values are skipped
 */
function findTagEnd(source: string, from: number): number {
  let quote: string | undefined;
  for (let i = from; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '>' || ch === '<') {
      return i;
    }
  }
  return -1;
}

/**
 * Index of the `>` closing a `<!DOCTYPE ...>` style declaration, including
 * an internal subset in brackets
 */
function findDeclarationEnd(source: string, from: number): number {
  const close = source.indexOf('>', from);
  const bracket = source.indexOf('[', from);
  if (bracket < 0 || (close >= 0 && close < bracket)) {
    return close;
  }
  const subsetEnd = source.indexOf(']', bracket);
  return subsetEnd < 0 ? -1 : source.indexOf('>', subsetEnd);
}

function locate(source: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}
