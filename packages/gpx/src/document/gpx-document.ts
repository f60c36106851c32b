/**
 * Namespace-aware handle over a parsed GPX tree.
 *
 * Node handles are the DOM elements themselves, so a waypoint found through
 * `waypoints()` can be passed straight back into `findChild` or `appendChild`.
 * Every lookup and creation happens inside the GPX 1.1 namespace.
 */

/**
 * Default namespace of GPX 1.1 documents
 */
export const GPX_NAMESPACE = 'http://www.topografix.com/GPX/1/1';

const ELEMENT_NODE = 1;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export class GpxDocument {
  constructor(
    readonly dom: Document,
    readonly namespace: string = GPX_NAMESPACE,
  ) {}

  /**
   * The document element (`<gpx>` for well-formed input)
   */
  get root(): Element | null {
    return this.dom.documentElement;
  }

  /**
   * Waypoints (`wpt` children of the root) in document order
   */
  waypoints(): Element[] {
    const root = this.root;
    return root ? this.findChildren(root, 'wpt') : [];
  }

  /**
   * First direct child of `parent` with the given local name, or null
   */
  findChild(parent: Element, localName: string): Element | null {
    for (const child of this.elementChildren(parent)) {
      if (this.matches(child, localName)) {
        return child;
      }
    }
    return null;
  }

  /**
   * All direct children of `parent` with the given local name
   */
  findChildren(parent: Element, localName: string): Element[] {
    return this.elementChildren(parent).filter((child) => this.matches(child, localName));
  }

  /**
   * Text content of the named child, or undefined when the child is missing
   */
  childText(parent: Element, localName: string): string | undefined {
    const child = this.findChild(parent, localName);
    return child?.textContent ?? undefined;
  }

  /**
   * Create a detached element in the document namespace.
   * The element is not part of the tree until appended.
   */
  createElement(localName: string, text?: string): Element {
    const element = this.dom.createElementNS(this.namespace, localName);
    if (text !== undefined) {
      element.appendChild(this.dom.createTextNode(text));
    }
    return element;
  }

  /**
   * Append `child` as the last child of `parent`
   */
  appendChild(parent: Element, child: Element): Element {
    parent.appendChild(child);
    return child;
  }

  private matches(element: Element, localName: string): boolean {
    return element.localName === localName && element.namespaceURI === this.namespace;
  }

  private elementChildren(parent: Element): Element[] {
    const elements: Element[] = [];
    const nodes = parent.childNodes;
    for (let i = 0; i < nodes.length; i++) {
      const node = nodes.item(i);
      if (node && isElement(node)) {
        elements.push(node);
      }
    }
    return elements;
  }
}
