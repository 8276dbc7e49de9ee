import { DOMParser } from '@xmldom/xmldom';

export const XML_NS = 'http://www.w3.org/XML/1998/namespace';
export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const SKOS_NS = 'http://www.w3.org/2004/02/skos/core#';
export const DCT_NS = 'http://purl.org/dc/terms/';
export const ATOM_NS = 'http://www.w3.org/2005/Atom';

export class XmlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XmlParseError';
  }
}

/**
 * Parses an XML document, failing on any parser error rather than returning
 * the partial tree xmldom would otherwise build.
 */
export const parseXml = (source: string): Document => {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (message: unknown) => {
        problems.push(String(message));
      },
      fatalError: (message: unknown) => {
        problems.push(String(message));
      },
    },
  });

  const document = parser.parseFromString(source, 'text/xml');
  if (problems.length > 0) {
    throw new XmlParseError(`Invalid XML: ${problems[0]}`);
  }
  if (!document || !document.documentElement) {
    throw new XmlParseError('Invalid XML: no document element');
  }
  return document;
};

interface ElementList {
  length: number;
  item(index: number): Element | null;
}

interface ElementContainer {
  getElementsByTagNameNS(namespace: string | null, localName: string): ElementList;
}

const collect = (nodes: ElementList): Element[] => {
  const result: Element[] = [];
  for (let i = 0; i < nodes.length; i += 1) {
    const node = nodes.item(i);
    if (node) result.push(node);
  }
  return result;
};

/** All descendants with the given namespace and local name. */
export const descendants = (root: ElementContainer, ns: string, localName: string): Element[] =>
  collect(root.getElementsByTagNameNS(ns, localName));

const isElement = (node: Node | null): node is Element => !!node && node.nodeType === 1;

/** Direct element children with the given namespace and local name. */
export const children = (parent: Element, ns: string, localName: string): Element[] => {
  const result: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i += 1) {
    const node = nodes.item(i);
    if (isElement(node) && node.namespaceURI === ns && node.localName === localName) {
      result.push(node);
    }
  }
  return result;
};

export const firstChild = (parent: Element, ns: string, localName: string): Element | undefined =>
  children(parent, ns, localName)[0];

export const textOf = (element: Element | undefined): string => (element?.textContent || '').trim();

export const languageOf = (element: Element): string | undefined => {
  const lang = element.getAttributeNS(XML_NS, 'lang') || element.getAttribute('xml:lang') || '';
  return lang.trim() || undefined;
};
