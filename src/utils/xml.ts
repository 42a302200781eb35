/**
 * XML helpers
 *
 * Documents are described as plain objects in fast-xml-parser's convention:
 * attributes carry an `@_` prefix, element text sits under `#text`, arrays
 * repeat an element.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

export type XmlValue = string | number | XmlElement | XmlElement[];

export interface XmlElement {
  [name: string]: XmlValue;
}

const ATTRIBUTE_PREFIX = '@_';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: '#text',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

/** XML declaration entry, to be the first key of a document */
export const XML_DECLARATION: XmlElement = {
  [`${ATTRIBUTE_PREFIX}version`]: '1.0',
  [`${ATTRIBUTE_PREFIX}encoding`]: 'UTF-8',
};

export function buildXml(document: XmlElement): string {
  return builder.build(document);
}

/**
 * Element with a text body and attributes
 */
export function textElement(text: string | number, attributes: Record<string, string | number> = {}): XmlElement {
  const element: XmlElement = {};
  for (const [name, value] of Object.entries(attributes)) {
    element[`${ATTRIBUTE_PREFIX}${name}`] = value;
  }
  element['#text'] = text;
  return element;
}

/**
 * @returns the parser's message when the document is not well-formed
 */
export function findWellFormednessError(xml: string): string | undefined {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return undefined;
  }
  return `${result.err.msg} (line ${result.err.line}, column ${result.err.col})`;
}

/**
 * Parse a document, keeping attributes and every value as a string.
 *
 * @param arrayTags - elements that always parse to arrays, even when single
 */
export function parseXml(xml: string, arrayTags: ReadonlySet<string>): unknown {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: '#text',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
      !isAttribute && arrayTags.has(tagName),
  });
  return parser.parse(xml);
}

/**
 * Read a child of a parsed node, if the node is an object
 */
export function child(node: unknown, name: string): unknown {
  if (typeof node !== 'object' || node === null) {
    return undefined;
  }
  return new Map<string, unknown>(Object.entries(node)).get(name);
}

/**
 * Read an attribute of a parsed node as a string
 */
export function attribute(node: unknown, name: string): string | undefined {
  const value = child(node, `${ATTRIBUTE_PREFIX}${name}`);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Text content of a parsed node, whether it parsed to a bare string or to
 * an object with attributes
 */
export function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  const text = child(node, '#text');
  return typeof text === 'string' ? text : undefined;
}

/**
 * Children of a parsed node as a list (missing becomes empty)
 */
export function children(node: unknown, name: string): unknown[] {
  const value = child(node, name);
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
