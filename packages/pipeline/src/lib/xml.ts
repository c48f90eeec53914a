import { XMLBuilder, XMLParser } from 'fast-xml-parser';

export type XmlAttributeValue = string | number | boolean;

/** A node of a generated document. Built as a tree, serialized once. */
export interface XmlElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, XmlAttributeValue>>;
  readonly children: readonly XmlElement[];
}

export function element(
  name: string,
  attributes: Record<string, XmlAttributeValue> = {},
  children: readonly XmlElement[] = []
): XmlElement {
  return Object.freeze({
    name,
    attributes: Object.freeze({ ...attributes }),
    children: Object.freeze([...children]),
  });
}

/** `<name value="..."/>`, the option form used by SUMO configuration files. */
export function option(name: string, value: XmlAttributeValue): XmlElement {
  return element(name, { value });
}

const ATTRIBUTE_PREFIX = '@_';

/** fast-xml-parser `preserveOrder` shape: `{ tag: children[], ':@': attributes }`. */
interface OrderedNode {
  [key: string]: OrderedNode[] | Record<string, string>;
}

function toOrdered(node: XmlElement): OrderedNode {
  const ordered: OrderedNode = {
    [node.name]: node.children.map(toOrdered),
  };
  const attributeNames = Object.keys(node.attributes);
  if (attributeNames.length > 0) {
    const attributes: Record<string, string> = {};
    for (const name of attributeNames) {
      attributes[`${ATTRIBUTE_PREFIX}${name}`] = formatAttribute(node.attributes[name]);
    }
    ordered[':@'] = attributes;
  }
  return ordered;
}

function formatAttribute(value: XmlAttributeValue | undefined): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value === undefined ? '' : String(value);
}

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  format: true,
  indentBy: '\t',
});

export interface SerializeOptions {
  declaration?: boolean;
}

export function serializeXml(root: XmlElement, options: SerializeOptions = {}): string {
  const body = String(builder.build([toOrdered(root)])).trim();
  const declaration = options.declaration ? '<?xml version="1.0" encoding="UTF-8"?>\n' : '';
  return `${declaration}${body}\n`;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
});

/** Parse an XML document into plain objects; attributes keep their string form. */
export function parseXml(text: string): Record<string, unknown> {
  const parsed: unknown = parser.parse(text);
  return isRecord(parsed) ? parsed : {};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
