import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { RequestParseError } from './errors';
import type { XmlName } from './types';

export interface XmlElement extends XmlName {
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | string;

/** Ordered prefix → namespace URI bindings. */
export type NamespaceBindings = ReadonlyArray<readonly [string, string]>;

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: false,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  suppressEmptyNode: true,
  format: false,
});

export function element(
  namespace: string,
  name: string,
  children: readonly XmlNode[] = [],
  attributes: Record<string, string> = {},
): XmlElement {
  return { namespace, name, attributes, children };
}

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== 'string';
}

export function childElements(el: XmlElement): XmlElement[] {
  return el.children.filter(isElement);
}

/** Finds children by local name; prefixes and namespaces are ignored. */
export function findChildren(el: XmlElement, localName: string): XmlElement[] {
  return childElements(el).filter((child) => child.name === localName);
}

export function findChild(
  el: XmlElement,
  localName: string,
): XmlElement | undefined {
  return childElements(el).find((child) => child.name === localName);
}

export function textContent(el: XmlElement): string {
  return el.children
    .map((child) => (isElement(child) ? textContent(child) : child))
    .join('');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitQName(qname: string): [string, string] {
  const index = qname.indexOf(':');
  return index === -1
    ? ['', qname]
    : [qname.slice(0, index), qname.slice(index + 1)];
}

function convertNode(
  node: unknown,
  scope: ReadonlyMap<string, string>,
): XmlNode | undefined {
  if (!isRecord(node)) return undefined;
  if (TEXT_KEY in node) return String(node[TEXT_KEY]);

  const tag = Object.keys(node).find((key) => key !== ATTRS_KEY);
  if (!tag || tag.startsWith('?') || tag.startsWith('!')) return undefined;

  const rawAttributes = node[ATTRS_KEY];
  const local = new Map(scope);
  const attributes: Record<string, string> = {};

  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      const attr = key.slice(ATTR_PREFIX.length);
      const text = String(value);
      if (attr === 'xmlns') local.set('', text);
      else if (attr.startsWith('xmlns:')) local.set(attr.slice(6), text);
      else attributes[splitQName(attr)[1]] = text;
    }
  }

  const [prefix, name] = splitQName(tag);
  const namespace = local.get(prefix);
  if (prefix && namespace === undefined) {
    throw new RequestParseError(`undeclared namespace prefix '${prefix}'`);
  }

  const rawChildren = node[tag];
  const converted = Array.isArray(rawChildren)
    ? rawChildren.flatMap((child: unknown) => {
        const result = convertNode(child, local);
        return result === undefined ? [] : [result];
      })
    : [];
  // Whitespace between child elements is layout, not content.
  const children = converted.some(isElement)
    ? converted.filter((child) => isElement(child) || child.trim() !== '')
    : converted;

  return { namespace: namespace ?? '', name, attributes, children };
}

/** Parses an XML document into its root element. */
export function parseXml(text: string): XmlElement {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new RequestParseError(`malformed XML at line ${line}: ${msg}`);
  }

  const parsed: unknown = parser.parse(text);
  const nodes = Array.isArray(parsed) ? parsed : [];
  for (const node of nodes) {
    const converted = convertNode(node, new Map());
    if (converted !== undefined && isElement(converted)) return converted;
  }
  throw new RequestParseError('XML document has no root element');
}

function toBuilderNode(
  node: XmlNode,
  prefixes: ReadonlyMap<string, string>,
): Record<string, unknown> {
  if (!isElement(node)) return { [TEXT_KEY]: node };

  const attributes: Record<string, string> = {};
  const prefix = prefixes.get(node.namespace);
  let qname = node.name;
  if (prefix !== undefined) {
    qname = prefix ? `${prefix}:${node.name}` : node.name;
  } else if (node.namespace) {
    attributes[`${ATTR_PREFIX}xmlns`] = node.namespace;
  }
  for (const [key, value] of Object.entries(node.attributes)) {
    attributes[`${ATTR_PREFIX}${key}`] = value;
  }

  const built: Record<string, unknown> = {
    [qname]: node.children.map((child) => toBuilderNode(child, prefixes)),
  };
  if (Object.keys(attributes).length > 0) built[ATTRS_KEY] = attributes;
  return built;
}

/**
 * Serializes `root` with the given prefix bindings declared on it. Elements
 * in a namespace without a binding declare it as their default namespace.
 */
export function serializeXml(
  root: XmlElement,
  bindings: NamespaceBindings = [],
): string {
  const prefixes = new Map<string, string>();
  const declarations: Record<string, string> = {};
  for (const [prefix, uri] of bindings) {
    if (prefixes.has(uri)) continue;
    prefixes.set(uri, prefix);
    declarations[prefix ? `xmlns:${prefix}` : 'xmlns'] = uri;
  }

  const declared: XmlElement = {
    ...root,
    attributes: { ...declarations, ...root.attributes },
  };
  const body: string = builder.build([toBuilderNode(declared, prefixes)]);
  return `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
}
