import { STATUS_CODES } from 'node:http';
import { MergeError } from './errors';
import { DEFAULT_NAMESPACES, NS_DAV } from './namespaces';
import { encodeProperty } from './properties';
import type { PropertyErrorKind, PropertySet } from './resolvers';
import {
  type NamespaceBindings,
  type XmlElement,
  element,
  serializeXml,
} from './xml';

/** One multistatus body before serialization. */
export interface MultistatusDocument {
  namespaces: NamespaceBindings;
  responses: XmlElement[];
}

export const ERROR_STATUS: Readonly<Record<PropertyErrorKind, number>> = {
  'not-found': 404,
  forbidden: 403,
  internal: 500,
  'bad-request': 400,
};

// Order in which propstat groups appear within a response.
const GROUP_ORDER = [200, 404, 403, 500, 400];

export function statusLine(status: number): string {
  return `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Unknown'}`;
}

const dav = (name: string, children: ReadonlyArray<XmlElement | string>) =>
  element(NS_DAV, name, children);

/**
 * Renders one resource: its href followed by a propstat per status that has
 * at least one property. Failed properties are emitted as empty elements.
 */
export function buildResponse(href: string, properties: PropertySet): XmlElement {
  const groups = new Map<number, XmlElement[]>();

  for (const { name, outcome } of properties.values()) {
    const status = outcome.ok ? 200 : ERROR_STATUS[outcome.error];
    const rendered = outcome.ok
      ? encodeProperty(name, outcome.value)
      : element(name.namespace, name.name);
    const group = groups.get(status) ?? [];
    group.push(rendered);
    groups.set(status, group);
  }

  const propstats = GROUP_ORDER.flatMap((status) => {
    const group = groups.get(status);
    if (!group || group.length === 0) return [];
    return [dav('propstat', [dav('prop', group), dav('status', [statusLine(status)])])];
  });

  return dav('response', [dav('href', [href]), ...propstats]);
}

/** A response carrying only a status, e.g. for a multiget href that is missing. */
export function buildStatusResponse(href: string, status: number): XmlElement {
  return dav('response', [
    dav('href', [href]),
    dav('status', [statusLine(status)]),
  ]);
}

export function buildMultistatus(
  responses: XmlElement[],
  namespaces: NamespaceBindings = DEFAULT_NAMESPACES,
): MultistatusDocument {
  return { namespaces, responses };
}

/**
 * Combines documents into one. Responses keep their order and content;
 * namespace bindings are unioned with the first binding of a prefix kept.
 */
export function mergeDocuments(
  documents: ReadonlyArray<MultistatusDocument | null | undefined>,
): MultistatusDocument {
  if (documents.length === 0) {
    throw new MergeError('no documents to merge');
  }
  const present = documents.filter(
    (document): document is MultistatusDocument => document != null,
  );
  if (present.length === 1) return present[0];

  const namespaces = new Map<string, string>();
  const responses: XmlElement[] = [];
  for (const document of present) {
    for (const [prefix, uri] of document.namespaces) {
      if (!namespaces.has(prefix)) namespaces.set(prefix, uri);
    }
    responses.push(...document.responses);
  }
  return { namespaces: [...namespaces], responses };
}

export function multistatusToXml(document: MultistatusDocument): string {
  return serializeXml(
    element(NS_DAV, 'multistatus', document.responses),
    document.namespaces,
  );
}
