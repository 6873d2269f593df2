import { RequestParseError } from './errors';
import { type CompFilter, parseFilter } from './filter';
import type { XmlName } from './types';
import { INFINITE_DEPTH } from './walker';
import {
  type XmlElement,
  childElements,
  findChild,
  findChildren,
  parseXml,
  textContent,
} from './xml';

export type PropertyRequest =
  | { kind: 'prop'; names: XmlName[] }
  | { kind: 'allprop'; include: XmlName[] }
  | { kind: 'propname' };

export type ReportRequest =
  | {
      kind: 'calendar-query';
      properties: PropertyRequest;
      filter: CompFilter | null;
    }
  | { kind: 'calendar-multiget'; properties: PropertyRequest; hrefs: string[] };

/** Properties a MKCALENDAR (or extended MKCOL) body may set. */
export interface MkcalendarRequest {
  displayName?: string;
  description?: string;
  color?: string;
  /** iCalendar text holding a VTIMEZONE. */
  timezone?: string;
  timezoneId?: string;
  components: string[];
}

const ALLPROP: PropertyRequest = { kind: 'allprop', include: [] };

const nameOf = ({ namespace, name }: XmlElement): XmlName => ({
  namespace,
  name,
});

function parseBody(body: string, expected: readonly string[]): XmlElement {
  const root = parseXml(body);
  if (!expected.includes(root.name)) {
    throw new RequestParseError(
      `unexpected root element <${root.name}>, expected <${expected.join('> or <')}>`,
    );
  }
  return root;
}

/** Reads the prop/allprop/propname selection of a PROPFIND or REPORT body. */
export function parsePropertyRequest(root: XmlElement): PropertyRequest {
  const prop = findChild(root, 'prop');
  if (prop) return { kind: 'prop', names: childElements(prop).map(nameOf) };
  if (findChild(root, 'propname')) return { kind: 'propname' };
  if (findChild(root, 'allprop')) {
    const include = findChild(root, 'include');
    return {
      kind: 'allprop',
      include: include ? childElements(include).map(nameOf) : [],
    };
  }
  return ALLPROP;
}

/** An empty body asks for all properties. */
export function parsePropfindRequest(body: string): PropertyRequest {
  if (body.trim() === '') return ALLPROP;
  return parsePropertyRequest(parseBody(body, ['propfind']));
}

export function parseReportRequest(body: string): ReportRequest {
  if (body.trim() === '') {
    throw new RequestParseError('REPORT requires a request body');
  }
  const root = parseXml(body);
  const properties = parsePropertyRequest(root);

  switch (root.name) {
    case 'calendar-query':
      return { kind: 'calendar-query', properties, filter: parseFilter(root) };
    case 'calendar-multiget':
      return {
        kind: 'calendar-multiget',
        properties,
        hrefs: findChildren(root, 'href')
          .map((href) => textContent(href).trim())
          .filter((href) => href !== ''),
      };
    default:
      throw new RequestParseError(`unsupported report: ${root.name}`);
  }
}

export function parseMkcalendarRequest(body: string): MkcalendarRequest {
  const request: MkcalendarRequest = { components: [] };
  if (body.trim() === '') return request;

  const root = parseBody(body, ['mkcalendar', 'mkcol']);
  const props = findChildren(root, 'set').flatMap((set) =>
    findChildren(set, 'prop').flatMap(childElements),
  );

  for (const prop of props) {
    switch (prop.name) {
      case 'displayname':
        request.displayName = textContent(prop).trim();
        break;
      case 'calendar-description':
        request.description = textContent(prop).trim();
        break;
      case 'calendar-color':
      case 'color':
        request.color = textContent(prop).trim();
        break;
      case 'calendar-timezone':
        request.timezone = textContent(prop).trim();
        break;
      case 'timezone':
        request.timezoneId = textContent(prop).trim();
        break;
      case 'supported-calendar-component-set':
        request.components = findChildren(prop, 'comp')
          .map((comp) => comp.attributes.name?.trim().toUpperCase() ?? '')
          .filter((name) => name !== '');
        break;
      default:
        break;
    }
  }
  return request;
}

/** `Depth` header; absent means infinity. */
export function parseDepth(header: string | undefined): number {
  if (header === undefined) return INFINITE_DEPTH;
  switch (header.trim().toLowerCase()) {
    case '0':
      return 0;
    case '1':
      return 1;
    case 'infinity':
      return INFINITE_DEPTH;
    default:
      throw new RequestParseError(`invalid Depth header: ${header}`);
  }
}
