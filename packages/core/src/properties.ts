import { formatRfc3339 } from './ical';
import { NS_CALDAV, NS_DAV } from './namespaces';
import catalog from './properties.json';
import type { XmlName } from './types';
import { type XmlElement, type XmlNode, element } from './xml';

/** Canonical property name → namespace. */
export const PROPERTY_NAMESPACES: ReadonlyMap<string, string> = new Map(
  Object.entries(catalog).flatMap(([namespace, names]) =>
    names.map((name): [string, string] => [name, namespace]),
  ),
);

export function propertyName(name: string, fallbackNamespace = NS_DAV): XmlName {
  const canonical = name.toLowerCase();
  return {
    namespace: PROPERTY_NAMESPACES.get(canonical) ?? fallbackNamespace,
    name: canonical,
  };
}

export interface AccessControlEntry {
  principal: string;
  grant: string[];
  deny: string[];
}

export interface CalendarDataType {
  contentType: string;
  version: string;
}

export type PropertyValue =
  | { type: 'text'; text: string }
  | { type: 'href'; href: string }
  | { type: 'hrefs'; hrefs: string[] }
  | { type: 'resourcetype'; kinds: XmlName[] }
  | { type: 'privileges'; privileges: string[] }
  | { type: 'acl'; aces: AccessControlEntry[] }
  | { type: 'components'; components: string[] }
  | { type: 'calendar-data-types'; types: CalendarDataType[] }
  | { type: 'reports'; reports: XmlName[] }
  | { type: 'http-date'; date: Date }
  | { type: 'iso-date'; date: Date }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'empty' };

export const Values = {
  text: (text: string): PropertyValue => ({ type: 'text', text }),
  href: (href: string): PropertyValue => ({ type: 'href', href }),
  hrefs: (hrefs: string[]): PropertyValue => ({ type: 'hrefs', hrefs }),
  resourceType: (...kinds: XmlName[]): PropertyValue => ({
    type: 'resourcetype',
    kinds,
  }),
  privileges: (privileges: string[]): PropertyValue => ({
    type: 'privileges',
    privileges,
  }),
  acl: (aces: AccessControlEntry[]): PropertyValue => ({ type: 'acl', aces }),
  components: (components: string[]): PropertyValue => ({
    type: 'components',
    components,
  }),
  calendarData: (types: CalendarDataType[]): PropertyValue => ({
    type: 'calendar-data-types',
    types,
  }),
  reports: (reports: XmlName[]): PropertyValue => ({ type: 'reports', reports }),
  httpDate: (date: Date): PropertyValue => ({ type: 'http-date', date }),
  isoDate: (date: Date): PropertyValue => ({ type: 'iso-date', date }),
  number: (value: number): PropertyValue => ({ type: 'number', value }),
  boolean: (value: boolean): PropertyValue => ({ type: 'boolean', value }),
  empty: (): PropertyValue => ({ type: 'empty' }),
};

const dav = (name: string, children: readonly XmlNode[] = []): XmlElement =>
  element(NS_DAV, name, children);

const hrefElement = (href: string): XmlElement => dav('href', [href]);

const privilegeElement = (privilege: string): XmlElement =>
  dav('privilege', [dav(privilege)]);

function aceElement(ace: AccessControlEntry): XmlElement {
  const children = [
    dav('principal', [hrefElement(ace.principal)]),
    dav('grant', ace.grant.map(privilegeElement)),
  ];
  if (ace.deny.length > 0) {
    children.push(dav('deny', ace.deny.map(privilegeElement)));
  }
  return dav('ace', children);
}

function valueChildren(value: PropertyValue): XmlNode[] {
  switch (value.type) {
    case 'text':
      return [value.text];
    case 'href':
      return [hrefElement(value.href)];
    case 'hrefs':
      return value.hrefs.map(hrefElement);
    case 'resourcetype':
      return value.kinds.map((kind) => element(kind.namespace, kind.name));
    case 'privileges':
      return value.privileges.map(privilegeElement);
    case 'acl':
      return value.aces.map(aceElement);
    case 'components':
      return value.components.map((name) =>
        element(NS_CALDAV, 'comp', [], { name }),
      );
    case 'calendar-data-types':
      return value.types.map(({ contentType, version }) =>
        element(NS_CALDAV, 'calendar-data', [], {
          'content-type': contentType,
          version,
        }),
      );
    case 'reports':
      return value.reports.map((report) =>
        dav('supported-report', [
          dav('report', [element(report.namespace, report.name)]),
        ]),
      );
    case 'http-date':
      return [value.date.toUTCString()];
    case 'iso-date':
      return [formatRfc3339(value.date)];
    case 'number':
      return [String(value.value)];
    case 'boolean':
      return [value.value ? 'true' : 'false'];
    case 'empty':
      return [];
  }
}

/** Renders a property value as its namespaced element. */
export function encodeProperty(name: XmlName, value: PropertyValue): XmlElement {
  return element(name.namespace, name.name, valueChildren(value));
}
