import { FilterParseError } from './errors';
import { formatUtcTimestamp, parseUtcTimestamp } from './ical';
import { NS_CALDAV } from './namespaces';
import {
  type XmlElement,
  element,
  findChild,
  findChildren,
  textContent,
} from './xml';

export type FilterTest = 'anyof' | 'allof';

export type MatchType = 'equals' | 'contains' | 'starts-with' | 'ends-with';

export const MATCH_TYPES: readonly MatchType[] = [
  'equals',
  'contains',
  'starts-with',
  'ends-with',
];

export const DEFAULT_COLLATION = 'i;unicode-casemap';

export const SUPPORTED_COLLATIONS: readonly string[] = [
  'i;octet',
  'i;ascii-casemap',
  'i;unicode-casemap',
];

export interface TextMatch {
  collation: string;
  matchType: MatchType;
  negate: boolean;
  value: string;
}

/** Either bound may be absent, meaning unbounded on that side. */
export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface ParamFilter {
  name: string;
  isNotDefined: boolean;
  textMatch?: TextMatch;
}

export interface PropFilter {
  name: string;
  test: FilterTest;
  isNotDefined: boolean;
  textMatch?: TextMatch;
  paramFilters: ParamFilter[];
}

export interface CompFilter {
  name: string;
  test: FilterTest;
  isNotDefined: boolean;
  timeRange?: TimeRange;
  propFilters: PropFilter[];
  compFilters: CompFilter[];
}

function requireName(el: XmlElement): string {
  const name = el.attributes.name?.trim();
  if (!name) {
    throw new FilterParseError(`<${el.name}> requires a name attribute`);
  }
  return name.toUpperCase();
}

function parseTest(el: XmlElement): FilterTest {
  return el.attributes.test === 'allof' ? 'allof' : 'anyof';
}

function isMatchType(value: string): value is MatchType {
  return MATCH_TYPES.some((type) => type === value);
}

export function parseTextMatch(el: XmlElement): TextMatch {
  const collation = el.attributes.collation ?? DEFAULT_COLLATION;
  if (!SUPPORTED_COLLATIONS.includes(collation)) {
    throw new FilterParseError(`unsupported collation: ${collation}`);
  }
  const matchType = el.attributes['match-type'] ?? 'contains';
  if (!isMatchType(matchType)) {
    throw new FilterParseError(`unsupported match-type: ${matchType}`);
  }
  const negateAttribute = el.attributes['negate-condition'];
  return {
    collation,
    matchType,
    negate: negateAttribute === 'yes' || negateAttribute === 'true',
    value: textContent(el),
  };
}

export function parseTimeRange(el: XmlElement): TimeRange {
  const range: TimeRange = {};
  const start = parseUtcTimestamp(el.attributes.start);
  const end = parseUtcTimestamp(el.attributes.end);
  if (start) range.start = start;
  if (end) range.end = end;
  return range;
}

export function parseParamFilter(el: XmlElement): ParamFilter {
  const name = requireName(el);
  if (findChild(el, 'is-not-defined')) {
    return { name, isNotDefined: true };
  }
  const textMatch = findChild(el, 'text-match');
  return textMatch
    ? { name, isNotDefined: false, textMatch: parseTextMatch(textMatch) }
    : { name, isNotDefined: false };
}

export function parsePropFilter(el: XmlElement): PropFilter {
  const name = requireName(el);
  const test = parseTest(el);
  if (findChild(el, 'is-not-defined')) {
    return { name, test, isNotDefined: true, paramFilters: [] };
  }
  const filter: PropFilter = {
    name,
    test,
    isNotDefined: false,
    paramFilters: findChildren(el, 'param-filter').map(parseParamFilter),
  };
  const textMatch = findChild(el, 'text-match');
  if (textMatch) filter.textMatch = parseTextMatch(textMatch);
  return filter;
}

export function parseCompFilter(el: XmlElement): CompFilter {
  const name = requireName(el);
  const test = parseTest(el);
  if (findChild(el, 'is-not-defined')) {
    return { name, test, isNotDefined: true, propFilters: [], compFilters: [] };
  }
  const filter: CompFilter = {
    name,
    test,
    isNotDefined: false,
    propFilters: findChildren(el, 'prop-filter').map(parsePropFilter),
    compFilters: findChildren(el, 'comp-filter').map(parseCompFilter),
  };
  const timeRange = findChild(el, 'time-range');
  if (timeRange) filter.timeRange = parseTimeRange(timeRange);
  return filter;
}

/**
 * Extracts the filter of a calendar-query body. `el` may be the
 * `<calendar-query>` element or the `<filter>` element itself. No filter, or
 * a filter without a comp-filter, yields `null`: match everything.
 */
export function parseFilter(el: XmlElement): CompFilter | null {
  const filter = el.name === 'filter' ? el : findChild(el, 'filter');
  if (!filter) return null;
  const root = findChild(filter, 'comp-filter');
  return root ? parseCompFilter(root) : null;
}

function cal(
  name: string,
  children: XmlElement[] = [],
  attributes: Record<string, string> = {},
  text?: string,
): XmlElement {
  return element(
    NS_CALDAV,
    name,
    text === undefined ? children : [text],
    attributes,
  );
}

function textMatchToXml(match: TextMatch): XmlElement {
  return cal(
    'text-match',
    [],
    {
      collation: match.collation,
      'match-type': match.matchType,
      'negate-condition': match.negate ? 'yes' : 'no',
    },
    match.value,
  );
}

function timeRangeToXml(range: TimeRange): XmlElement {
  const attributes: Record<string, string> = {};
  if (range.start) attributes.start = formatUtcTimestamp(range.start);
  if (range.end) attributes.end = formatUtcTimestamp(range.end);
  return cal('time-range', [], attributes);
}

function paramFilterToXml(filter: ParamFilter): XmlElement {
  const children = filter.isNotDefined
    ? [cal('is-not-defined')]
    : filter.textMatch
      ? [textMatchToXml(filter.textMatch)]
      : [];
  return cal('param-filter', children, { name: filter.name });
}

function propFilterToXml(filter: PropFilter): XmlElement {
  const children: XmlElement[] = [];
  if (filter.isNotDefined) {
    children.push(cal('is-not-defined'));
  } else {
    if (filter.textMatch) children.push(textMatchToXml(filter.textMatch));
    children.push(...filter.paramFilters.map(paramFilterToXml));
  }
  return cal('prop-filter', children, { name: filter.name, test: filter.test });
}

function compFilterToXml(filter: CompFilter): XmlElement {
  const children: XmlElement[] = [];
  if (filter.isNotDefined) {
    children.push(cal('is-not-defined'));
  } else {
    if (filter.timeRange) children.push(timeRangeToXml(filter.timeRange));
    children.push(...filter.propFilters.map(propFilterToXml));
    children.push(...filter.compFilters.map(compFilterToXml));
  }
  return cal('comp-filter', children, { name: filter.name, test: filter.test });
}

/** Renders a filter as a `<cal:filter>` element. */
export function filterToXml(filter: CompFilter): XmlElement {
  return cal('filter', [compFilterToXml(filter)]);
}
