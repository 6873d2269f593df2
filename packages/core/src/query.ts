import {
  type CompFilter,
  type PropFilter,
  type TextMatch,
  type TimeRange,
  filterToXml,
} from './filter';
import { DEFAULT_NAMESPACES, NS_CALDAV, NS_DAV } from './namespaces';
import { type XmlElement, element, serializeXml } from './xml';

/**
 * Criteria for a calendar-query. Every criterion that is set must hold;
 * text criteria match case-insensitive substrings.
 */
export interface ObjectQuery {
  /** Component kind to look for; defaults to VEVENT. */
  component?: string;
  timeRange?: TimeRange;
  hasAlarm?: boolean;
  summary?: string;
  description?: string;
  location?: string;
  organizer?: string;
  status?: string;
  /** Excludes objects whose STATUS contains this value. */
  notStatus?: string;
  priority?: number;
  /** Each category must be present. */
  categories?: string[];
}

export interface ReportBodyOptions {
  /** Request only getetag, without calendar-data. */
  etagOnly?: boolean;
}

function contains(value: string, negate = false): TextMatch {
  return { collation: 'i;unicode-casemap', matchType: 'contains', negate, value };
}

function propFilter(name: string, textMatch: TextMatch): PropFilter {
  return { name, test: 'anyof', isNotDefined: false, textMatch, paramFilters: [] };
}

function compFilter(name: string, fields: Partial<CompFilter> = {}): CompFilter {
  return {
    name,
    test: 'anyof',
    isNotDefined: false,
    propFilters: [],
    compFilters: [],
    ...fields,
  };
}

/** Builds the VCALENDAR filter a calendar-query sends for `query`. */
export function buildObjectFilter(query: ObjectQuery = {}): CompFilter {
  const propFilters: PropFilter[] = [];
  const texts: Array<[string, string | undefined]> = [
    ['SUMMARY', query.summary],
    ['DESCRIPTION', query.description],
    ['LOCATION', query.location],
    ['ORGANIZER', query.organizer],
    ['STATUS', query.status],
  ];
  for (const [name, value] of texts) {
    if (value) propFilters.push(propFilter(name, contains(value)));
  }
  if (query.notStatus) {
    propFilters.push(propFilter('STATUS', contains(query.notStatus, true)));
  }
  if (query.priority !== undefined) {
    propFilters.push(
      propFilter('PRIORITY', { ...contains(String(query.priority)), matchType: 'equals' }),
    );
  }
  for (const category of query.categories ?? []) {
    propFilters.push(propFilter('CATEGORIES', contains(category)));
  }

  const target = compFilter(query.component ?? 'VEVENT', {
    test: 'allof',
    propFilters,
    compFilters: query.hasAlarm ? [compFilter('VALARM')] : [],
  });
  if (query.timeRange) target.timeRange = query.timeRange;
  return compFilter('VCALENDAR', { compFilters: [target] });
}

function propElement(options: ReportBodyOptions): XmlElement {
  const names = [element(NS_DAV, 'getetag')];
  if (!options.etagOnly) names.push(element(NS_CALDAV, 'calendar-data'));
  return element(NS_DAV, 'prop', names);
}

/** Serializes a calendar-query REPORT body. */
export function buildCalendarQuery(
  filter: CompFilter,
  options: ReportBodyOptions = {},
): string {
  const root = element(NS_CALDAV, 'calendar-query', [
    propElement(options),
    filterToXml(filter),
  ]);
  return serializeXml(root, DEFAULT_NAMESPACES.slice(0, 2));
}

/** Serializes a calendar-multiget REPORT body for `hrefs`. */
export function buildCalendarMultiget(
  hrefs: readonly string[],
  options: ReportBodyOptions = {},
): string {
  const root = element(NS_CALDAV, 'calendar-multiget', [
    propElement(options),
    ...hrefs.map((href) => element(NS_DAV, 'href', [href])),
  ]);
  return serializeXml(root, DEFAULT_NAMESPACES.slice(0, 2));
}
