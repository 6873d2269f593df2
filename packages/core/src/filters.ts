import ICAL from 'ical.js';
import type {
  CompFilter,
  FilterTest,
  ParamFilter,
  PropFilter,
  TextMatch,
  TimeRange,
} from './filter';
import {
  DAY_MS,
  durationProperty,
  textProperty,
  timeProperty,
  timeToMillis,
} from './ical';

export interface MatchOptions {
  /** Upper bound on recurrence instances examined per component. */
  maxInstances?: number;
}

export const DEFAULT_MAX_INSTANCES = 1000;

interface Interval {
  start: number;
  end: number;
}

const ALWAYS: Interval = {
  start: Number.NEGATIVE_INFINITY,
  end: Number.POSITIVE_INFINITY,
};

function combine(test: FilterTest, checks: Array<() => boolean>): boolean {
  return test === 'allof'
    ? checks.every((check) => check())
    : checks.length === 0 || checks.some((check) => check());
}

function foldCase(collation: string, value: string): string {
  switch (collation) {
    case 'i;ascii-casemap':
      return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
    case 'i;unicode-casemap':
      return value.toLowerCase();
    default:
      return value;
  }
}

function matchesText(match: TextMatch, candidate: string): boolean {
  const needle = foldCase(match.collation, match.value);
  const haystack = foldCase(match.collation, candidate);
  switch (match.matchType) {
    case 'equals':
      return haystack === needle;
    case 'starts-with':
      return haystack.startsWith(needle);
    case 'ends-with':
      return haystack.endsWith(needle);
    default:
      return haystack.includes(needle);
  }
}

/** Negation applies to the outcome over every value of the property. */
export function matchTextValues(
  match: TextMatch,
  values: readonly string[],
): boolean {
  const matched = values.some((value) => matchesText(match, value));
  return match.negate ? !matched : matched;
}

function propertyValues(property: ICAL.Property): string[] {
  return property.getValues().map((value) => String(value));
}

function parameterValues(
  property: ICAL.Property,
  name: string,
): string[] | undefined {
  const value = property.getParameter(name.toLowerCase());
  if (value === undefined || value === null) return undefined;
  return Array.isArray(value) ? value.map(String) : [String(value)];
}

function matchParamFilter(filter: ParamFilter, property: ICAL.Property): boolean {
  const values = parameterValues(property, filter.name);
  if (filter.isNotDefined) return values === undefined;
  if (values === undefined) return false;
  return filter.textMatch ? matchTextValues(filter.textMatch, values) : true;
}

export function matchPropFilter(
  filter: PropFilter,
  component: ICAL.Component,
): boolean {
  const properties = component.getAllProperties(filter.name.toLowerCase());
  if (filter.isNotDefined) return properties.length === 0;
  // The text-match and every param-filter must hold on the same property.
  return properties.some((property) => {
    const { textMatch } = filter;
    if (textMatch && !matchTextValues(textMatch, propertyValues(property))) return false;
    return filter.paramFilters.every((paramFilter) => matchParamFilter(paramFilter, property));
  });
}

function instant(time: ICAL.Time, length = 0): Interval {
  const start = timeToMillis(time);
  return { start, end: start + length };
}

/**
 * The span one (non-expanded) instance of `component` occupies, or
 * `undefined` when the component has no place on the time line.
 */
export function componentInterval(
  component: ICAL.Component,
): Interval | undefined {
  const dtstart = timeProperty(component, 'dtstart');
  const duration = durationProperty(component, 'duration');

  switch (component.name) {
    case 'vevent': {
      if (!dtstart) return undefined;
      const dtend = timeProperty(component, 'dtend');
      if (dtend) return { start: timeToMillis(dtstart), end: timeToMillis(dtend) };
      if (duration) return instant(dtstart, duration.toSeconds() * 1000);
      return instant(dtstart, dtstart.isDate ? DAY_MS : 0);
    }
    case 'vtodo': {
      const due = timeProperty(component, 'due');
      if (dtstart && duration) {
        return instant(dtstart, duration.toSeconds() * 1000);
      }
      if (dtstart && due) {
        return { start: timeToMillis(dtstart), end: timeToMillis(due) };
      }
      if (dtstart) return instant(dtstart);
      if (due) return instant(due);
      return ALWAYS;
    }
    case 'vjournal':
      if (!dtstart) return undefined;
      return instant(dtstart, dtstart.isDate ? DAY_MS : 0);
    case 'valarm': {
      const trigger = timeProperty(component, 'trigger');
      return trigger ? instant(trigger) : undefined;
    }
    default: {
      if (!dtstart) return undefined;
      const dtend = timeProperty(component, 'dtend');
      return dtend
        ? { start: timeToMillis(dtstart), end: timeToMillis(dtend) }
        : instant(dtstart);
    }
  }
}

function bounds(range: TimeRange): Interval {
  return {
    start: range.start?.getTime() ?? Number.NEGATIVE_INFINITY,
    end: range.end?.getTime() ?? Number.POSITIVE_INFINITY,
  };
}

/** Half-open overlap; zero-length instances overlap when inside the range. */
export function overlaps(interval: Interval, range: TimeRange): boolean {
  const { start, end } = bounds(range);
  if (interval.end > interval.start) {
    return interval.start < end && interval.end > start;
  }
  return interval.start >= start && interval.start < end;
}

function isRecurring(component: ICAL.Component): boolean {
  return component.hasProperty('rrule') || component.hasProperty('rdate');
}

function overrides(
  component: ICAL.Component,
  parent: ICAL.Component | undefined,
): ICAL.Component[] {
  const uid = textProperty(component, 'uid');
  if (!parent || !uid) return [];
  return parent
    .getAllSubcomponents(component.name)
    .filter(
      (sibling) =>
        sibling !== component &&
        sibling.hasProperty('recurrence-id') &&
        textProperty(sibling, 'uid') === uid,
    );
}

function recurrenceOverlaps(
  component: ICAL.Component,
  parent: ICAL.Component | undefined,
  base: Interval,
  range: TimeRange,
  maxInstances: number,
): boolean {
  const event = new ICAL.Event(component, {
    exceptions: overrides(component, parent),
  });
  const { start: rangeStart, end: rangeEnd } = bounds(range);
  const span = base.end - base.start;
  const iterator = event.iterator();

  // Only instances reaching into the range count against the cap.
  let count = 0;
  for (
    let next = iterator.next();
    next && count < maxInstances;
    next = iterator.next()
  ) {
    const details = event.getOccurrenceDetails(next);
    const interval =
      details.item === event
        ? instant(details.startDate, span)
        : componentInterval(details.item.component);
    if (interval && overlaps(interval, range)) return true;
    if (timeToMillis(next) >= rangeEnd) return false;
    if (interval && interval.end >= rangeStart) count += 1;
  }
  return false;
}

/**
 * Whether some instance of `component` overlaps `range`. A VCALENDAR
 * overlaps when one of its children does.
 */
export function componentOverlaps(
  component: ICAL.Component,
  parent: ICAL.Component | undefined,
  range: TimeRange,
  options: MatchOptions = {},
): boolean {
  if (component.name === 'vcalendar') {
    return component
      .getAllSubcomponents()
      .filter((child) => child.name !== 'vtimezone')
      .some((child) => componentOverlaps(child, component, range, options));
  }

  const base = componentInterval(component);
  if (!base) return false;

  const maxInstances = options.maxInstances ?? DEFAULT_MAX_INSTANCES;
  if (isRecurring(component) && maxInstances > 0) {
    return recurrenceOverlaps(component, parent, base, range, maxInstances);
  }
  return overlaps(base, range);
}

function matchComponent(
  filter: CompFilter,
  component: ICAL.Component,
  parent: ICAL.Component | undefined,
  options: MatchOptions,
): boolean {
  const { timeRange } = filter;
  if (timeRange && !componentOverlaps(component, parent, timeRange, options)) {
    return false;
  }
  const checks: Array<() => boolean> = [
    ...filter.propFilters.map(
      (propFilter) => () => matchPropFilter(propFilter, component),
    ),
    ...filter.compFilters.map(
      (compFilter) => () => matchCompFilter(compFilter, component, options),
    ),
  ];
  return combine(filter.test, checks);
}

/** Evaluates a comp-filter against the children of `parent`. */
export function matchCompFilter(
  filter: CompFilter,
  parent: ICAL.Component,
  options: MatchOptions = {},
): boolean {
  const candidates = parent.getAllSubcomponents(filter.name.toLowerCase());
  if (filter.isNotDefined) return candidates.length === 0;
  return candidates.some((candidate) =>
    matchComponent(filter, candidate, parent, options),
  );
}

/**
 * Evaluates a calendar-query filter against a whole calendar object. The
 * root comp-filter names the object's own root component (VCALENDAR); a
 * `null` filter matches everything.
 */
export function matchesFilter(
  filter: CompFilter | null,
  calendar: ICAL.Component,
  options: MatchOptions = {},
): boolean {
  if (!filter) return true;
  if (calendar.name !== filter.name.toLowerCase()) return filter.isNotDefined;
  if (filter.isNotDefined) return false;
  return matchComponent(filter, calendar, undefined, options);
}
