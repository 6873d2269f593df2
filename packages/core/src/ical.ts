// iCalendar helpers used across the codebase

import ICAL from 'ical.js';
import { CalendarDataError } from './errors';

export const DEFAULT_PRODUCT_ID = '-//davlane//CalDAV Server//EN';

const UTC_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses the compact UTC form used by time-range attributes
 * (`20240101T000000Z`). Anything else yields `undefined`.
 */
export function parseUtcTimestamp(raw: string | undefined): Date | undefined {
  const match = raw?.trim().match(UTC_TIMESTAMP);
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(ms);
  // Reject rollovers such as month 13 or February 30th.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/** RFC 3339 without fractional seconds. */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function timeToMillis(time: ICAL.Time): number {
  return time.toUnixTime() * 1000;
}

function registerTimezones(calendar: ICAL.Component): void {
  for (const vtimezone of calendar.getAllSubcomponents('vtimezone')) {
    const timezone = new ICAL.Timezone(vtimezone);
    if (timezone.tzid && !ICAL.TimezoneService.has(timezone.tzid)) {
      ICAL.TimezoneService.register(timezone);
    }
  }
}

/** Parses iCalendar text whose root must be a VCALENDAR. */
export function parseCalendar(text: string): ICAL.Component {
  let calendar: ICAL.Component;
  try {
    calendar = ICAL.Component.fromString(text);
  } catch (error) {
    throw new CalendarDataError(
      `invalid iCalendar data: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error },
    );
  }
  if (calendar.name !== 'vcalendar') {
    throw new CalendarDataError(
      `invalid iCalendar data: expected VCALENDAR, got ${calendar.name.toUpperCase()}`,
    );
  }
  registerTimezones(calendar);
  return calendar;
}

/** Splits a VCALENDAR into the components a calendar object stores. */
export function objectComponents(calendar: ICAL.Component): ICAL.Component[] {
  return calendar.getAllSubcomponents();
}

/** The first non-timezone component; its kind names the object. */
export function primaryComponent(
  components: readonly ICAL.Component[],
): ICAL.Component | undefined {
  return components.find((component) => component.name !== 'vtimezone');
}

export function componentKind(component: ICAL.Component): string {
  return component.name.toUpperCase();
}

/** Wraps components in a fresh VCALENDAR without re-parenting them. */
export function wrapComponents(
  components: readonly ICAL.Component[],
  productId = DEFAULT_PRODUCT_ID,
): ICAL.Component {
  const calendar = new ICAL.Component('vcalendar');
  calendar.updatePropertyWithValue('prodid', productId);
  calendar.updatePropertyWithValue('version', '2.0');
  for (const component of components) {
    calendar.addSubcomponent(new ICAL.Component(component.toJSON()));
  }
  return calendar;
}

export function serializeComponents(
  components: readonly ICAL.Component[],
  productId = DEFAULT_PRODUCT_ID,
): string {
  return wrapComponents(components, productId).toString();
}

export function textProperty(
  component: ICAL.Component,
  name: string,
): string | undefined {
  const value = component.getFirstPropertyValue(name);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function timeProperty(
  component: ICAL.Component,
  name: string,
): ICAL.Time | undefined {
  const value = component.getFirstPropertyValue(name);
  return value instanceof ICAL.Time ? value : undefined;
}

export function durationProperty(
  component: ICAL.Component,
  name: string,
): ICAL.Duration | undefined {
  const value = component.getFirstPropertyValue(name);
  return value instanceof ICAL.Duration ? value : undefined;
}

export interface CalendarProperties {
  name?: string;
  description?: string;
  color?: string;
  timezoneId?: string;
  /** iCalendar text whose VTIMEZONEs are copied into the calendar. */
  timezone?: string;
}

/** Builds the VCALENDAR that carries a collection's own properties. */
export function buildCalendarData(
  properties: CalendarProperties,
  productId = DEFAULT_PRODUCT_ID,
): ICAL.Component {
  const calendar = new ICAL.Component('vcalendar');
  calendar.updatePropertyWithValue('prodid', productId);
  calendar.updatePropertyWithValue('version', '2.0');
  if (properties.name) calendar.updatePropertyWithValue('name', properties.name);
  if (properties.description) {
    calendar.updatePropertyWithValue('description', properties.description);
  }
  if (properties.color) calendar.updatePropertyWithValue('color', properties.color);
  if (properties.timezoneId) {
    calendar.updatePropertyWithValue('x-timezone', properties.timezoneId);
  }
  if (properties.timezone) {
    for (const vtimezone of parseCalendar(properties.timezone).getAllSubcomponents(
      'vtimezone',
    )) {
      calendar.addSubcomponent(new ICAL.Component(vtimezone.toJSON()));
    }
  }
  return calendar;
}
