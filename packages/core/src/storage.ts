import type ICAL from 'ical.js';
import type { CompFilter } from './filter';

// Record paths are relative to the server root and never carry the URL
// prefix, e.g. `/alice/cal/personal/event1.ics`.

export interface User {
  displayName: string;
  /** Calendar user address, e.g. `mailto:alice@example.com`. */
  userAddress: string;
  preferredColor: string;
  preferredTimezone: string;
  path: string;
}

export interface Calendar {
  path: string;
  ctag: string;
  etag: string;
  /** VCALENDAR carrying NAME, DESCRIPTION, COLOR, X-TIMEZONE and VTIMEZONE. */
  data: ICAL.Component;
  supportedComponents: string[];
  readOnly: boolean;
  lastModified?: Date;
}

export interface CalendarObject {
  path: string;
  etag: string;
  lastModified: Date;
  /** Top-level components of the object, VTIMEZONEs included. */
  components: ICAL.Component[];
}

export interface CalendarInit {
  data: ICAL.Component;
  supportedComponents: string[];
}

export interface CalendarObjectInit {
  path: string;
  components: ICAL.Component[];
}

/**
 * Persistence behind the CalDAV core. Every method rejects with a
 * `StorageError`; kind `not-found` is distinguished from other failures.
 */
export interface Storage {
  getUser(userId: string): Promise<User>;
  getCalendar(userId: string, calendarId: string): Promise<Calendar>;
  getObject(
    userId: string,
    calendarId: string,
    objectId: string,
  ): Promise<CalendarObject>;
  getUserCalendars(userId: string): Promise<Calendar[]>;
  getObjectPathsInCollection(
    userId: string,
    calendarId: string,
  ): Promise<string[]>;
  getObjectByFilter(
    userId: string,
    calendarId: string,
    filter: CompFilter | null,
  ): Promise<CalendarObject[]>;
  createCalendar(
    userId: string,
    calendarId: string,
    init: CalendarInit,
  ): Promise<Calendar>;
  deleteCalendar(userId: string, calendarId: string): Promise<void>;
  /** Creates or replaces an object and resolves with its new ETag. */
  updateObject(
    userId: string,
    calendarId: string,
    object: CalendarObjectInit,
  ): Promise<string>;
  deleteObject(
    userId: string,
    calendarId: string,
    objectId: string,
  ): Promise<void>;
  /** Resolves with the user id the credentials belong to. */
  authUser(username: string, password: string): Promise<string>;
}
