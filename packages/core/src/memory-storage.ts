import { createHash } from 'node:crypto';
import type ICAL from 'ical.js';
import { StorageError } from './errors';
import type { CompFilter } from './filter';
import { type MatchOptions, matchesFilter } from './filters';
import { serializeComponents, wrapComponents } from './ical';
import type {
  Calendar,
  CalendarInit,
  CalendarObject,
  CalendarObjectInit,
  Storage,
  User,
} from './storage';
import { encodeResourcePath, parseResourcePath } from './uri';

export interface MemoryUserInit {
  id: string;
  password: string;
  displayName?: string;
  userAddress?: string;
  preferredColor?: string;
  preferredTimezone?: string;
}

interface CalendarEntry {
  calendar: Calendar;
  objects: Map<string, CalendarObject>;
}

interface UserEntry {
  user: User;
  password: string;
  calendars: Map<string, CalendarEntry>;
}

function etagOf(text: string): string {
  return `"${createHash('sha1').update(text).digest('hex')}"`;
}

/**
 * Process-local storage. Contents are lost on restart; intended for
 * development servers and tests.
 */
export class MemoryStorage implements Storage {
  private readonly users = new Map<string, UserEntry>();
  private revision = 0;

  constructor(private readonly matchOptions: MatchOptions = {}) {}

  addUser(init: MemoryUserInit): User {
    if (this.users.has(init.id)) {
      throw new StorageError('conflict', `user already exists: ${init.id}`);
    }
    const user: User = {
      displayName: init.displayName ?? init.id,
      userAddress: init.userAddress ?? '',
      preferredColor: init.preferredColor ?? '',
      preferredTimezone: init.preferredTimezone ?? '',
      path: encodeResourcePath({ type: 'principal', userId: init.id }),
    };
    this.users.set(init.id, {
      user,
      password: init.password,
      calendars: new Map(),
    });
    return user;
  }

  private userEntry(userId: string): UserEntry {
    const entry = this.users.get(userId);
    if (!entry) throw new StorageError('not-found', `user not found: ${userId}`);
    return entry;
  }

  private calendarEntry(userId: string, calendarId: string): CalendarEntry {
    const entry = this.userEntry(userId).calendars.get(calendarId);
    if (!entry) {
      throw new StorageError(
        'not-found',
        `calendar not found: ${userId}/${calendarId}`,
      );
    }
    return entry;
  }

  private touch(entry: CalendarEntry): void {
    this.revision += 1;
    const ctag = String(this.revision);
    entry.calendar = {
      ...entry.calendar,
      ctag,
      etag: etagOf(`${entry.calendar.path}:${ctag}`),
      lastModified: new Date(),
    };
  }

  async getUser(userId: string): Promise<User> {
    return this.userEntry(userId).user;
  }

  async getCalendar(userId: string, calendarId: string): Promise<Calendar> {
    return this.calendarEntry(userId, calendarId).calendar;
  }

  async getObject(
    userId: string,
    calendarId: string,
    objectId: string,
  ): Promise<CalendarObject> {
    const object = this.calendarEntry(userId, calendarId).objects.get(objectId);
    if (!object) {
      throw new StorageError(
        'not-found',
        `object not found: ${userId}/${calendarId}/${objectId}`,
      );
    }
    return object;
  }

  async getUserCalendars(userId: string): Promise<Calendar[]> {
    return [...this.userEntry(userId).calendars.values()].map(
      (entry) => entry.calendar,
    );
  }

  async getObjectPathsInCollection(
    userId: string,
    calendarId: string,
  ): Promise<string[]> {
    return [...this.calendarEntry(userId, calendarId).objects.values()].map(
      (object) => object.path,
    );
  }

  async getObjectByFilter(
    userId: string,
    calendarId: string,
    filter: CompFilter | null,
  ): Promise<CalendarObject[]> {
    const objects = [...this.calendarEntry(userId, calendarId).objects.values()];
    return objects.filter((object) =>
      matchesFilter(filter, wrapComponents(object.components), this.matchOptions),
    );
  }

  async createCalendar(
    userId: string,
    calendarId: string,
    init: CalendarInit,
  ): Promise<Calendar> {
    const { calendars } = this.userEntry(userId);
    if (calendars.has(calendarId)) {
      throw new StorageError(
        'conflict',
        `calendar already exists: ${userId}/${calendarId}`,
      );
    }
    const entry: CalendarEntry = {
      calendar: {
        path: encodeResourcePath({ type: 'collection', userId, calendarId }),
        ctag: '',
        etag: '',
        data: init.data,
        supportedComponents: [...init.supportedComponents],
        readOnly: false,
      },
      objects: new Map(),
    };
    this.touch(entry);
    calendars.set(calendarId, entry);
    return entry.calendar;
  }

  async deleteCalendar(userId: string, calendarId: string): Promise<void> {
    this.calendarEntry(userId, calendarId);
    this.userEntry(userId).calendars.delete(calendarId);
  }

  /** Marks a calendar read-only; writes to it are then refused. */
  setReadOnly(userId: string, calendarId: string, readOnly: boolean): void {
    const entry = this.calendarEntry(userId, calendarId);
    entry.calendar = { ...entry.calendar, readOnly };
  }

  async updateObject(
    userId: string,
    calendarId: string,
    init: CalendarObjectInit,
  ): Promise<string> {
    const entry = this.calendarEntry(userId, calendarId);
    if (entry.calendar.readOnly) {
      throw new StorageError(
        'permission-denied',
        `calendar is read-only: ${userId}/${calendarId}`,
      );
    }
    const { objectId } = parseResourcePath(init.path);
    if (!objectId) {
      throw new StorageError('invalid-input', `not an object path: ${init.path}`);
    }
    const components: ICAL.Component[] = [...init.components];
    const etag = etagOf(serializeComponents(components));
    entry.objects.set(objectId, {
      path: encodeResourcePath({ type: 'object', userId, calendarId, objectId }),
      etag,
      lastModified: new Date(),
      components,
    });
    this.touch(entry);
    return etag;
  }

  async deleteObject(
    userId: string,
    calendarId: string,
    objectId: string,
  ): Promise<void> {
    const entry = this.calendarEntry(userId, calendarId);
    if (entry.calendar.readOnly) {
      throw new StorageError(
        'permission-denied',
        `calendar is read-only: ${userId}/${calendarId}`,
      );
    }
    if (!entry.objects.delete(objectId)) {
      throw new StorageError(
        'not-found',
        `object not found: ${userId}/${calendarId}/${objectId}`,
      );
    }
    this.touch(entry);
  }

  async authUser(username: string, password: string): Promise<string> {
    const entry = this.users.get(username);
    if (!entry || entry.password !== password) {
      throw new StorageError('permission-denied', 'invalid credentials');
    }
    return username;
  }
}
