import type { BaseLogger } from 'pino';

export type ComponentType =
  | 'VEVENT'
  | 'VTODO'
  | 'VJOURNAL'
  | 'VFREEBUSY'
  | 'VTIMEZONE'
  | 'VALARM';

export const CALENDAR_COMPONENT_TYPES: readonly ComponentType[] = [
  'VEVENT',
  'VTODO',
  'VJOURNAL',
  'VFREEBUSY',
] as const;

export type ResourceType =
  | 'service-root'
  | 'principal'
  | 'home-set'
  | 'collection'
  | 'object'
  | 'unknown';

/**
 * Identity of an addressable CalDAV resource. Which ids are set follows from
 * `type`: an object carries all three, a principal only `userId`.
 */
export interface Resource {
  readonly type: ResourceType;
  readonly userId?: string;
  readonly calendarId?: string;
  readonly objectId?: string;
  /** Encoded href, filled in once the resource has been addressed. */
  readonly uri?: string;
}

/** Qualified XML name: namespace URI plus local name. */
export interface XmlName {
  readonly namespace: string;
  readonly name: string;
}

/** The pino methods the core logs through; Fastify's request loggers fit too. */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
