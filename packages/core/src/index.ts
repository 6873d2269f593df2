import { type CalDavHandlerOptions, CalDavRequestHandler } from './handler';
import { buildCalendarData } from './ical';
import { MemoryStorage, type MemoryUserInit } from './memory-storage';

/**
 * Fresh in-memory store. Each user gets a `default` calendar accepting
 * events and tasks.
 */
export const createMemoryStorage = async (
  users: MemoryUserInit[],
  options: Pick<CalDavHandlerOptions, 'maxInstances' | 'productId'> = {},
) => {
  const storage = new MemoryStorage({ maxInstances: options.maxInstances });
  for (const user of users) {
    storage.addUser(user);
    await storage.createCalendar(user.id, 'default', {
      data: buildCalendarData({ name: 'Default' }, options.productId),
      supportedComponents: ['VEVENT', 'VTODO'],
    });
  }
  return storage;
};

export const createMemoryCalDavHandler = async (
  users: MemoryUserInit[],
  options: Omit<CalDavHandlerOptions, 'storage'> = {},
) => {
  const storage = await createMemoryStorage(users, options);
  return {
    storage,
    handler: new CalDavRequestHandler({ ...options, storage }),
  };
};

export * from './errors';
export type {
  CompFilter,
  FilterTest,
  MatchType,
  ParamFilter,
  PropFilter,
  TextMatch,
  TimeRange,
} from './filter';
export { filterToXml, parseFilter } from './filter';
export {
  type MatchOptions,
  DEFAULT_MAX_INSTANCES,
  componentOverlaps,
  matchCompFilter,
  matchesFilter,
} from './filters';
export {
  type ObjectQuery,
  type ReportBodyOptions,
  buildCalendarMultiget,
  buildCalendarQuery,
  buildObjectFilter,
} from './query';
export {
  ALLOWED_METHODS,
  type CalDavHandlerOptions,
  type CalDavRequest,
  type CalDavResponse,
  CalDavRequestHandler,
  DAV_COMPLIANCE,
} from './handler';
export {
  type CalendarProperties,
  DEFAULT_PRODUCT_ID,
  buildCalendarData,
  parseCalendar,
  serializeComponents,
} from './ical';
export { MemoryStorage, type MemoryUserInit } from './memory-storage';
export {
  type MultistatusDocument,
  buildMultistatus,
  buildResponse,
  buildStatusResponse,
  mergeDocuments,
  multistatusToXml,
} from './multistatus';
export * from './namespaces';
export {
  type PropertyValue,
  Values,
  encodeProperty,
  propertyName,
} from './properties';
export {
  type MkcalendarRequest,
  type PropertyRequest,
  type ReportRequest,
  parseDepth,
  parseMkcalendarRequest,
  parsePropfindRequest,
  parseReportRequest,
} from './report';
export {
  type PropertyOutcome,
  type PropertySet,
  type ResolverEnvironment,
  type ServerLimits,
  DEFAULT_LIMITS,
  createResolverEnvironment,
  resolveProperties,
} from './resolvers';
export type {
  Calendar,
  CalendarInit,
  CalendarObject,
  CalendarObjectInit,
  Storage,
  User,
} from './storage';
export type { Logger, Resource, ResourceType, XmlName } from './types';
export {
  type UrlConverter,
  createUrlConverter,
  encodeResourcePath,
  parseResourcePath,
} from './uri';
export { INFINITE_DEPTH, fetchChildren } from './walker';
export { type XmlElement, parseXml, serializeXml } from './xml';
