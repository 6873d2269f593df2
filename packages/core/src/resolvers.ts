import type ICAL from 'ical.js';
import {
  DEFAULT_PRODUCT_ID,
  primaryComponent,
  serializeComponents,
  textProperty,
} from './ical';
import { NS_CALDAV, NS_DAV } from './namespaces';
import {
  type AccessControlEntry,
  type PropertyValue,
  Values,
  propertyName,
} from './properties';
import type { Calendar, CalendarObject, Storage, User } from './storage';
import type { Logger, Resource, ResourceType, XmlName } from './types';
import { type UrlConverter, homeSetOf, principalOf } from './uri';

export type PropertyErrorKind =
  | 'not-found'
  | 'forbidden'
  | 'internal'
  | 'bad-request';

export type PropertyOutcome =
  | { ok: true; value: PropertyValue }
  | { ok: false; error: PropertyErrorKind };

export interface ResolvedProperty {
  name: XmlName;
  outcome: PropertyOutcome;
}

/** Lower-cased property name → outcome, in request order. */
export type PropertySet = Map<string, ResolvedProperty>;

export interface ServerLimits {
  maxResourceSize: number;
  minDateTime: Date;
  maxDateTime: Date;
  maxInstances: number;
  maxAttendeesPerInstance: number;
}

export const DEFAULT_LIMITS: ServerLimits = {
  maxResourceSize: 10 * 1024 * 1024,
  minDateTime: new Date(Date.UTC(1970, 0, 1)),
  maxDateTime: new Date(Date.UTC(9999, 11, 31, 23, 59, 59)),
  maxInstances: 100000,
  maxAttendeesPerInstance: 100,
};

/**
 * Everything a resolver may consult about one resource. Record accessors
 * hit storage at most once; later calls share the first result.
 */
export interface ResolverEnvironment {
  readonly resource: Resource;
  readonly href: string;
  readonly authUser?: string;
  readonly converter: UrlConverter;
  readonly limits: ServerLimits;
  readonly productId: string;
  user(): Promise<User>;
  calendar(): Promise<Calendar>;
  object(): Promise<CalendarObject>;
}

export interface EnvironmentOptions {
  storage: Storage;
  converter: UrlConverter;
  authUser?: string;
  limits?: ServerLimits;
  productId?: string;
  /** Records the caller already holds, e.g. objects a query returned. */
  preloaded?: { calendar?: Calendar; object?: CalendarObject };
}

function memoize<T>(load: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | undefined;
  return () => {
    cached ??= load();
    return cached;
  };
}

/**
 * The resource lacks the record a resolver asked for (no calendar id on a
 * principal, no component in an object). Unlike a storage rejection this is
 * an absent property, not a failure.
 */
class AbsentRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbsentRecordError';
  }
}

function missing(what: string): Promise<never> {
  return Promise.reject(new AbsentRecordError(`resource has no ${what}`));
}

export function createResolverEnvironment(
  resource: Resource,
  options: EnvironmentOptions,
): ResolverEnvironment {
  const { storage, converter, authUser, preloaded } = options;
  const { calendarId, objectId } = resource;
  const userId = resource.userId ?? authUser;

  return {
    resource,
    href: resource.uri ?? converter.encodePath(resource),
    authUser,
    converter,
    limits: options.limits ?? DEFAULT_LIMITS,
    productId: options.productId ?? DEFAULT_PRODUCT_ID,
    user: memoize(() =>
      userId ? storage.getUser(userId) : missing('user'),
    ),
    calendar: memoize(() => {
      if (preloaded?.calendar) return Promise.resolve(preloaded.calendar);
      return userId && calendarId
        ? storage.getCalendar(userId, calendarId)
        : missing('calendar');
    }),
    object: memoize(() => {
      if (preloaded?.object) return Promise.resolve(preloaded.object);
      return userId && calendarId && objectId
        ? storage.getObject(userId, calendarId, objectId)
        : missing('object');
    }),
  };
}

export type Resolver = (env: ResolverEnvironment) => Promise<PropertyOutcome>;

export type ResolverTable = ReadonlyMap<string, Resolver>;

const ok = (value: PropertyValue): PropertyOutcome => ({ ok: true, value });
const fail = (error: PropertyErrorKind): PropertyOutcome => ({
  ok: false,
  error,
});

const constant =
  (value: PropertyValue): Resolver =>
  async () =>
    ok(value);

const notFound: Resolver = async () => fail('not-found');

/** Resolves to not-found when the string is empty or absent. */
const present = (value: string | undefined, wrap = Values.text) =>
  value ? ok(wrap(value)) : fail('not-found');

function hrefOf(env: ResolverEnvironment, resource: Resource): PropertyOutcome {
  try {
    return ok(Values.href(env.converter.encodePath(resource)));
  } catch {
    return fail('not-found');
  }
}

const subjectUser = (env: ResolverEnvironment): string =>
  env.resource.userId ?? env.authUser ?? '';

const dav = (name: string): XmlName => ({ namespace: NS_DAV, name });
const caldav = (name: string): XmlName => ({ namespace: NS_CALDAV, name });

const WRITABLE_PRIVILEGES = ['read', 'write', 'write-content', 'bind', 'unbind'];
const READ_ONLY_PRIVILEGES = ['read'];

const privilegesFor = (calendar: Calendar): string[] =>
  calendar.readOnly ? READ_ONLY_PRIVILEGES : WRITABLE_PRIVILEGES;

function ownAcl(principal: string, grant: string[]): PropertyValue {
  const ace: AccessControlEntry = { principal, grant, deny: [] };
  return Values.acl([ace]);
}

function vtimezoneOf(
  components: readonly ICAL.Component[],
): ICAL.Component | undefined {
  return components.find((component) => component.name === 'vtimezone');
}

const LIMIT_RESOLVERS: Array<[string, Resolver]> = [
  [
    'max-resource-size',
    async (env) => ok(Values.number(env.limits.maxResourceSize)),
  ],
  ['min-date-time', async (env) => ok(Values.isoDate(env.limits.minDateTime))],
  ['max-date-time', async (env) => ok(Values.isoDate(env.limits.maxDateTime))],
  ['max-instances', async (env) => ok(Values.number(env.limits.maxInstances))],
  [
    'max-attendees-per-instance',
    async (env) => ok(Values.number(env.limits.maxAttendeesPerInstance)),
  ],
];

const SUPPORTED_CALENDAR_DATA = constant(
  Values.calendarData([{ contentType: 'text/calendar', version: '2.0' }]),
);

const BASE_TABLE: ResolverTable = new Map<string, Resolver>([
  [
    'owner',
    async (env) =>
      env.resource.userId
        ? hrefOf(env, principalOf(env.resource.userId))
        : fail('not-found'),
  ],
  [
    'current-user-principal',
    async (env) => {
      const userId = env.authUser ?? env.resource.userId;
      return userId ? hrefOf(env, principalOf(userId)) : fail('not-found');
    },
  ],
  ['principal-url', async (env) => hrefOf(env, principalOf(subjectUser(env)))],
  ['supported-report-set', constant(Values.reports([]))],
  [
    'current-user-privilege-set',
    constant(Values.privileges(['read', 'write'])),
  ],
  ['calendar-home-set', async (env) => hrefOf(env, homeSetOf(subjectUser(env)))],
  [
    'calendar-user-address-set',
    async (env) => {
      const { userAddress } = await env.user();
      return userAddress ? ok(Values.hrefs([userAddress])) : fail('not-found');
    },
  ],
  ['calendar-user-type', constant(Values.text('individual'))],
  ['hidden', constant(Values.boolean(false))],
  ['selected', constant(Values.boolean(true))],
]);

const SERVICE_ROOT_TABLE: ResolverTable = new Map<string, Resolver>([
  ...BASE_TABLE,
  ['displayname', constant(Values.text('CalDAV Service Root'))],
  ['resourcetype', constant(Values.resourceType(dav('collection')))],
  ['owner', notFound],
  [
    'current-user-privilege-set',
    constant(
      Values.privileges(['read', 'read-acl', 'read-current-user-privilege-set']),
    ),
  ],
]);

const PRINCIPAL_TABLE: ResolverTable = new Map<string, Resolver>([
  ...BASE_TABLE,
  [
    'displayname',
    async (env) => {
      const user = await env.user();
      return ok(Values.text(user.displayName || subjectUser(env)));
    },
  ],
  ['resourcetype', constant(Values.resourceType(dav('principal')))],
  ['getcontenttype', notFound],
  ['calendar-color', async (env) => present((await env.user()).preferredColor)],
  ['color', async (env) => present((await env.user()).preferredColor)],
  ['timezone', async (env) => present((await env.user()).preferredTimezone)],
  ['acl', async (env) => ok(ownAcl(env.href, ['read', 'write']))],
]);

const HOME_SET_TABLE: ResolverTable = new Map<string, Resolver>([
  ...BASE_TABLE,
  ...LIMIT_RESOLVERS,
  ['displayname', constant(Values.text('Calendar Home'))],
  ['resourcetype', constant(Values.resourceType(dav('collection')))],
  [
    'acl',
    async (env) => {
      const principal = hrefOf(env, principalOf(subjectUser(env)));
      return principal.ok && principal.value.type === 'href'
        ? ok(ownAcl(principal.value.href, ['read', 'write']))
        : principal;
    },
  ],
  [
    'supported-calendar-component-set',
    constant(Values.components(['VEVENT', 'VTODO', 'VJOURNAL', 'VFREEBUSY'])),
  ],
  ['supported-calendar-data', SUPPORTED_CALENDAR_DATA],
]);

const COLLECTION_TABLE: ResolverTable = new Map<string, Resolver>([
  ...BASE_TABLE,
  ...LIMIT_RESOLVERS,
  [
    'displayname',
    async (env) => {
      const calendar = await env.calendar();
      return ok(
        Values.text(
          textProperty(calendar.data, 'name') ?? env.resource.calendarId ?? '',
        ),
      );
    },
  ],
  [
    'resourcetype',
    constant(Values.resourceType(dav('collection'), caldav('calendar'))),
  ],
  ['getetag', async (env) => present((await env.calendar()).etag)],
  ['getctag', async (env) => present((await env.calendar()).ctag)],
  [
    'getlastmodified',
    async (env) => {
      const { lastModified } = await env.calendar();
      return lastModified ? ok(Values.httpDate(lastModified)) : fail('not-found');
    },
  ],
  [
    'calendar-description',
    async (env) => present(textProperty((await env.calendar()).data, 'description')),
  ],
  [
    'calendar-timezone',
    async (env) => {
      const calendar = await env.calendar();
      const vtimezone = vtimezoneOf(calendar.data.getAllSubcomponents());
      return vtimezone
        ? ok(Values.text(serializeComponents([vtimezone], env.productId)))
        : fail('not-found');
    },
  ],
  [
    'timezone',
    async (env) => {
      const { data } = await env.calendar();
      const vtimezone = vtimezoneOf(data.getAllSubcomponents());
      return present(
        textProperty(data, 'x-timezone') ??
          (vtimezone ? textProperty(vtimezone, 'tzid') : undefined),
      );
    },
  ],
  [
    'supported-calendar-component-set',
    async (env) =>
      ok(Values.components((await env.calendar()).supportedComponents)),
  ],
  ['supported-calendar-data', SUPPORTED_CALENDAR_DATA],
  [
    'calendar-color',
    async (env) => present(textProperty((await env.calendar()).data, 'color')),
  ],
  [
    'color',
    async (env) => present(textProperty((await env.calendar()).data, 'color')),
  ],
  [
    'acl',
    async (env) => ok(ownAcl(env.href, privilegesFor(await env.calendar()))),
  ],
  [
    'current-user-privilege-set',
    async (env) => ok(Values.privileges(privilegesFor(await env.calendar()))),
  ],
  [
    'supported-report-set',
    constant(
      Values.reports([caldav('calendar-query'), caldav('calendar-multiget')]),
    ),
  ],
]);

async function primaryOf(env: ResolverEnvironment): Promise<ICAL.Component> {
  const primary = primaryComponent((await env.object()).components);
  if (!primary) throw new AbsentRecordError('object has no component');
  return primary;
}

const OBJECT_TABLE: ResolverTable = new Map<string, Resolver>([
  ...BASE_TABLE,
  ...LIMIT_RESOLVERS,
  [
    'displayname',
    async (env) => {
      const { components } = await env.object();
      const primary = primaryComponent(components);
      const summary = primary ? textProperty(primary, 'summary') : undefined;
      return ok(Values.text(summary ?? env.resource.objectId ?? ''));
    },
  ],
  [
    'resourcetype',
    async (env) => {
      const primary = await primaryOf(env);
      return ok(Values.resourceType(caldav(primary.name.toLowerCase())));
    },
  ],
  ['getetag', async (env) => present((await env.object()).etag)],
  [
    'getlastmodified',
    async (env) => ok(Values.httpDate((await env.object()).lastModified)),
  ],
  ['getcontenttype', constant(Values.text('text/calendar; charset=utf-8'))],
  [
    'calendar-description',
    async (env) => present(textProperty(await primaryOf(env), 'description')),
  ],
  [
    'calendar-timezone',
    async (env) => {
      const vtimezone = vtimezoneOf((await env.object()).components);
      return vtimezone
        ? ok(Values.text(serializeComponents([vtimezone], env.productId)))
        : fail('not-found');
    },
  ],
  [
    'calendar-data',
    async (env) => {
      const { components } = await env.object();
      return ok(Values.text(serializeComponents(components, env.productId)));
    },
  ],
  ['supported-calendar-data', SUPPORTED_CALENDAR_DATA],
  [
    'acl',
    async (env) => ok(ownAcl(env.href, privilegesFor(await env.calendar()))),
  ],
  [
    'current-user-privilege-set',
    async (env) => ok(Values.privileges(privilegesFor(await env.calendar()))),
  ],
  [
    'calendar-color',
    async (env) => {
      const calendar = await env.calendar();
      const color = textProperty(calendar.data, 'color');
      return present(color ?? (await env.user()).preferredColor);
    },
  ],
]);

export const RESOLVER_TABLES: Readonly<Record<ResourceType, ResolverTable>> = {
  'service-root': SERVICE_ROOT_TABLE,
  principal: PRINCIPAL_TABLE,
  'home-set': HOME_SET_TABLE,
  collection: COLLECTION_TABLE,
  object: OBJECT_TABLE,
  unknown: new Map(),
};

/** Names returned for `allprop`; absent ones are left out of the answer. */
export const ALLPROP_NAMES: readonly string[] = [
  'displayname',
  'resourcetype',
  'getetag',
  'getlastmodified',
  'getcontenttype',
  'getctag',
  'owner',
  'current-user-principal',
  'calendar-description',
  'calendar-color',
  'supported-calendar-component-set',
];

async function runResolver(
  name: string,
  resolver: Resolver,
  env: ResolverEnvironment,
  logger?: Logger,
): Promise<PropertyOutcome> {
  try {
    return await resolver(env);
  } catch (error) {
    if (error instanceof AbsentRecordError) return fail('not-found');
    logger?.warn(
      { err: error, property: name, href: env.href },
      'property resolution failed',
    );
    return fail('internal');
  }
}

/**
 * Resolves each requested property independently against the table of the
 * resource's type. Names without a resolver are not-found; a failing
 * resolver affects only its own entry.
 */
export async function resolveProperties(
  env: ResolverEnvironment,
  requested: readonly XmlName[],
  logger?: Logger,
): Promise<PropertySet> {
  const table = RESOLVER_TABLES[env.resource.type];
  const resolved: PropertySet = new Map();

  for (const property of requested) {
    const key = property.name.toLowerCase();
    if (resolved.has(key)) continue;
    const resolver = table.get(key);
    const outcome = resolver
      ? await runResolver(key, resolver, env, logger)
      : fail('not-found');
    resolved.set(key, {
      name: propertyName(key, property.namespace),
      outcome,
    });
  }
  return resolved;
}

/** Every name the resource's table can answer successfully. */
export async function resolvePropertyNames(
  env: ResolverEnvironment,
  logger?: Logger,
): Promise<PropertySet> {
  const table = RESOLVER_TABLES[env.resource.type];
  const all = await resolveProperties(
    env,
    [...table.keys()].map((name) => propertyName(name)),
    logger,
  );
  return new Map([...all].filter(([, entry]) => entry.outcome.ok));
}
