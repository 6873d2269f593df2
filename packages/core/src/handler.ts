import { pino } from 'pino';
import {
  CalDavError,
  CalendarDataError,
  RequestParseError,
  StorageError,
  isNotFound,
} from './errors';
import type { CompFilter } from './filter';
import { type MatchOptions, matchesFilter } from './filters';
import {
  DEFAULT_PRODUCT_ID,
  buildCalendarData,
  componentKind,
  objectComponents,
  parseCalendar,
  primaryComponent,
  serializeComponents,
  wrapComponents,
} from './ical';
import {
  type MultistatusDocument,
  buildMultistatus,
  buildResponse,
  buildStatusResponse,
  mergeDocuments,
  multistatusToXml,
} from './multistatus';
import { Values, propertyName } from './properties';
import {
  type PropertyRequest,
  parseDepth,
  parseMkcalendarRequest,
  parsePropfindRequest,
  parseReportRequest,
} from './report';
import {
  ALLPROP_NAMES,
  DEFAULT_LIMITS,
  type PropertySet,
  type ServerLimits,
  createResolverEnvironment,
  resolveProperties,
  resolvePropertyNames,
} from './resolvers';
import type { CalendarObject, Storage } from './storage';
import { CALENDAR_COMPONENT_TYPES, type Logger, type Resource } from './types';
import {
  type UrlConverter,
  createUrlConverter,
  encodeResourcePath,
  parseResourcePath,
  withUri,
} from './uri';
import { fetchChildren } from './walker';

export type HeaderValue = string | string[] | undefined;

export interface CalDavRequest {
  method: string;
  /** Request target as received, prefix included. */
  path: string;
  /** Lower-cased header names. */
  headers: Readonly<Record<string, HeaderValue>>;
  body?: string;
  /** Authenticated user id, when the transport authenticated one. */
  user?: string;
  signal?: AbortSignal;
}

export interface CalDavResponse {
  status: number;
  content: string;
  mimeType?: string;
  headers: Record<string, string>;
}

export interface CalDavHandlerOptions {
  storage: Storage;
  prefix?: string;
  logger?: Logger;
  limits?: ServerLimits;
  /** Recurrence instances examined per component when matching time ranges. */
  maxInstances?: number;
  productId?: string;
}

export const ALLOWED_METHODS = [
  'OPTIONS',
  'GET',
  'HEAD',
  'PUT',
  'DELETE',
  'PROPFIND',
  'REPORT',
  'MKCALENDAR',
  'MKCOL',
];

export const DAV_COMPLIANCE = '1, 3, calendar-access';

const XML_TYPE = 'application/xml; charset=utf-8';
const ICALENDAR_TYPE = 'text/calendar; charset=utf-8';
const TEXT_TYPE = 'text/plain; charset=utf-8';

function header(request: CalDavRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Splits an If-Match / If-None-Match list into its entity tags. */
function entityTags(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((tag) => tag.trim().replace(/^W\//, ''))
    .filter((tag) => tag !== '');
}

function matchesEtag(
  value: string | undefined,
  etag: string | undefined,
): boolean {
  const tags = entityTags(value);
  return etag !== undefined && (tags.includes('*') || tags.includes(etag));
}

const text = (status: number, content: string): CalDavResponse => ({
  status,
  content,
  mimeType: TEXT_TYPE,
  headers: {},
});

const empty = (
  status: number,
  headers: Record<string, string> = {},
): CalDavResponse => ({
  status,
  content: '',
  headers,
});

function methodNotAllowed(): CalDavResponse {
  return {
    ...text(405, 'method not allowed'),
    headers: { Allow: ALLOWED_METHODS.join(', ') },
  };
}

export class CalDavRequestHandler {
  readonly converter: UrlConverter;
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly limits: ServerLimits;
  private readonly productId: string;
  private readonly matchOptions: MatchOptions;

  constructor(options: CalDavHandlerOptions) {
    this.storage = options.storage;
    this.converter = createUrlConverter(options.prefix ?? '/');
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.productId = options.productId ?? DEFAULT_PRODUCT_ID;
    this.matchOptions = { maxInstances: options.maxInstances };
  }

  async handleRequest(request: CalDavRequest): Promise<CalDavResponse> {
    const { method, path } = request;
    this.logger.debug({ method, path }, 'caldav request');
    try {
      const response = await this.dispatch(request);
      this.logger.debug(
        { method, path, status: response.status },
        'caldav response',
      );
      return response;
    } catch (error) {
      return this.errorResponse(request, error);
    }
  }

  private errorResponse(request: CalDavRequest, error: unknown): CalDavResponse {
    const { method, path } = request;
    if (request.signal?.aborted) {
      this.logger.debug({ method, path }, 'request aborted');
      return text(499, 'request aborted');
    }
    if (error instanceof CalDavError) {
      const level = error.status >= 500 ? 'error' : 'warn';
      this.logger[level]({ err: error, method, path }, error.message);
      return text(error.status, error.message);
    }
    this.logger.error({ err: error, method, path }, 'unhandled request error');
    return text(500, 'internal server error');
  }

  private async dispatch(request: CalDavRequest): Promise<CalDavResponse> {
    const method = request.method.toUpperCase();
    if (method === 'OPTIONS') return this.options();
    if (!ALLOWED_METHODS.includes(method)) return methodNotAllowed();

    const resource = withUri(
      this.converter.parsePath(request.path),
      this.converter,
    );
    this.authorize(resource, request.user);

    switch (method) {
      case 'PROPFIND':
        return this.propfind(resource, request);
      case 'REPORT':
        return this.report(resource, request);
      case 'GET':
      case 'HEAD':
        return this.get(resource, request, method === 'HEAD');
      case 'PUT':
        return this.put(resource, request);
      case 'DELETE':
        return this.delete(resource, request);
      default:
        return this.mkcalendar(resource, request);
    }
  }

  private options(): CalDavResponse {
    return empty(200, {
      DAV: DAV_COMPLIANCE,
      Allow: ALLOWED_METHODS.join(', '),
    });
  }

  private authorize(resource: Resource, user: string | undefined): void {
    if (
      user !== undefined &&
      resource.userId !== undefined &&
      resource.userId !== user
    ) {
      throw new CalDavError(
        `access to ${resource.uri ?? 'resource'} is forbidden`,
        403,
      );
    }
  }

  private async requireExists(resource: Resource, user?: string): Promise<void> {
    const { userId, calendarId, objectId } = resource;
    switch (resource.type) {
      case 'service-root':
        return;
      case 'principal':
      case 'home-set':
        await this.storage.getUser(userId ?? user ?? '');
        return;
      case 'collection':
        await this.storage.getCalendar(userId ?? '', calendarId ?? '');
        return;
      case 'object':
        await this.storage.getObject(userId ?? '', calendarId ?? '', objectId ?? '');
        return;
      default:
        throw new StorageError('not-found', `no such resource: ${resource.uri}`);
    }
  }

  private async resolve(
    resource: Resource,
    request: PropertyRequest,
    user: string | undefined,
    object?: CalendarObject,
  ): Promise<PropertySet> {
    const env = createResolverEnvironment(resource, {
      storage: this.storage,
      converter: this.converter,
      authUser: user,
      limits: this.limits,
      productId: this.productId,
      preloaded: object ? { object } : undefined,
    });

    switch (request.kind) {
      case 'prop':
        return resolveProperties(env, request.names, this.logger);
      case 'propname': {
        const names = await resolvePropertyNames(env, this.logger);
        for (const entry of names.values()) {
          entry.outcome = { ok: true, value: Values.empty() };
        }
        return names;
      }
      case 'allprop': {
        const included = new Set(request.include.map(({ name }) => name.toLowerCase()));
        const resolved = await resolveProperties(
          env,
          [...ALLPROP_NAMES.map((name) => propertyName(name)), ...request.include],
          this.logger,
        );
        for (const [key, entry] of resolved) {
          const absent = !entry.outcome.ok && entry.outcome.error === 'not-found';
          if (absent && !included.has(key)) resolved.delete(key);
        }
        return resolved;
      }
    }
  }

  private async document(
    resource: Resource,
    request: PropertyRequest,
    user: string | undefined,
    object?: CalendarObject,
  ): Promise<MultistatusDocument> {
    const properties = await this.resolve(resource, request, user, object);
    const href = resource.uri ?? this.converter.encodePath(resource);
    return buildMultistatus([buildResponse(href, properties)]);
  }

  private multistatus(documents: MultistatusDocument[]): CalDavResponse {
    const merged = documents.length > 0 ? mergeDocuments(documents) : buildMultistatus([]);
    return {
      status: 207,
      content: multistatusToXml(merged),
      mimeType: XML_TYPE,
      headers: {},
    };
  }

  private async propfind(resource: Resource, request: CalDavRequest): Promise<CalDavResponse> {
    const properties = parsePropfindRequest(request.body ?? '');
    const depth = parseDepth(header(request, 'depth'));
    await this.requireExists(resource, request.user);

    const resources = [
      resource,
      ...(await fetchChildren(depth, resource, {
        storage: this.storage,
        converter: this.converter,
        signal: request.signal,
      })),
    ];

    const documents: MultistatusDocument[] = [];
    for (const target of resources) {
      request.signal?.throwIfAborted();
      documents.push(await this.document(target, properties, request.user));
    }
    return this.multistatus(documents);
  }

  private async report(resource: Resource, request: CalDavRequest): Promise<CalDavResponse> {
    const report = parseReportRequest(request.body ?? '');
    const documents: MultistatusDocument[] = [];

    if (report.kind === 'calendar-multiget') {
      for (const href of report.hrefs) {
        request.signal?.throwIfAborted();
        documents.push(await this.multigetDocument(href, report.properties, request.user));
      }
      return this.multistatus(documents);
    }

    for (const [target, object] of await this.queryObjects(resource, report.filter, request)) {
      request.signal?.throwIfAborted();
      documents.push(await this.document(target, report.properties, request.user, object));
    }
    return this.multistatus(documents);
  }

  private async queryObjects(
    resource: Resource,
    filter: CompFilter | null,
    request: CalDavRequest,
  ): Promise<Array<[Resource, CalendarObject]>> {
    const { userId, calendarId, objectId } = resource;
    const located = (object: CalendarObject): [Resource, CalendarObject] => [
      withUri(parseResourcePath(object.path), this.converter),
      object,
    ];

    switch (resource.type) {
      case 'object': {
        const object = await this.storage.getObject(userId ?? '', calendarId ?? '', objectId ?? '');
        const calendar = wrapComponents(object.components, this.productId);
        return matchesFilter(filter, calendar, this.matchOptions) ? [located(object)] : [];
      }
      case 'collection': {
        const objects = await this.storage.getObjectByFilter(userId ?? '', calendarId ?? '', filter);
        return objects.map(located);
      }
      case 'home-set': {
        const owner = userId ?? request.user ?? '';
        const results: Array<[Resource, CalendarObject]> = [];
        for (const calendar of await this.storage.getUserCalendars(owner)) {
          request.signal?.throwIfAborted();
          const collection = parseResourcePath(calendar.path);
          const objects = await this.storage.getObjectByFilter(
            owner,
            collection.calendarId ?? '',
            filter,
          );
          results.push(...objects.map(located));
        }
        return results;
      }
      default:
        throw new RequestParseError(`calendar-query is not supported on ${resource.type}`);
    }
  }

  private async multigetDocument(
    href: string,
    properties: PropertyRequest,
    user: string | undefined,
  ): Promise<MultistatusDocument> {
    let resource: Resource;
    try {
      resource = withUri(this.converter.parsePath(href), this.converter);
    } catch (error) {
      if (!(error instanceof CalDavError)) throw error;
      return buildMultistatus([buildStatusResponse(href, 404)]);
    }
    if (resource.type !== 'object') {
      return buildMultistatus([buildStatusResponse(href, 404)]);
    }
    if (user !== undefined && resource.userId !== user) {
      return buildMultistatus([buildStatusResponse(href, 403)]);
    }

    const { userId = '', calendarId = '', objectId = '' } = resource;
    try {
      const object = await this.storage.getObject(userId, calendarId, objectId);
      return await this.document(resource, properties, user, object);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      return buildMultistatus([buildStatusResponse(href, 404)]);
    }
  }

  private async get(
    resource: Resource,
    request: CalDavRequest,
    headOnly: boolean,
  ): Promise<CalDavResponse> {
    if (resource.type !== 'object') return methodNotAllowed();
    const { userId = '', calendarId = '', objectId = '' } = resource;
    const object = await this.storage.getObject(userId, calendarId, objectId);
    const headers = {
      ETag: object.etag,
      'Last-Modified': object.lastModified.toUTCString(),
    };

    if (matchesEtag(header(request, 'if-none-match'), object.etag)) {
      return empty(304, headers);
    }
    return {
      status: 200,
      content: headOnly ? '' : serializeComponents(object.components, this.productId),
      mimeType: ICALENDAR_TYPE,
      headers,
    };
  }

  private async findObject(resource: Resource): Promise<CalendarObject | undefined> {
    const { userId = '', calendarId = '', objectId = '' } = resource;
    try {
      return await this.storage.getObject(userId, calendarId, objectId);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  private async put(resource: Resource, request: CalDavRequest): Promise<CalDavResponse> {
    if (resource.type !== 'object') return methodNotAllowed();
    const contentType = header(request, 'content-type') ?? '';
    if (!contentType.toLowerCase().startsWith('text/calendar')) {
      throw new CalDavError(`unsupported content type: ${contentType || 'none'}`, 415);
    }

    const { userId = '', calendarId = '' } = resource;
    const calendar = await this.storage.getCalendar(userId, calendarId);
    if (calendar.readOnly) {
      throw new CalDavError('calendar is read-only', 403);
    }

    const existing = await this.findObject(resource);
    const ifMatch = header(request, 'if-match');
    if (ifMatch !== undefined && !matchesEtag(ifMatch, existing?.etag)) {
      throw new CalDavError('precondition failed: If-Match', 412);
    }
    if (existing && matchesEtag(header(request, 'if-none-match'), existing.etag)) {
      throw new CalDavError('precondition failed: If-None-Match', 412);
    }

    const components = objectComponents(parseCalendar(request.body ?? ''));
    if (!primaryComponent(components)) {
      throw new CalendarDataError('calendar object has no components');
    }
    for (const component of components) {
      const kind = componentKind(component);
      if (kind !== 'VTIMEZONE' && !calendar.supportedComponents.includes(kind)) {
        throw new CalDavError(`component ${kind} is not supported by this calendar`, 403);
      }
    }

    const etag = await this.storage.updateObject(userId, calendarId, {
      path: encodeResourcePath(resource),
      components,
    });
    if (existing) return empty(204, { ETag: etag });
    return empty(201, { ETag: etag, Location: resource.uri ?? request.path });
  }

  private async delete(resource: Resource, request: CalDavRequest): Promise<CalDavResponse> {
    const { userId = '', calendarId = '', objectId = '' } = resource;
    switch (resource.type) {
      case 'object': {
        const object = await this.storage.getObject(userId, calendarId, objectId);
        const ifMatch = header(request, 'if-match');
        if (ifMatch !== undefined && !matchesEtag(ifMatch, object.etag)) {
          throw new CalDavError('precondition failed: If-Match', 412);
        }
        await this.storage.deleteObject(userId, calendarId, objectId);
        return empty(204);
      }
      case 'collection':
        await this.storage.deleteCalendar(userId, calendarId);
        return empty(204);
      default:
        return methodNotAllowed();
    }
  }

  private async mkcalendar(resource: Resource, request: CalDavRequest): Promise<CalDavResponse> {
    if (resource.type !== 'collection') return methodNotAllowed();
    const { userId = '', calendarId = '' } = resource;

    try {
      await this.storage.getCalendar(userId, calendarId);
      return {
        ...text(405, 'calendar already exists'),
        headers: { Allow: ALLOWED_METHODS.join(', ') },
      };
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }

    const body = parseMkcalendarRequest(request.body ?? '');
    const components = body.components.length > 0 ? body.components : ['VEVENT'];
    const unknown = components.find(
      (name) => !CALENDAR_COMPONENT_TYPES.some((type) => type === name),
    );
    if (unknown) {
      throw new RequestParseError(`unsupported calendar component: ${unknown}`);
    }

    const calendar = await this.storage.createCalendar(userId, calendarId, {
      data: buildCalendarData(
        {
          name: body.displayName,
          description: body.description,
          color: body.color,
          timezoneId: body.timezoneId,
          timezone: body.timezone,
        },
        this.productId,
      ),
      supportedComponents: components,
    });
    return empty(201, {
      Location: resource.uri ?? request.path,
      ETag: calendar.etag,
    });
  }
}
