import { PathError } from './errors';
import type { Resource } from './types';

/** Maps request paths to resources and back. */
export interface UrlConverter {
  readonly prefix: string;
  parsePath(path: string): Resource;
  encodePath(resource: Resource): string;
}

const HOME_SEGMENT = 'cal';

export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? `/${trimmed}/` : '/';
}

function toPathname(path: string): string {
  // Multiget hrefs may be absolute URLs.
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(path)) {
    try {
      return new URL(path).pathname;
    } catch {
      throw new PathError(`invalid path: malformed URL '${path}'`);
    }
  }
  const [withoutQuery] = path.split(/[?#]/);
  return withoutQuery.startsWith('/') ? withoutQuery : `/${withoutQuery}`;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new PathError(`invalid path: malformed escape in '${segment}'`);
  }
}

export function parseResourcePath(path: string, prefix = '/'): Resource {
  const base = normalizePrefix(prefix).slice(0, -1);
  const pathname = toPathname(path);

  if (base && pathname !== base && !pathname.startsWith(`${base}/`)) {
    throw new PathError(
      `invalid path: '${pathname}' is outside of prefix '${base}/'`,
    );
  }

  const segments = pathname
    .slice(base.length)
    .split('/')
    .filter((segment) => segment !== '')
    .map(decodeSegment);

  const [userId, home, calendarId, objectId] = segments;
  const shown = `/${segments.join('/')}`;

  switch (segments.length) {
    case 0:
      return { type: 'service-root' };
    case 1:
      return { type: 'principal', userId };
    case 2:
      if (home !== HOME_SEGMENT) {
        throw new PathError(
          `invalid path: expected '/<userid>/cal', got '${shown}'`,
        );
      }
      return { type: 'home-set', userId };
    case 3:
      if (home !== HOME_SEGMENT) {
        throw new PathError(
          `invalid path: expected '/<userid>/cal/<calendarid>', got '${shown}'`,
        );
      }
      return { type: 'collection', userId, calendarId };
    case 4:
      if (home !== HOME_SEGMENT) {
        throw new PathError(
          `invalid path: expected '/<userid>/cal/<calendarid>/<objectid>', got '${shown}'`,
        );
      }
      return { type: 'object', userId, calendarId, objectId };
    default:
      throw new PathError(
        `invalid path: too many segments (${segments.length})`,
      );
  }
}

export function encodeResourcePath(resource: Resource, prefix = '/'): string {
  const base = normalizePrefix(prefix);
  const { userId, calendarId, objectId } = resource;
  const encode = encodeURIComponent;

  switch (resource.type) {
    case 'service-root':
      return base;
    case 'principal':
      if (!userId) {
        throw new PathError('invalid resource: principal must have a UserID');
      }
      return `${base}${encode(userId)}`;
    case 'home-set':
      if (!userId) {
        throw new PathError('invalid resource: home set must have a UserID');
      }
      return `${base}${encode(userId)}/${HOME_SEGMENT}/`;
    case 'collection':
      if (!userId || !calendarId) {
        throw new PathError(
          'invalid resource: collection must have both UserID and CalendarID',
        );
      }
      return `${base}${encode(userId)}/${HOME_SEGMENT}/${encode(calendarId)}/`;
    case 'object':
      if (!userId || !calendarId || !objectId) {
        throw new PathError(
          'invalid resource: object must have UserID, CalendarID, and ObjectID',
        );
      }
      return `${base}${encode(userId)}/${HOME_SEGMENT}/${encode(calendarId)}/${encode(objectId)}`;
    default:
      throw new PathError(`invalid resource type: ${resource.type}`);
  }
}

export function createUrlConverter(prefix = '/'): UrlConverter {
  const normalized = normalizePrefix(prefix);
  return {
    prefix: normalized,
    parsePath: (path) => parseResourcePath(path, normalized),
    encodePath: (resource) => encodeResourcePath(resource, normalized),
  };
}

/** Returns the resource with its encoded href cached in `uri`. */
export function withUri(resource: Resource, converter: UrlConverter): Resource {
  return resource.uri
    ? resource
    : { ...resource, uri: converter.encodePath(resource) };
}

export function principalOf(userId: string): Resource {
  return { type: 'principal', userId };
}

export function homeSetOf(userId: string): Resource {
  return { type: 'home-set', userId };
}
