import type { Storage } from './storage';
import type { Resource } from './types';
import { type UrlConverter, parseResourcePath, withUri } from './uri';

export interface WalkOptions {
  storage: Storage;
  converter: UrlConverter;
  signal?: AbortSignal;
}

/** Depth passed for `Depth: infinity`. */
export const INFINITE_DEPTH = Number.POSITIVE_INFINITY;

async function directChildren(
  parent: Resource,
  { storage }: WalkOptions,
): Promise<Resource[]> {
  const { userId, calendarId } = parent;
  switch (parent.type) {
    case 'home-set': {
      if (!userId) return [];
      const calendars = await storage.getUserCalendars(userId);
      return calendars.map((calendar) => parseResourcePath(calendar.path));
    }
    case 'collection': {
      if (!userId || !calendarId) return [];
      const paths = await storage.getObjectPathsInCollection(userId, calendarId);
      return paths.map((path) => parseResourcePath(path));
    }
    default:
      return [];
  }
}

/**
 * Descendants of `parent` down to `depth` levels, depth-first: each child is
 * followed by its own subtree before the next sibling. Storage failures end
 * the walk.
 */
export async function fetchChildren(
  depth: number,
  parent: Resource,
  options: WalkOptions,
): Promise<Resource[]> {
  if (depth <= 0) return [];
  options.signal?.throwIfAborted();

  const result: Resource[] = [];
  for (const child of await directChildren(parent, options)) {
    options.signal?.throwIfAborted();
    result.push(withUri(child, options.converter));
    result.push(...(await fetchChildren(depth - 1, child, options)));
  }
  return result;
}
