import { DAVNamespace } from 'tsdav';
import type { NamespaceBindings } from './xml';

export const NS_DAV: string = DAVNamespace.DAV;
export const NS_CALDAV: string = DAVNamespace.CALDAV;
export const NS_CALENDARSERVER: string = DAVNamespace.CALENDAR_SERVER;
export const NS_APPLE_ICAL: string = DAVNamespace.CALDAV_APPLE;
export const NS_GOOGLE = 'http://schemas.google.com/gCal/2005';

/** Prefixes declared on every multistatus document. */
export const DEFAULT_NAMESPACES: NamespaceBindings = [
  ['d', NS_DAV],
  ['cal', NS_CALDAV],
  ['cs', NS_CALENDARSERVER],
  ['ical', NS_APPLE_ICAL],
  ['g', NS_GOOGLE],
];
