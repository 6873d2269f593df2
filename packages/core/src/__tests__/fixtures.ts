import { buildCalendarData, objectComponents, parseCalendar } from '../ical';
import { MemoryStorage } from '../memory-storage';

export function eventText(
  uid: string,
  start: string,
  end: string,
  summary = uid,
): string {
  return [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Test//Test//EN',
    'BEGIN:VEVENT',
    `UID:${uid}`,
    'DTSTAMP:20240101T000000Z',
    `DTSTART:${start}`,
    `DTEND:${end}`,
    `SUMMARY:${summary}`,
    'END:VEVENT',
    'END:VCALENDAR',
  ].join('\r\n');
}

export const TODO_TEXT = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Test//Test//EN',
  'BEGIN:VTODO',
  'UID:todo@example.com',
  'SUMMARY:File report',
  'END:VTODO',
  'END:VCALENDAR',
].join('\r\n');

/**
 * alice owns `work` (events only) holding `jan.ics` (15 Jan 2024) and
 * `feb.ics` (1 Feb 2024). bob exists with no calendars.
 */
export async function seedStorage(): Promise<MemoryStorage> {
  const storage = new MemoryStorage();
  storage.addUser({
    id: 'alice',
    password: 'test-secret',
    displayName: 'Alice',
    userAddress: 'mailto:alice@example.com',
    preferredColor: '#00ff00',
  });
  storage.addUser({ id: 'bob', password: 'test-secret' });

  await storage.createCalendar('alice', 'work', {
    data: buildCalendarData({
      name: 'Work',
      description: 'Work things',
      color: '#ff0000',
    }),
    supportedComponents: ['VEVENT'],
  });
  await storage.updateObject('alice', 'work', {
    path: '/alice/cal/work/jan.ics',
    components: objectComponents(
      parseCalendar(
        eventText('jan@example.com', '20240115T100000Z', '20240115T110000Z', 'Planning'),
      ),
    ),
  });
  await storage.updateObject('alice', 'work', {
    path: '/alice/cal/work/feb.ics',
    components: objectComponents(
      parseCalendar(
        eventText('feb@example.com', '20240201T100000Z', '20240201T110000Z', 'Review'),
      ),
    ),
  });
  return storage;
}
