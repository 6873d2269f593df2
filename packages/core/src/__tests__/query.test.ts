import assert from 'node:assert';
import { describe, it } from 'node:test';
import { matchesFilter } from '../filters';
import { parseCalendar } from '../ical';
import { NS_CALDAV, NS_DAV } from '../namespaces';
import { buildCalendarMultiget, buildCalendarQuery, buildObjectFilter } from '../query';
import { parseReportRequest } from '../report';

const REVIEW = parseCalendar(
  [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Test//Test//EN',
    'BEGIN:VEVENT',
    'UID:review@example.com',
    'DTSTAMP:20240101T000000Z',
    'DTSTART:20240115T100000Z',
    'DTEND:20240115T110000Z',
    'SUMMARY:Team Review',
    'STATUS:CONFIRMED',
    'PRIORITY:1',
    'CATEGORIES:Work,Important',
    'END:VEVENT',
    'END:VCALENDAR',
  ].join('\r\n'),
);

const JANUARY = {
  start: new Date(Date.UTC(2024, 0, 1)),
  end: new Date(Date.UTC(2024, 1, 1)),
};

describe('buildObjectFilter', () => {
  it('should require every criterion', () => {
    const filter = buildObjectFilter({
      timeRange: JANUARY,
      summary: 'team',
      notStatus: 'cancelled',
      priority: 1,
      categories: ['work', 'important'],
    });
    assert.strictEqual(matchesFilter(filter, REVIEW), true);

    assert.strictEqual(
      matchesFilter(buildObjectFilter({ summary: 'team', categories: ['home'] }), REVIEW),
      false,
    );
    assert.strictEqual(matchesFilter(buildObjectFilter({ notStatus: 'confirmed' }), REVIEW), false);
    assert.strictEqual(matchesFilter(buildObjectFilter({ priority: 10 }), REVIEW), false);
  });

  it('should look for alarms and other component kinds', () => {
    assert.strictEqual(matchesFilter(buildObjectFilter({ hasAlarm: true }), REVIEW), false);
    assert.strictEqual(matchesFilter(buildObjectFilter({ component: 'VTODO' }), REVIEW), false);
    assert.strictEqual(matchesFilter(buildObjectFilter(), REVIEW), true);
  });
});

describe('buildCalendarQuery', () => {
  it('should produce a body the report parser reads back', () => {
    const filter = buildObjectFilter({ timeRange: JANUARY, location: 'room' });
    assert.deepStrictEqual(parseReportRequest(buildCalendarQuery(filter)), {
      kind: 'calendar-query',
      properties: {
        kind: 'prop',
        names: [
          { namespace: NS_DAV, name: 'getetag' },
          { namespace: NS_CALDAV, name: 'calendar-data' },
        ],
      },
      filter,
    });
  });
});

describe('buildCalendarMultiget', () => {
  it('should list every href', () => {
    assert.strictEqual(
      buildCalendarMultiget(['/alice/cal/work/a.ics'], { etagOnly: true }),
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        '<cal:calendar-multiget xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav">' +
        '<d:prop><d:getetag/></d:prop><d:href>/alice/cal/work/a.ics</d:href>' +
        '</cal:calendar-multiget>',
    );
  });
});
