import assert from 'node:assert';
import { describe, it } from 'node:test';
import { NS_APPLE_ICAL, NS_CALDAV, NS_DAV } from '../namespaces';
import {
  parseDepth,
  parseMkcalendarRequest,
  parsePropfindRequest,
  parseReportRequest,
} from '../report';

describe('parsePropfindRequest', () => {
  it('should treat an empty body as allprop', () => {
    assert.deepStrictEqual(parsePropfindRequest(''), { kind: 'allprop', include: [] });
    assert.deepStrictEqual(parsePropfindRequest('  \n'), {
      kind: 'allprop',
      include: [],
    });
  });

  it('should list requested property names', () => {
    const request = parsePropfindRequest(`<?xml version="1.0"?>
<d:propfind xmlns:d="DAV:" xmlns:cs="http://calendarserver.org/ns/" xmlns:x="http://apple.com/ns/ical/">
  <d:prop><d:displayname/><cs:getctag/><x:calendar-color/></d:prop>
</d:propfind>`);
    assert.deepStrictEqual(request, {
      kind: 'prop',
      names: [
        { namespace: NS_DAV, name: 'displayname' },
        { namespace: 'http://calendarserver.org/ns/', name: 'getctag' },
        { namespace: NS_APPLE_ICAL, name: 'calendar-color' },
      ],
    });
  });

  it('should read propname and allprop with include', () => {
    assert.deepStrictEqual(
      parsePropfindRequest('<propfind xmlns="DAV:"><propname/></propfind>'),
      { kind: 'propname' },
    );
    assert.deepStrictEqual(
      parsePropfindRequest(
        '<propfind xmlns="DAV:"><allprop/><include><acl/></include></propfind>',
      ),
      { kind: 'allprop', include: [{ namespace: NS_DAV, name: 'acl' }] },
    );
  });

  it('should reject other root elements', () => {
    assert.throws(() => parsePropfindRequest('<d:prop xmlns:d="DAV:"/>'), {
      name: 'RequestParseError',
      message: 'unexpected root element <prop>, expected <propfind>',
    });
  });
});

describe('parseReportRequest', () => {
  it('should parse a calendar-query', () => {
    const report = parseReportRequest(`<C:calendar-query xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">
  <D:prop><D:getetag/><C:calendar-data/></D:prop>
  <C:filter><C:comp-filter name="VCALENDAR"><C:comp-filter name="VTODO"/></C:comp-filter></C:filter>
</C:calendar-query>`);

    assert.strictEqual(report.kind, 'calendar-query');
    assert.deepStrictEqual(report.properties, {
      kind: 'prop',
      names: [
        { namespace: NS_DAV, name: 'getetag' },
        { namespace: NS_CALDAV, name: 'calendar-data' },
      ],
    });
    assert.ok(report.kind === 'calendar-query' && report.filter);
    assert.strictEqual(report.filter.compFilters[0].name, 'VTODO');
  });

  it('should parse a calendar-multiget', () => {
    const report = parseReportRequest(`<C:calendar-multiget xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">
  <D:prop><D:getetag/></D:prop>
  <D:href>/alice/cal/work/jan.ics</D:href>
  <D:href> /alice/cal/work/feb.ics </D:href>
  <D:href></D:href>
</C:calendar-multiget>`);

    assert.deepStrictEqual(report, {
      kind: 'calendar-multiget',
      properties: { kind: 'prop', names: [{ namespace: NS_DAV, name: 'getetag' }] },
      hrefs: ['/alice/cal/work/jan.ics', '/alice/cal/work/feb.ics'],
    });
  });

  it('should reject unsupported reports and empty bodies', () => {
    assert.throws(() => parseReportRequest('<D:sync-collection xmlns:D="DAV:"/>'), {
      name: 'RequestParseError',
      message: 'unsupported report: sync-collection',
    });
    assert.throws(() => parseReportRequest(''), {
      name: 'RequestParseError',
      message: 'REPORT requires a request body',
    });
  });
});

describe('parseMkcalendarRequest', () => {
  it('should collect the properties to set', () => {
    const request = parseMkcalendarRequest(`<C:mkcalendar xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav" xmlns:A="http://apple.com/ns/ical/">
  <D:set><D:prop>
    <D:displayname>Holidays</D:displayname>
    <C:calendar-description>Days off</C:calendar-description>
    <A:calendar-color>#00AA00</A:calendar-color>
    <C:supported-calendar-component-set>
      <C:comp name="vevent"/><C:comp name="VTODO"/>
    </C:supported-calendar-component-set>
  </D:prop></D:set>
</C:mkcalendar>`);

    assert.deepStrictEqual(request, {
      displayName: 'Holidays',
      description: 'Days off',
      color: '#00AA00',
      components: ['VEVENT', 'VTODO'],
    });
  });

  it('should accept an empty body', () => {
    assert.deepStrictEqual(parseMkcalendarRequest(''), { components: [] });
  });
});

describe('parseDepth', () => {
  it('should map Depth header values', () => {
    assert.strictEqual(parseDepth('0'), 0);
    assert.strictEqual(parseDepth('1'), 1);
    assert.strictEqual(parseDepth('Infinity'), Number.POSITIVE_INFINITY);
    assert.strictEqual(parseDepth(undefined), Number.POSITIVE_INFINITY);
  });

  it('should reject other values', () => {
    assert.throws(() => parseDepth('2'), {
      name: 'RequestParseError',
      message: 'invalid Depth header: 2',
    });
  });
});
