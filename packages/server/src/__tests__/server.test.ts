import assert from 'node:assert';
import { after, before, describe, it } from 'node:test';
import { createMemoryStorage } from '@davlane/core';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../server';

interface SentRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  payload?: string;
}

const ALICE = `Basic ${Buffer.from('alice:test-secret').toString('base64')}`;
const BOB = `Basic ${Buffer.from('bob:test-secret').toString('base64')}`;

const EVENT = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Test//Test//EN',
  'BEGIN:VEVENT',
  'UID:standup@example.com',
  'DTSTAMP:20240101T000000Z',
  'DTSTART:20240305T090000Z',
  'DTEND:20240305T091500Z',
  'SUMMARY:Standup',
  'END:VEVENT',
  'END:VCALENDAR',
].join('\r\n');

const QUERY = `<C:calendar-query xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:caldav">
  <D:prop><D:getetag/></D:prop>
  <C:filter>
    <C:comp-filter name="VCALENDAR">
      <C:comp-filter name="VEVENT">
        <C:time-range start="20240305T000000Z" end="20240306T000000Z"/>
      </C:comp-filter>
    </C:comp-filter>
  </C:filter>
</C:calendar-query>`;

describe('createServer', () => {
  let app: FastifyInstance;
  let origin: string;

  const send = ({ method, url, headers, payload }: SentRequest) =>
    fetch(`${origin}${url}`, { method, headers, body: payload, redirect: 'manual' });

  before(async () => {
    const storage = await createMemoryStorage([
      { id: 'alice', password: 'test-secret' },
      { id: 'bob', password: 'test-secret' },
    ]);
    app = await createServer({ storage, prefix: '/dav/', realm: 'test' });
    await app.listen({ port: 0, host: '127.0.0.1' });
    const address = app.server.address();
    assert.ok(address !== null && typeof address === 'object');
    origin = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await app.close();
  });

  it('should challenge unauthenticated requests', async () => {
    const response = await send({ method: 'PROPFIND', url: '/dav/alice/cal/' });
    assert.strictEqual(response.status, 401);
    assert.strictEqual(response.headers.get('www-authenticate'), 'Basic realm="test"');
    assert.strictEqual(await response.text(), 'authentication required');
  });

  it('should reject malformed authorization with 400', async () => {
    const response = await send({
      method: 'PROPFIND',
      url: '/dav/alice/cal/',
      headers: { authorization: 'Bearer test-token' },
    });
    assert.strictEqual(response.status, 400);
    assert.strictEqual(response.headers.get('www-authenticate'), null);
  });

  it('should answer OPTIONS with the DAV header', async () => {
    const response = await send({
      method: 'OPTIONS',
      url: '/dav/alice/cal/',
      headers: { authorization: ALICE },
    });
    assert.strictEqual(response.status, 200);
    assert.strictEqual(response.headers.get('dav'), '1, 3, calendar-access');
  });

  it('should list the seeded default calendar', async () => {
    const response = await send({
      method: 'PROPFIND',
      url: '/dav/alice/cal/',
      headers: { authorization: ALICE, depth: '1' },
    });
    assert.strictEqual(response.status, 207);
    assert.match(String(response.headers.get('content-type')), /^application\/xml/);
    assert.ok((await response.text()).includes('<d:href>/dav/alice/cal/default/</d:href>'));
  });

  it('should store, serve and query an event', async () => {
    const url = '/dav/alice/cal/default/standup.ics';

    const created = await send({
      method: 'PUT',
      url,
      headers: { authorization: ALICE, 'content-type': 'text/calendar' },
      payload: EVENT,
    });
    assert.strictEqual(created.status, 201);
    assert.strictEqual(created.headers.get('location'), url);
    const etag = created.headers.get('etag');
    assert.ok(typeof etag === 'string');

    const fetched = await send({ method: 'GET', url, headers: { authorization: ALICE } });
    assert.strictEqual(fetched.status, 200);
    assert.strictEqual(fetched.headers.get('etag'), etag);
    assert.match(await fetched.text(), /\r\nUID:standup@example\.com\r\n/);

    const report = await send({
      method: 'REPORT',
      url: '/dav/alice/cal/default/',
      headers: { authorization: ALICE, 'content-type': 'application/xml', depth: '1' },
      payload: QUERY,
    });
    assert.strictEqual(report.status, 207);
    assert.ok((await report.text()).includes(`<d:href>${url}</d:href>`));
  });

  it('should create calendars with MKCALENDAR', async () => {
    const response = await send({
      method: 'MKCALENDAR',
      url: '/dav/alice/cal/travel/',
      headers: { authorization: ALICE },
    });
    assert.strictEqual(response.status, 201);
    assert.strictEqual(response.headers.get('location'), '/dav/alice/cal/travel/');
  });

  it('should forbid access to calendars of other users', async () => {
    const response = await send({
      method: 'PROPFIND',
      url: '/dav/alice/cal/',
      headers: { authorization: BOB },
    });
    assert.strictEqual(response.status, 403);
  });

  it('should answer other methods with 405 and Allow', async () => {
    const response = await send({
      method: 'PATCH',
      url: '/dav/alice/cal/default/',
      headers: { authorization: ALICE },
    });
    assert.strictEqual(response.status, 405);
    assert.ok(String(response.headers.get('allow')).includes('MKCALENDAR'));
  });

  it('should redirect the well-known CalDAV location to the prefix', async () => {
    const response = await send({ method: 'GET', url: '/.well-known/caldav' });
    assert.strictEqual(response.status, 301);
    assert.strictEqual(response.headers.get('location'), '/dav/');
  });
});
