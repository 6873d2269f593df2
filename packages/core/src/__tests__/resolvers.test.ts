import assert from 'node:assert';
import { before, describe, it } from 'node:test';
import { StorageError } from '../errors';
import { MemoryStorage } from '../memory-storage';
import { buildResponse } from '../multistatus';
import { NS_APPLE_ICAL, NS_CALDAV, NS_CALENDARSERVER, NS_DAV } from '../namespaces';
import {
  type PropertySet,
  createResolverEnvironment,
  resolveProperties,
  resolvePropertyNames,
} from '../resolvers';
import type { Calendar } from '../storage';
import type { Resource, XmlName } from '../types';
import { createUrlConverter } from '../uri';
import { childElements, findChild, findChildren, textContent } from '../xml';
import { seedStorage } from './fixtures';

const dav = (name: string): XmlName => ({ namespace: NS_DAV, name });
const caldav = (name: string): XmlName => ({ namespace: NS_CALDAV, name });

const converter = createUrlConverter('/');

const WORK: Resource = { type: 'collection', userId: 'alice', calendarId: 'work' };
const JAN: Resource = {
  type: 'object',
  userId: 'alice',
  calendarId: 'work',
  objectId: 'jan.ics',
};

function resolve(
  storage: MemoryStorage,
  resource: Resource,
  names: XmlName[],
  authUser?: string,
): Promise<PropertySet> {
  const env = createResolverEnvironment(resource, { storage, converter, authUser });
  return resolveProperties(env, names);
}

function outcome(set: PropertySet, name: string) {
  return set.get(name)?.outcome;
}

class FailingCalendarStorage extends MemoryStorage {
  async getCalendar(): Promise<Calendar> {
    throw new StorageError('unavailable', 'backend down');
  }
}

class CountingStorage extends MemoryStorage {
  calendarReads = 0;

  async getCalendar(userId: string, calendarId: string): Promise<Calendar> {
    this.calendarReads += 1;
    return super.getCalendar(userId, calendarId);
  }
}

describe('resolveProperties', () => {
  let storage: MemoryStorage;

  before(async () => {
    storage = await seedStorage();
  });

  describe('collection', () => {
    it('should read stored calendar properties', async () => {
      const set = await resolve(storage, WORK, [
        dav('displayname'),
        caldav('calendar-description'),
        { namespace: NS_APPLE_ICAL, name: 'calendar-color' },
        caldav('supported-calendar-component-set'),
      ]);

      assert.deepStrictEqual(outcome(set, 'displayname'), {
        ok: true,
        value: { type: 'text', text: 'Work' },
      });
      assert.deepStrictEqual(outcome(set, 'calendar-description'), {
        ok: true,
        value: { type: 'text', text: 'Work things' },
      });
      assert.deepStrictEqual(outcome(set, 'calendar-color'), {
        ok: true,
        value: { type: 'text', text: '#ff0000' },
      });
      assert.deepStrictEqual(outcome(set, 'supported-calendar-component-set'), {
        ok: true,
        value: { type: 'components', components: ['VEVENT'] },
      });
    });

    it('should describe a calendar collection', async () => {
      const set = await resolve(storage, WORK, [
        dav('resourcetype'),
        dav('acl'),
        dav('supported-report-set'),
      ]);

      assert.deepStrictEqual(outcome(set, 'resourcetype'), {
        ok: true,
        value: { type: 'resourcetype', kinds: [dav('collection'), caldav('calendar')] },
      });
      assert.deepStrictEqual(outcome(set, 'acl'), {
        ok: true,
        value: {
          type: 'acl',
          aces: [
            {
              principal: '/alice/cal/work/',
              grant: ['read', 'write', 'write-content', 'bind', 'unbind'],
              deny: [],
            },
          ],
        },
      });
      assert.deepStrictEqual(outcome(set, 'supported-report-set'), {
        ok: true,
        value: {
          type: 'reports',
          reports: [caldav('calendar-query'), caldav('calendar-multiget')],
        },
      });
    });

    it('should expose the ctag under the calendarserver namespace', async () => {
      const set = await resolve(storage, WORK, [dav('getctag')]);
      const entry = set.get('getctag');
      assert.ok(entry);
      assert.strictEqual(entry.name.namespace, NS_CALENDARSERVER);
      assert.strictEqual(entry.outcome.ok, true);
    });

    it('should hit storage once per record', async () => {
      const counting = new CountingStorage();
      counting.addUser({ id: 'carol', password: 'test-secret' });
      await counting.createCalendar('carol', 'home', {
        data: (await storage.getCalendar('alice', 'work')).data,
        supportedComponents: ['VEVENT'],
      });

      await resolve(counting, { type: 'collection', userId: 'carol', calendarId: 'home' }, [
        dav('displayname'),
        dav('getetag'),
        dav('getctag'),
        caldav('calendar-description'),
        dav('acl'),
      ]);
      assert.strictEqual(counting.calendarReads, 1);
    });
  });

  describe('object', () => {
    it('should echo the component kind and summary', async () => {
      const set = await resolve(storage, JAN, [
        dav('resourcetype'),
        dav('displayname'),
        dav('getcontenttype'),
      ]);

      assert.deepStrictEqual(outcome(set, 'resourcetype'), {
        ok: true,
        value: { type: 'resourcetype', kinds: [caldav('vevent')] },
      });
      assert.deepStrictEqual(outcome(set, 'displayname'), {
        ok: true,
        value: { type: 'text', text: 'Planning' },
      });
      assert.deepStrictEqual(outcome(set, 'getcontenttype'), {
        ok: true,
        value: { type: 'text', text: 'text/calendar; charset=utf-8' },
      });
    });

    it('should serialize calendar-data in a calendar', async () => {
      const set = await resolve(storage, JAN, [caldav('calendar-data')]);
      const data = outcome(set, 'calendar-data');
      assert.ok(data?.ok && data.value.type === 'text');
      assert.match(data.value.text, /^BEGIN:VCALENDAR\r\n/);
      assert.match(data.value.text, /\r\nUID:jan@example\.com\r\n/);
    });

    it('should report the ETag of the stored object', async () => {
      const object = await storage.getObject('alice', 'work', 'jan.ics');
      const set = await resolve(storage, JAN, [dav('getetag')]);
      assert.deepStrictEqual(outcome(set, 'getetag'), {
        ok: true,
        value: { type: 'text', text: object.etag },
      });
    });

    it('should report a storage rejection as internal', async () => {
      const set = await resolve(storage, { ...JAN, objectId: 'missing.ics' }, [
        dav('getetag'),
        dav('resourcetype'),
      ]);
      assert.deepStrictEqual(outcome(set, 'getetag'), { ok: false, error: 'internal' });
      assert.deepStrictEqual(outcome(set, 'resourcetype'), {
        ok: false,
        error: 'internal',
      });
    });
  });

  describe('principal and home set', () => {
    it('should describe the principal', async () => {
      const set = await resolve(storage, { type: 'principal', userId: 'alice' }, [
        dav('displayname'),
        caldav('calendar-home-set'),
        caldav('calendar-user-address-set'),
        dav('principal-url'),
      ]);

      assert.deepStrictEqual(outcome(set, 'displayname'), {
        ok: true,
        value: { type: 'text', text: 'Alice' },
      });
      assert.deepStrictEqual(outcome(set, 'calendar-home-set'), {
        ok: true,
        value: { type: 'href', href: '/alice/cal/' },
      });
      assert.deepStrictEqual(outcome(set, 'calendar-user-address-set'), {
        ok: true,
        value: { type: 'hrefs', hrefs: ['mailto:alice@example.com'] },
      });
      assert.deepStrictEqual(outcome(set, 'principal-url'), {
        ok: true,
        value: { type: 'href', href: '/alice' },
      });
    });

    it('should omit an empty calendar user address', async () => {
      const set = await resolve(storage, { type: 'principal', userId: 'bob' }, [
        caldav('calendar-user-address-set'),
      ]);
      assert.deepStrictEqual(outcome(set, 'calendar-user-address-set'), {
        ok: false,
        error: 'not-found',
      });
    });

    it('should bind the home set ACL to the principal', async () => {
      const set = await resolve(storage, { type: 'home-set', userId: 'alice' }, [
        dav('acl'),
        caldav('min-date-time'),
      ]);
      assert.deepStrictEqual(outcome(set, 'acl'), {
        ok: true,
        value: {
          type: 'acl',
          aces: [{ principal: '/alice', grant: ['read', 'write'], deny: [] }],
        },
      });
      assert.deepStrictEqual(outcome(set, 'min-date-time'), {
        ok: true,
        value: { type: 'iso-date', date: new Date(0) },
      });
    });
  });

  describe('service root', () => {
    it('should point the current user at their principal', async () => {
      const set = await resolve(
        storage,
        { type: 'service-root' },
        [dav('current-user-principal'), dav('owner'), dav('displayname')],
        'alice',
      );
      assert.deepStrictEqual(outcome(set, 'current-user-principal'), {
        ok: true,
        value: { type: 'href', href: '/alice' },
      });
      assert.deepStrictEqual(outcome(set, 'owner'), { ok: false, error: 'not-found' });
      assert.deepStrictEqual(outcome(set, 'displayname'), {
        ok: true,
        value: { type: 'text', text: 'CalDAV Service Root' },
      });
    });
  });

  it('should answer names without a resolver with not-found', async () => {
    const set = await resolve(storage, { type: 'principal', userId: 'alice' }, [
      dav('getctag'),
      { namespace: 'urn:example', name: 'x-unknown' },
    ]);
    assert.deepStrictEqual(outcome(set, 'getctag'), { ok: false, error: 'not-found' });
    assert.deepStrictEqual(set.get('x-unknown'), {
      name: { namespace: 'urn:example', name: 'x-unknown' },
      outcome: { ok: false, error: 'not-found' },
    });
  });

  it('should derive privileges from the read-only flag', async () => {
    const readOnly = await seedStorage();
    readOnly.setReadOnly('alice', 'work', true);
    const set = await resolve(readOnly, JAN, [dav('current-user-privilege-set')]);
    assert.deepStrictEqual(outcome(set, 'current-user-privilege-set'), {
      ok: true,
      value: { type: 'privileges', privileges: ['read'] },
    });
  });

  it('should degrade a not-found user lookup to internal', async () => {
    const set = await resolve(storage, { type: 'principal', userId: 'nobody' }, [
      dav('displayname'),
      caldav('calendar-user-address-set'),
      dav('resourcetype'),
    ]);
    assert.deepStrictEqual(outcome(set, 'displayname'), { ok: false, error: 'internal' });
    assert.deepStrictEqual(outcome(set, 'calendar-user-address-set'), {
      ok: false,
      error: 'internal',
    });
    assert.strictEqual(outcome(set, 'resourcetype')?.ok, true);
  });

  it('should leave records the resource does not address as not-found', async () => {
    const set = await resolve(storage, { type: 'service-root' }, [
      dav('current-user-principal'),
      caldav('calendar-user-address-set'),
    ]);
    assert.deepStrictEqual(outcome(set, 'current-user-principal'), {
      ok: false,
      error: 'not-found',
    });
    assert.deepStrictEqual(outcome(set, 'calendar-user-address-set'), {
      ok: false,
      error: 'not-found',
    });
  });

  it('should isolate a storage failure to its own property', async () => {
    const failing = new FailingCalendarStorage();
    failing.addUser({ id: 'alice', password: 'test-secret' });

    const set = await resolve(failing, WORK, [dav('resourcetype'), dav('displayname')]);
    assert.deepStrictEqual(outcome(set, 'displayname'), { ok: false, error: 'internal' });
    assert.strictEqual(outcome(set, 'resourcetype')?.ok, true);

    const response = buildResponse('/alice/cal/work/', set);
    const propstats = findChildren(response, 'propstat');
    assert.deepStrictEqual(
      propstats.map((propstat) => {
        const status = findChild(propstat, 'status');
        const prop = findChild(propstat, 'prop');
        return [
          status ? textContent(status) : '',
          prop ? childElements(prop).map((el) => el.name) : [],
        ];
      }),
      [
        ['HTTP/1.1 200 OK', ['resourcetype']],
        ['HTTP/1.1 500 Internal Server Error', ['displayname']],
      ],
    );
  });
});

describe('resolvePropertyNames', () => {
  it('should list only names that resolve', async () => {
    const storage = await seedStorage();
    const env = createResolverEnvironment(
      { type: 'principal', userId: 'bob' },
      { storage, converter },
    );
    const names = [...(await resolvePropertyNames(env)).keys()];

    assert.ok(names.includes('displayname'));
    assert.ok(names.includes('calendar-home-set'));
    assert.ok(!names.includes('calendar-user-address-set'));
    assert.ok(!names.includes('calendar-color'));
  });
});
