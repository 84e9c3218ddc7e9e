import assert from 'node:assert/strict';
import test from 'node:test';
import type { EngageFetchResult } from '../connectors/engageConnector';
import type { LocalistEventEnvelope } from '../connectors/localistConnector';
import {
  EventCollectionStore,
  isCalendarEventRecord,
  isOrganizationEventRecord,
} from '../services/eventCollectionStore';
import { InMemoryDocumentStore, StaticConnector, fixedClock } from '../testing/fakes';
import { CALENDAR_HORIZON_DAYS, ORGANIZATION_HORIZON_DAYS, syncCalendarEvents, syncOrganizationEvents } from './eventCollectionSync';

const ZONE = 'America/New_York';
const now = fixedClock('2026-02-18T17:00:00Z');

test('calendar sync skips malformed records and persists the rest', async () => {
  const documents = new InMemoryDocumentStore();
  const store = new EventCollectionStore(documents, 'calendarEvents', isCalendarEventRecord);

  const summary = await syncCalendarEvents({
    connector: new StaticConnector<LocalistEventEnvelope[]>(() => [
      { event: { id: 1, title: 'Open Mic', event_instances: [{ event_instance: { start: '2026-02-18T20:00:00-05:00' } }] } },
      { event: { title: 'No id' } },
      { event: { id: 2, title: 'No start' } },
    ]),
    store,
    timeZone: ZONE,
    horizonDays: CALENDAR_HORIZON_DAYS,
    now,
  });

  assert.equal(summary.path, 'events/calendarEvents');
  assert.equal(summary.skipped, 2);
  assert.equal(summary.added, 1);
  assert.equal(summary.todayCount, 1);

  const saved = await store.load();
  assert.deepEqual(Object.keys(saved?.items ?? {}), ['localist_1']);
  assert.equal(saved?.lastUpdated, '2026-02-18 12:00:00 PM');
});

test('organization sync merges into the stored collection', async () => {
  const documents = new InMemoryDocumentStore();
  await documents.setDocument('events', 'organizationEvents', {
    lastUpdated: '2026-02-17 09:00:00 AM',
    todayCount: 0,
    items: {
      engage_5: {
        id: 'engage_5',
        title: 'Spring Gala',
        description: null,
        start: '2026-04-20T19:00:00-04:00',
        end: null,
        allDay: false,
        location: null,
        url: null,
        imageUrl: null,
        source: 'engage',
        categories: [],
        organization: 'Student Government',
        benefits: null,
      },
      corrupt: { id: 'corrupt' },
    },
  });
  const store = new EventCollectionStore(documents, 'organizationEvents', isOrganizationEventRecord);

  const fetched: EngageFetchResult = {
    events: [{ id: 9, name: 'Chess Night', startsOn: '2026-02-19T23:00:00Z', submittedByOrganizationId: 55 }],
    organizations: { '55': 'Chess Club' },
  };

  const summary = await syncOrganizationEvents({
    connector: new StaticConnector(() => fetched),
    store,
    timeZone: ZONE,
    horizonDays: ORGANIZATION_HORIZON_DAYS,
    now,
  });

  assert.equal(summary.added, 1);
  assert.equal(summary.unconfirmed, 1);
  assert.equal(summary.total, 2);

  const saved = await store.load();
  assert.deepEqual(Object.keys(saved?.items ?? {}), ['engage_9', 'engage_5']);
  assert.equal(saved?.items.engage_9?.organization, 'Chess Club');
  assert.equal(saved?.items.engage_9?.start, '2026-02-19T18:00:00-05:00');
});

test('an empty batch still writes the pruned collection', async () => {
  const documents = new InMemoryDocumentStore();
  const store = new EventCollectionStore(documents, 'calendarEvents', isCalendarEventRecord);

  const summary = await syncCalendarEvents({
    connector: new StaticConnector<LocalistEventEnvelope[]>(() => []),
    store,
    timeZone: ZONE,
    horizonDays: CALENDAR_HORIZON_DAYS,
    now,
  });

  assert.equal(summary.total, 0);
  assert.equal(documents.writes, 1);
  assert.deepEqual(await documents.getDocument('events', 'calendarEvents'), {
    lastUpdated: '2026-02-18 12:00:00 PM',
    todayCount: 0,
    items: {},
  });
});
