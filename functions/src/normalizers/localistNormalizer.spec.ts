import assert from 'node:assert/strict';
import test from 'node:test';
import { MalformedUpstreamDataError } from '../utils/errors';
import { normalizeLocalistEvent } from './localistNormalizer';

const ZONE = 'America/New_York';

test('normalizes a fully populated calendar event', () => {
  const record = normalizeLocalistEvent({
    event: {
      id: 5501,
      title: ' Spring Career Fair ',
      description: '<p>Meet employers &amp; recruiters</p>',
      location_name: 'Talley Student Union',
      address: '2610 Cates Ave',
      geo: { latitude: '35.7838', longitude: '-78.6752' },
      localist_url: 'https://calendar.example.edu/event/spring_career_fair',
      photo_url: 'https://images.example.edu/fair.jpg',
      event_instances: [
        { event_instance: { start: '2026-02-18T10:00:00-05:00', end: '2026-02-18T15:00:00-05:00', all_day: false } },
      ],
      filters: { event_types: [{ name: 'Career' }, { name: 'Networking' }] },
      departments: [{ name: 'Career Development Center' }],
    },
  }, ZONE);

  assert.deepEqual(record, {
    id: 'localist_5501',
    title: 'Spring Career Fair',
    description: 'Meet employers & recruiters',
    start: '2026-02-18T10:00:00-05:00',
    end: '2026-02-18T15:00:00-05:00',
    allDay: false,
    location: {
      name: 'Talley Student Union',
      address: '2610 Cates Ave',
      coordinate: { lat: 35.7838, lng: -78.6752 },
    },
    url: 'https://calendar.example.edu/event/spring_career_fair',
    imageUrl: 'https://images.example.edu/fair.jpg',
    source: 'localist',
    categories: ['Career', 'Networking'],
    department: 'Career Development Center',
  });
});

test('fills defaults for a sparse event', () => {
  const record = normalizeLocalistEvent({
    event: {
      id: 77,
      event_instances: [{ event_instance: { start: '2026-02-20T00:00:00-05:00' } }],
    },
  }, ZONE);

  assert.deepEqual(record, {
    id: 'localist_77',
    title: '',
    description: null,
    start: '2026-02-20T00:00:00-05:00',
    end: null,
    allDay: false,
    location: null,
    url: null,
    imageUrl: null,
    source: 'localist',
    categories: [],
    department: null,
  });
});

test('converts UTC instants and falls back to the text description', () => {
  const record = normalizeLocalistEvent({
    event: {
      id: 78,
      description: '',
      description_text: 'Plain text',
      location_name: 'Court of North Carolina',
      geo: { latitude: '35.78' },
      event_instances: [{ event_instance: { start: '2026-02-18T15:00:00Z', all_day: true } }],
    },
  }, ZONE);

  assert.equal(record.start, '2026-02-18T10:00:00-05:00');
  assert.equal(record.allDay, true);
  assert.equal(record.description, 'Plain text');
  assert.deepEqual(record.location, { name: 'Court of North Carolina', address: null, coordinate: null });
});

test('keeps the address and coordinate of an unnamed venue', () => {
  const record = normalizeLocalistEvent({
    event: {
      id: 79,
      address: '2610 Cates Ave',
      geo: { latitude: '35.7838', longitude: '-78.6752' },
      event_instances: [{ event_instance: { start: '2026-02-18T10:00:00-05:00' } }],
    },
  }, ZONE);

  assert.deepEqual(record.location, {
    name: null,
    address: '2610 Cates Ave',
    coordinate: { lat: 35.7838, lng: -78.6752 },
  });
});

test('keeps comparison operators written as entities', () => {
  const record = normalizeLocalistEvent({
    event: {
      id: 80,
      description: '<p>Open to grades 3 &lt; 5 and ages &gt; 10</p>',
      event_instances: [{ event_instance: { start: '2026-02-18T10:00:00-05:00' } }],
    },
  }, ZONE);

  assert.equal(record.description, 'Open to grades 3 < 5 and ages > 10');
});

test('rejects events without an id or a start', () => {
  assert.throws(
    () => normalizeLocalistEvent({ event: { title: 'Orphan' } }, ZONE),
    MalformedUpstreamDataError,
  );
  assert.throws(
    () => normalizeLocalistEvent({ event: { id: 1, event_instances: [] } }, ZONE),
    MalformedUpstreamDataError,
  );
  assert.throws(() => normalizeLocalistEvent({}, ZONE), MalformedUpstreamDataError);
});
