import assert from 'node:assert/strict';
import test from 'node:test';
import { MalformedUpstreamDataError } from '../utils/errors';
import { normalizeAlertItem, normalizeLatestAlert } from './alertNormalizer';

const ZONE = 'America/New_York';

test('picks the most recently published item', () => {
  const alert = normalizeLatestAlert([
    {
      guid: 'alert-1',
      title: 'Campus Closed',
      link: 'https://alerts.example.edu/1',
      isoDate: '2026-02-18T12:00:00.000Z',
      contentSnippet: 'Campus is closed due to ice.',
    },
    {
      guid: 'alert-2',
      title: 'All Clear',
      link: 'https://alerts.example.edu/2',
      isoDate: '2026-02-18T15:00:00.000Z',
      content: '<p>Normal operations resume at <b>noon</b>.</p>',
    },
  ], ZONE);

  assert.deepEqual(alert, {
    identity: 'alert-2',
    record: {
      title: 'All Clear',
      description: 'Normal operations resume at noon.',
      link: 'https://alerts.example.edu/2',
      pubDate: '2026-02-18T10:00:00-05:00',
    },
  });
});

test('falls back to the RFC-822 pubDate and then to feed order', () => {
  const dated = normalizeLatestAlert([
    { guid: 'a', title: 'Older', pubDate: 'Wed, 18 Feb 2026 12:00:00 GMT' },
    { guid: 'b', title: 'Newer', pubDate: 'Wed, 18 Feb 2026 13:00:00 GMT' },
  ], ZONE);
  assert.equal(dated?.identity, 'b');

  const undated = normalizeLatestAlert([
    { guid: 'first', title: 'First' },
    { guid: 'second', title: 'Second' },
  ], ZONE);
  assert.equal(undated?.identity, 'first');
  assert.equal(undated?.record.pubDate, null);
});

test('an empty feed has no latest alert', () => {
  assert.equal(normalizeLatestAlert([], ZONE), null);
});

test('identity falls back to link, then title and date', () => {
  assert.equal(normalizeAlertItem({ link: 'https://alerts.example.edu/9', title: 'Test' }, ZONE).identity, 'https://alerts.example.edu/9');
  assert.equal(
    normalizeAlertItem({ title: 'Shelter in place', isoDate: '2026-02-18T12:00:00.000Z' }, ZONE).identity,
    'Shelter in place|2026-02-18T07:00:00-05:00',
  );
});

test('an item with nothing to identify it is rejected', () => {
  assert.throws(() => normalizeAlertItem({ contentSnippet: 'orphan text' }, ZONE), MalformedUpstreamDataError);
});
