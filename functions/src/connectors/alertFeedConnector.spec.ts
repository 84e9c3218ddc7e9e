import assert from 'node:assert/strict';
import test from 'node:test';
import { UpstreamUnavailableError } from '../utils/errors';
import { AlertFeedConnector } from './alertFeedConnector';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Campus Alerts</title>
    <link>https://alerts.example.edu</link>
    <description>Emergency notices</description>
    <item>
      <title>Campus Closed</title>
      <link>https://alerts.example.edu/1</link>
      <guid>alert-1</guid>
      <pubDate>Wed, 18 Feb 2026 12:00:00 GMT</pubDate>
      <description>Campus is closed due to ice.</description>
    </item>
  </channel>
</rss>`;

test('parses RSS items into feed items', async () => {
  const connector = new AlertFeedConnector({ feedUrl: 'https://alerts.example.edu/rss' });
  const items = await connector.parse(FEED);

  assert.equal(items.length, 1);
  assert.equal(items[0]?.guid, 'alert-1');
  assert.equal(items[0]?.title, 'Campus Closed');
  assert.equal(items[0]?.link, 'https://alerts.example.edu/1');
  assert.equal(items[0]?.isoDate, '2026-02-18T12:00:00.000Z');
  assert.equal(items[0]?.contentSnippet, 'Campus is closed due to ice.');
});

test('unparseable documents surface as an upstream failure', async () => {
  const connector = new AlertFeedConnector({ feedUrl: 'https://alerts.example.edu/rss' });
  await assert.rejects(connector.parse('this is not a feed'), UpstreamUnavailableError);
});
