import assert from 'node:assert/strict';
import test from 'node:test';
import { ConfigError } from '../utils/errors';
import { loadConfig, requireSetting } from './runtimeConfig';

test('defaults cover everything but the secrets', () => {
  const config = loadConfig({});

  assert.equal(config.timeZone, 'America/New_York');
  assert.deepEqual(config.campus, { lat: 35.7717255492, lng: -78.6736536026 });
  assert.equal(config.alerts.topic, 'emergencyAlerts');
  assert.equal(config.alerts.feedUrl, undefined);
  assert.equal(config.engage.apiKey, undefined);
  assert.equal(config.localist.url, 'https://calendar.ncsu.edu/api/2/events');
});

test('reads overrides from the environment', () => {
  const config = loadConfig({
    CAMPUS_TIME_ZONE: 'America/Chicago',
    CAMPUS_LATITUDE: '40.5',
    ENGAGE_API_KEY: 'test-secret',
    ALERT_FEED_URL: 'https://alerts.example.edu/rss',
  });

  assert.equal(config.timeZone, 'America/Chicago');
  assert.equal(config.campus.lat, 40.5);
  assert.equal(config.engage.apiKey, 'test-secret');
  assert.equal(config.alerts.feedUrl, 'https://alerts.example.edu/rss');
});

test('invalid values are a configuration error', () => {
  assert.throws(() => loadConfig({ CAMPUS_TIME_ZONE: 'Mars/Olympus' }), ConfigError);
  assert.throws(() => loadConfig({ ALERT_FEED_URL: 'not a url' }), ConfigError);
  assert.throws(() => loadConfig({ CAMPUS_LATITUDE: '120' }), ConfigError);
});

test('requireSetting names the missing secret', () => {
  assert.equal(requireSetting('test-secret', 'OPENSPACE_API_KEY'), 'test-secret');
  assert.throws(() => requireSetting(undefined, 'OPENSPACE_API_KEY'), {
    name: 'ConfigError',
    message: 'OPENSPACE_API_KEY is not configured',
  });
});
