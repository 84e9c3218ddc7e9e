import assert from 'node:assert/strict';
import test from 'node:test';
import request from 'supertest';
import { UpstreamUnavailableError } from '../utils/errors';
import type { PipelineRegistry } from '../workers/pipelines';
import { createTriggerApp } from './routes';

const API_KEY = 'test-secret';
process.env.API_KEY = API_KEY;

function registry(overrides: Partial<PipelineRegistry> = {}): PipelineRegistry {
  const ok = async () => ({ written: 0 });
  return {
    weather: ok,
    parking: ok,
    busyness: ok,
    calendarEvents: ok,
    organizationEvents: ok,
    emergencyAlerts: ok,
    ...overrides,
  };
}

test('rejects requests without the API key', async () => {
  const response = await request(createTriggerApp(registry())).post('/sync/parking');

  assert.equal(response.status, 403);
  assert.equal(response.body.error, 'Forbidden');
});

test('runs the requested domain and returns its summary', async () => {
  let runs = 0;
  const app = createTriggerApp(registry({
    parking: async () => {
      runs += 1;
      return { path: 'liveParking', written: 4 };
    },
  }));

  const response = await request(app).post('/sync/parking').set('x-api-key', API_KEY);

  assert.equal(response.status, 200);
  assert.equal(runs, 1);
  assert.equal(response.body.success, true);
  assert.equal(response.body.domain, 'parking');
  assert.deepEqual(response.body.summary, { path: 'liveParking', written: 4 });
  assert.equal(typeof response.body.durationMs, 'number');
});

test('reports pipeline failures as 500', async () => {
  const app = createTriggerApp(registry({
    weather: async () => {
      throw new UpstreamUnavailableError('weatherstem responded with status 502');
    },
  }));

  const response = await request(app).post('/sync/weather').set('x-api-key', API_KEY);

  assert.equal(response.status, 500);
  assert.deepEqual(response.body, {
    success: false,
    domain: 'weather',
    error: 'weatherstem responded with status 502',
  });
});

test('unknown domains are 404', async () => {
  const response = await request(createTriggerApp(registry())).post('/sync/lunchMenu').set('x-api-key', API_KEY);

  assert.equal(response.status, 404);
  assert.equal(response.body.error, 'Unknown domain: lunchMenu');
});

test('status lists the domains', async () => {
  const response = await request(createTriggerApp(registry())).get('/status').set('x-api-key', API_KEY);

  assert.equal(response.status, 200);
  assert.equal(response.body.status, 'healthy');
  assert.deepEqual(response.body.domains, [
    'weather',
    'parking',
    'busyness',
    'calendarEvents',
    'organizationEvents',
    'emergencyAlerts',
  ]);
});
