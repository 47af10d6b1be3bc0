import test from 'node:test';
import assert from 'node:assert/strict';
import { DateTime } from 'luxon';

import { startTestServer } from './testServer.js';

test('app: root reports that the API is running', async (t) => {
  const server = await startTestServer();
  t.after(server.close);

  const response = await fetch(`${server.baseUrl}/`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { message: 'Financial Projection API is running' });
});

test('app: health returns status and an ISO timestamp', async (t) => {
  const server = await startTestServer();
  t.after(server.close);

  const response = await fetch(`${server.baseUrl}/health`);
  const body: unknown = await response.json();
  assert.equal(response.status, 200);
  assert.ok(body && typeof body === 'object' && 'status' in body && 'timestamp' in body);
  assert.equal(body.status, 'healthy');
  assert.equal(typeof body.timestamp, 'string');
  assert.equal(DateTime.fromISO(String(body.timestamp)).isValid, true);
});

test('app: allows any origin when none is configured', async (t) => {
  const server = await startTestServer();
  t.after(server.close);

  const response = await fetch(`${server.baseUrl}/health`, { headers: { Origin: 'http://localhost:3000' } });
  assert.equal(response.headers.get('access-control-allow-origin'), '*');
});

test('app: restricts CORS to the configured origin', async (t) => {
  const server = await startTestServer({ corsOrigin: 'https://dashboard.example.test' });
  t.after(server.close);

  const response = await fetch(`${server.baseUrl}/health`, { headers: { Origin: 'https://dashboard.example.test' } });
  assert.equal(response.headers.get('access-control-allow-origin'), 'https://dashboard.example.test');
});

test('app: unknown routes return 404', async (t) => {
  const server = await startTestServer();
  t.after(server.close);

  const response = await fetch(`${server.baseUrl}/forecast`);
  assert.equal(response.status, 404);
});
