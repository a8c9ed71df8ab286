/**
 * Tests for the dashboard HTTP server and routes (loopback, in process)
 */
import { test, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createServer, matchRoute } from '../dashboard/server.js';
import type { DashboardServer } from '../dashboard/server.js';
import { createRoutes } from '../dashboard/routes.js';
import { RefreshScheduler } from '../dashboard/scheduler.js';
import { Dashboard } from '../managers/dashboard-manager.js';
import { parseConfig } from '../managers/config-manager.js';
import { setLogSink } from '../lib/logger.js';
import { RequestError } from '../lib/errors.js';
import { isObject } from '../lib/source.js';
import { stubModule } from './helpers/stubs.js';

setLogSink(() => {});

// =============================================================================
// matchRoute
// =============================================================================

test('matchRoute: exact method and path', () => {
  assert.equal(matchRoute('GET /api/layout', 'GET', '/api/layout'), true);
  assert.equal(matchRoute('GET /api/layout', 'POST', '/api/layout'), false);
  assert.equal(matchRoute('GET /api/layout', 'GET', '/api/layout/extra'), false);
  assert.equal(matchRoute('GET /', 'GET', '/api'), false);
});

// =============================================================================
// Routes over HTTP
// =============================================================================

const events: string[] = [];
const dashboard = new Dashboard([
  stubModule('weather', 'Weather', { result: { temp: 72, condition: 'sunny' }, events, render: r => `Weather: ${String(r.temp)}°, ${String(r.condition)}` }),
  stubModule('stocks', 'Stocks', { result: new RequestError('timeout', 'No response within 10ms'), events })
]);
const scheduler = new RefreshScheduler(dashboard);
const config = parseConfig('dashboard:\n  title: Test Board\n  theme: light\n');

let server: DashboardServer;
let base = '';

before(async () => {
  server = createServer(0, createRoutes({
    scheduler,
    config,
    modules: dashboard.getModules(),
    template: '{{title}}|{{theme}}|{{fragments}}'
  }));
  await new Promise<void>(resolve => server.start(port => {
    base = `http://127.0.0.1:${port}`;
    resolve();
  }));
});

after(async () => {
  await new Promise<void>(resolve => server.stop(resolve));
});

function fetchCount(): number {
  return events.filter(e => e === 'start weather').length;
}

async function fragmentContents(res: Response): Promise<string[]> {
  const body: unknown = await res.json();
  assert.ok(isObject(body) && Array.isArray(body.fragments));
  return body.fragments.map((f: unknown) => (isObject(f) ? String(f.content) : ''));
}

test('GET /api/layout: refreshes on first use, then serves the stored layout', async () => {
  const res = await fetch(`${base}/api/layout`);
  assert.equal(res.status, 200);
  assert.equal(res.headers.get('cache-control'), 'no-store, no-cache, must-revalidate');
  assert.deepEqual(await fragmentContents(res), ['Weather: 72°, sunny', 'Stocks: unavailable']);

  const countBefore = fetchCount();
  await (await fetch(`${base}/api/layout`)).json();
  assert.equal(fetchCount(), countBefore);
});

test('POST /api/refresh: runs a refresh and returns the layout', async () => {
  const countBefore = fetchCount();
  const res = await fetch(`${base}/api/refresh`, { method: 'POST' });
  assert.equal(res.status, 200);
  assert.equal((await fragmentContents(res)).length, 2);
  assert.equal(fetchCount(), countBefore + 1);
});

test('POST /api/refresh?redirect=1: redirects to the page', async () => {
  const res = await fetch(`${base}/api/refresh?redirect=1`, { method: 'POST', redirect: 'manual' });
  assert.equal(res.status, 303);
  assert.equal(res.headers.get('location'), '/');
  await res.arrayBuffer();
});

test('GET /: page with theme from config or query', async () => {
  const light = await fetch(`${base}/`);
  assert.equal(light.headers.get('content-type'), 'text/html; charset=utf-8');
  assert.equal(
    await light.text(),
    'Test Board|light|<section class="fragment" data-module="weather">Weather: 72°, sunny</section>\n    ' +
    '<section class="fragment unavailable" data-module="stocks" title="Module stocks failed: timeout: No response within 10ms">Stocks: unavailable</section>'
  );

  const dark = await fetch(`${base}/?theme=dark`);
  assert.ok((await dark.text()).startsWith('Test Board|dark|'));

  const bogus = await fetch(`${base}/?theme=neon`);
  assert.ok((await bogus.text()).startsWith('Test Board|light|'));
});

test('GET /api/modules: names, titles, metadata', async () => {
  const res = await fetch(`${base}/api/modules`);
  assert.deepEqual(await res.json(), [
    { name: 'weather', title: 'Weather', version: '0.1', description: 'Weather stub', author: 'tests' },
    { name: 'stocks', title: 'Stocks', version: '0.1', description: 'Stocks stub', author: 'tests' }
  ]);
});

test('unknown route and wrong method are 404', async () => {
  const missing = await fetch(`${base}/nope`);
  assert.equal(missing.status, 404);
  assert.equal(await missing.text(), 'Not Found');

  const wrongMethod = await fetch(`${base}/api/refresh`);
  assert.equal(wrongMethod.status, 404);
  await wrongMethod.arrayBuffer();
});

test('start: a busy port moves to the next one; no listen error handler stays attached', async () => {
  assert.equal(server.httpServer.listenerCount('error'), 0);

  const busyPort = server.port;
  const second = createServer(busyPort, {});
  const logs: string[] = [];
  const originalLog = console.log;
  console.log = (message: string) => logs.push(message);
  let secondPort = 0;
  try {
    await new Promise<void>(resolve => second.start(port => {
      secondPort = port;
      resolve();
    }));
  } finally {
    console.log = originalLog;
  }

  assert.notEqual(secondPort, busyPort);
  assert.equal(logs[0], `Port ${busyPort} busy, trying ${busyPort + 1}...`);
  assert.equal(second.httpServer.listenerCount('error'), 0);
  await new Promise<void>(resolve => second.stop(resolve));
});
