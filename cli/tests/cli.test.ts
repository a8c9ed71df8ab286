/**
 * Tests for the glance entry point: exit codes and output of `glance run`
 */
import { test, after } from 'node:test';
import assert from 'node:assert/strict';
import { spawnSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
const ENTRY = path.join(ROOT, 'cli', 'glance.ts');
const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glance-cli-'));

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content);
  return file;
}

function glance(...args: string[]) {
  const result = spawnSync(process.execPath, ['--import', 'tsx', ENTRY, ...args], {
    cwd: ROOT,
    encoding: 'utf8',
    timeout: 60_000
  });
  return {
    status: result.status,
    stdout: result.stdout,
    stderrLines: result.stderr.split('\n')
  };
}

const NO_MODULES = 'Error: No modules enabled. Add a section under "modules:" in the config file (e.g. modules.weather.location).';

// Endpoint is not a URL, so the request fails before any network access
const FAILING_WEATHER = 'modules:\n  weather:\n    location: Nowhere\n    endpoint: not a url\n';

test('run: zero modules exits 1 with a diagnostic', () => {
  const result = glance('--config', writeConfig('empty.yaml', ''), 'run');
  assert.equal(result.status, 1);
  assert.equal(result.stdout, '');
  assert.ok(result.stderrLines.includes(NO_MODULES));
});

test('run: a failing module still exits 0 and prints its placeholder', () => {
  const result = glance('--config', writeConfig('failing.yaml', FAILING_WEATHER), 'run');
  assert.equal(result.status, 0);
  assert.equal(result.stdout, 'Weather: unavailable\n');
});

test('run: --with-config modules.<name>.enabled=false disables the module', () => {
  const result = glance(
    '--config', writeConfig('disabled.yaml', FAILING_WEATHER),
    '--with-config', 'modules.weather.enabled=false',
    'run'
  );
  assert.equal(result.status, 1);
  assert.ok(result.stderrLines.includes(NO_MODULES));
});

test('run: an invalid override exits 1', () => {
  const result = glance('--config', writeConfig('ok.yaml', FAILING_WEATHER), '--with-config', 'dashboard.concurrent=yes', 'run');
  assert.equal(result.status, 1);
  assert.ok(result.stderrLines.includes('Error: Invalid boolean for dashboard.concurrent: yes (expected true, false, 1 or 0)'));
});
