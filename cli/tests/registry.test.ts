/**
 * Tests for the static module registry
 */
import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ModuleRegistry } from '../managers/registry-manager.js';
import { registerBuiltinModules } from '../modules/index.js';
import { ConfigError } from '../lib/errors.js';
import { stubModule } from './helpers/stubs.js';

test('registry: names keep registration order', () => {
  const registry = new ModuleRegistry()
    .register('stocks', () => stubModule('stocks', 'Stocks', { result: {} }))
    .register('weather', () => stubModule('weather', 'Weather', { result: {} }));
  assert.deepEqual(registry.names(), ['stocks', 'weather']);
  assert.equal(registry.has('weather'), true);
  assert.equal(registry.has('news'), false);
});

test('registry: duplicate names are rejected', () => {
  const registry = new ModuleRegistry().register('weather', () => stubModule('weather', 'Weather', { result: {} }));
  assert.throws(
    () => registry.register('weather', () => stubModule('weather', 'Weather', { result: {} })),
    { message: 'Module already registered: weather' }
  );
});

test('registry: invalid names are rejected', () => {
  assert.throws(() => new ModuleRegistry().register('Bad Name', () => stubModule('x', 'X', { result: {} })), /Invalid module name/);
});

test('registry: create passes the context to the factory', () => {
  const registry = new ModuleRegistry().register('clock', ctx => stubModule(ctx.name, 'Clock', { result: { tz: String(ctx.settings.tz) } }));
  const module = registry.create('clock', { name: 'clock', settings: { tz: 'UTC' }, timeoutMs: 0 });
  assert.equal(module.name, 'clock');
});

test('registry: unknown module is a ConfigError', () => {
  const registry = new ModuleRegistry().register('weather', () => stubModule('weather', 'Weather', { result: {} }));
  assert.throws(
    () => registry.create('radar', { name: 'radar', settings: {}, timeoutMs: 0 }),
    (err: unknown) => err instanceof ConfigError && err.message === 'Unknown module: radar. Registered: weather'
  );
});

test('registry: built-in modules in display order', () => {
  assert.deepEqual(registerBuiltinModules(new ModuleRegistry()).names(), ['weather', 'stocks', 'news']);
});
