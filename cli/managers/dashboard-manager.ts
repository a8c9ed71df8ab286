/**
 * Dashboard Manager - builds modules and runs refresh passes
 *
 * MANAGER: reads config, orchestrates registry and modules.
 *
 * A refresh calls fetch() then render() on every module and collects one
 * fragment per module, in registration order. A failing module gets a
 * placeholder fragment; the rest of the pass continues.
 */
import { ConfigError, formatError } from '../lib/errors.js';
import { logDebug, logInfo, logWarn } from '../lib/logger.js';
import { buildLayout, placeholderFor } from '../lib/layout.js';
import type { FetchFn } from '../lib/http.js';
import type { GlanceConfig, ModuleSettings } from '../lib/types/config.js';
import type { DashboardLayout, DashboardModule, Fragment } from '../lib/types/module.js';
import type { ModuleRegistry } from './registry-manager.js';

export interface DashboardOptions {
  /** Fetch all modules at once (output order is unchanged) */
  concurrent?: boolean;
}

export interface ModuleStatus {
  name: string;
  registered: boolean;
  enabled: boolean;
}

/**
 * `enabled: false` (or the string "false") turns a configured module off
 */
export function isModuleEnabled(settings: ModuleSettings | undefined): boolean {
  if (settings === undefined) return false;
  const enabled = settings.enabled;
  return enabled !== false && !(typeof enabled === 'string' && enabled.trim().toLowerCase() === 'false');
}

/**
 * Names of modules to build: registered, configured, and not `enabled: false`.
 * Config sections naming unregistered modules are reported and skipped.
 */
export function resolveEnabledModules(config: GlanceConfig, registry: ModuleRegistry): string[] {
  for (const name of Object.keys(config.modules)) {
    if (!registry.has(name)) {
      logWarn(`Ignoring unknown module in config: ${name}`, { registered: registry.names() });
    }
  }
  return registry.names().filter(name => isModuleEnabled(config.modules[name]));
}

/**
 * Registered and configured modules, for listings
 */
export function getModuleStatuses(config: GlanceConfig, registry: ModuleRegistry): ModuleStatus[] {
  const enabled = new Set(resolveEnabledModules(config, registry));
  const names = [...registry.names(), ...Object.keys(config.modules).filter(n => !registry.has(n))];
  return names.map(name => ({
    name,
    registered: registry.has(name),
    enabled: enabled.has(name)
  }));
}

export class Dashboard {
  private readonly modules: DashboardModule[];
  private readonly concurrent: boolean;
  private initialized = false;

  /**
   * @throws ConfigError when no module is given
   */
  constructor(modules: DashboardModule[], options: DashboardOptions = {}) {
    if (modules.length === 0) {
      throw new ConfigError('No modules enabled. Add a section under "modules:" in the config file (e.g. modules.weather.location).');
    }
    this.modules = modules;
    this.concurrent = options.concurrent ?? false;
  }

  /**
   * Build the dashboard from config and registry.
   * @throws ConfigError on unknown modules, missing settings, or zero modules
   */
  static fromConfig(config: GlanceConfig, registry: ModuleRegistry, fetchFn?: FetchFn): Dashboard {
    const modules = resolveEnabledModules(config, registry).map(name =>
      registry.create(name, {
        name,
        settings: config.modules[name] ?? {},
        timeoutMs: config.http.timeout * 1000,
        fetchFn
      })
    );
    logDebug('Modules resolved', { modules: modules.map(m => m.name) });
    return new Dashboard(modules, { concurrent: config.dashboard.concurrent });
  }

  get moduleNames(): string[] {
    return this.modules.map(m => m.name);
  }

  getModules(): readonly DashboardModule[] {
    return this.modules;
  }

  /**
   * Run init hooks (once)
   */
  init(): void {
    if (this.initialized) return;
    for (const module of this.modules) module.init();
    this.initialized = true;
    logInfo(`Dashboard ready with ${this.modules.length} module(s)`, { modules: this.moduleNames });
  }

  /**
   * Run cleanup hooks (once, after init)
   */
  cleanup(): void {
    if (!this.initialized) return;
    for (const module of this.modules) module.cleanup();
    this.initialized = false;
  }

  /**
   * One refresh pass. Never rejects because of a module.
   */
  async refresh(): Promise<DashboardLayout> {
    this.init();
    let fragments: Fragment[];
    if (this.concurrent) {
      // Promise.all keeps input order regardless of completion order
      fragments = await Promise.all(this.modules.map(m => this.runModule(m)));
    } else {
      fragments = [];
      for (const module of this.modules) {
        fragments.push(await this.runModule(module));
      }
    }
    const failed = fragments.filter(f => !f.ok).length;
    logDebug('Refresh complete', { fragments: fragments.length, failed });
    return buildLayout(fragments);
  }

  private async runModule(module: DashboardModule): Promise<Fragment> {
    try {
      const record = await module.fetch();
      const content = module.render(record);
      return { module: module.name, title: module.title, content, ok: true };
    } catch (e) {
      const error = formatError(e);
      logWarn(`Module ${module.name} unavailable`, { error });
      return { module: module.name, title: module.title, content: placeholderFor(module.title), ok: false, error };
    }
  }
}
