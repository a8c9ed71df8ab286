/**
 * Shared command helpers: startup, logging setup, fatal errors
 */
import { ConfigError } from '../lib/errors.js';
import { setLogFile, setLogLevel } from '../lib/logger.js';
import { loadConfig } from '../managers/config-manager.js';
import { Dashboard } from '../managers/dashboard-manager.js';
import { ModuleRegistry } from '../managers/registry-manager.js';
import { registerBuiltinModules } from '../modules/index.js';
import type { GlanceConfig } from '../lib/types/config.js';

let _debug = false;

export function setDebug(enabled: boolean): void {
  _debug = enabled;
}

export const jsonOut = (data: unknown) => console.log(JSON.stringify(data, null, 2));

/**
 * Print a diagnostic and exit non-zero
 */
export function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * Load config and apply its logging settings
 */
export function loadConfigWithLogging(): GlanceConfig {
  const config = loadConfig();
  setLogLevel(_debug ? 'debug' : config.logging.level);
  setLogFile(config.logging.file || null);
  return config;
}

export function createRegistry(): ModuleRegistry {
  return registerBuiltinModules(new ModuleRegistry());
}

export interface Startup {
  config: GlanceConfig;
  registry: ModuleRegistry;
  dashboard: Dashboard;
}

/**
 * Config → registry → dashboard. ConfigError exits the process.
 */
export function startDashboard(): Startup {
  try {
    const config = loadConfigWithLogging();
    const registry = createRegistry();
    const dashboard = Dashboard.fromConfig(config, registry);
    dashboard.init();
    return { config, registry, dashboard };
  } catch (e) {
    if (e instanceof ConfigError) fail(e.message);
    throw e;
  }
}
