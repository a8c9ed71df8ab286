/**
 * Config Manager - Configuration schema, loading, validation, and accessors
 *
 * Handles:
 * - Configuration schema definition (single source of truth)
 * - Config file loading (YAML) and merging with defaults
 * - Config validation against schema (invalid values fall back to defaults)
 * - CLI config overrides (--with-config key=value)
 * - ${ENV} expansion in module settings
 */
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../lib/errors.js';
import { logWarn, logDebug } from '../lib/logger.js';
import type {
  GlanceConfig,
  ConfigSchema,
  ConfigSchemaEntry,
  ConfigDisplayItem,
  ConfigOverrides,
  ModuleSettings,
  SettingValue,
  ThemeName,
  LogLevel
} from '../lib/types/config.js';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

export const CONFIG_SCHEMA: ConfigSchema = {
  'dashboard.title': {
    type: 'string',
    default: 'Glance',
    description: 'Dashboard title (page heading)'
  },
  'dashboard.refresh_interval': {
    type: 'number',
    default: 300,
    max: 86400,
    description: 'Seconds between refreshes in serve mode (0 = manual only)'
  },
  'dashboard.concurrent': {
    type: 'boolean',
    default: false,
    description: 'Fetch all modules at once instead of one after another'
  },
  'dashboard.theme': {
    type: 'enum',
    default: 'light',
    values: ['light', 'dark'],
    description: 'Color theme of the web page'
  },
  'dashboard.port': {
    type: 'number',
    default: 4300,
    max: 65535,
    description: 'Port for serve mode (next free port is used if busy)'
  },
  'http.timeout': {
    type: 'number',
    default: 10,
    max: 600,
    description: 'Per-request timeout in seconds (0 = no timeout)'
  },
  'logging.level': {
    type: 'enum',
    default: 'info',
    values: ['debug', 'info', 'warn', 'error'],
    description: 'Minimum log level'
  },
  'logging.file': {
    type: 'optional-string',
    default: '',
    description: "Log file path, {date} = YYYY-MM-DD (empty = stderr)"
  }
};

export const DEFAULT_CONFIG_FILE = 'glance.yaml';

// ============================================================================
// CONFIG STATE
// ============================================================================

let _config: GlanceConfig | null = null;
let _configPath: string | null = null;
let _configOverrides: ConfigOverrides = {};

/**
 * Set config file path (--config flag)
 */
export function setConfigPath(configPath: string): void {
  _configPath = path.resolve(configPath);
  _config = null;
}

/**
 * Config file path: --config, then GLANCE_CONFIG, then ./glance.yaml
 */
export function getConfigPath(): string {
  if (_configPath) return _configPath;
  const fromEnv = process.env.GLANCE_CONFIG;
  return path.resolve(fromEnv || DEFAULT_CONFIG_FILE);
}

/**
 * Set config overrides from CLI flag
 */
export function setConfigOverrides(overrides: ConfigOverrides): void {
  _configOverrides = { ..._configOverrides, ...overrides };
  _config = null;
}

/**
 * Parse a config override string: "key=value"
 * Schema keys are coerced to their type. `modules.<name>.<key>` stays a string,
 * except `true`/`false`, which become booleans.
 * @throws ConfigError
 */
export function parseConfigOverride(override: string): { key: string; value: string | number | boolean } {
  const match = override.match(/^([^=]+)=(.*)$/);
  if (!match) {
    throw new ConfigError(`Invalid config override format: ${override} (expected key=value, e.g. dashboard.theme=dark)`);
  }

  const [, key, rawValue] = match;
  if (/^modules\.[\w-]+\.[\w-]+$/.test(key)) {
    const lower = rawValue.toLowerCase();
    return { key, value: lower === 'true' || lower === 'false' ? lower === 'true' : rawValue };
  }

  const schema = CONFIG_SCHEMA[key];
  if (!schema) {
    throw new ConfigError(`Unknown config key: ${key}. Available keys: ${Object.keys(CONFIG_SCHEMA).join(', ')}`);
  }

  switch (schema.type) {
    case 'boolean': {
      const lower = rawValue.toLowerCase();
      if (lower === 'true' || lower === '1') return { key, value: true };
      if (lower === 'false' || lower === '0') return { key, value: false };
      throw new ConfigError(`Invalid boolean for ${key}: ${rawValue} (expected true, false, 1 or 0)`);
    }
    case 'number': {
      const value = parseInt(rawValue, 10);
      if (isNaN(value)) {
        throw new ConfigError(`Invalid number for ${key}: ${rawValue}`);
      }
      return { key, value };
    }
    case 'enum':
      if (schema.values && !schema.values.includes(rawValue)) {
        throw new ConfigError(`Invalid value for ${key}: ${rawValue}. Valid values: ${schema.values.join(', ')}`);
      }
      return { key, value: rawValue };
    default:
      return { key, value: rawValue };
  }
}

// ============================================================================
// CONFIG NESTED ACCESS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Get nested value from object using dot notation
 */
export function getNestedValue(obj: unknown, key: string): unknown {
  let value = obj;
  for (const part of key.split('.')) {
    if (!isRecord(value)) return undefined;
    value = value[part];
  }
  return value;
}

/**
 * Set nested value in object using dot notation
 */
function setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split('.');
  let target = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const next = target[parts[i]];
    if (isRecord(next)) {
      target = next;
    } else {
      const created: Record<string, unknown> = {};
      target[parts[i]] = created;
      target = created;
    }
  }
  target[parts[parts.length - 1]] = value;
}

/**
 * Deep merge objects
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key in source) {
    const value = source[key];
    const existing = target[key];
    if (isRecord(value)) {
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate a single schema value; warn and return the default when invalid
 */
function validateValue(key: string, schema: ConfigSchemaEntry, value: unknown): string | number | boolean {
  if (value === undefined || value === null) return schema.default;

  switch (schema.type) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      logWarn(`${key} should be boolean, got ${typeof value}`);
      break;
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        logWarn(`${key} should be positive number, got ${String(value)}`);
        break;
      }
      if (schema.max !== undefined && value > schema.max) {
        logWarn(`${key} should be at most ${schema.max}, got ${value}`);
        break;
      }
      return value;
    case 'string':
      if (typeof value === 'string' && value.trim() !== '') return value;
      logWarn(`${key} should be non-empty string, got ${typeof value}`);
      break;
    case 'optional-string':
      if (typeof value === 'string') return value;
      logWarn(`${key} should be string, got ${typeof value}`);
      break;
    case 'enum':
      if (typeof value === 'string' && schema.values?.includes(value)) return value;
      logWarn(`Invalid ${key} '${String(value)}'. Valid: ${(schema.values ?? []).join(', ')}`);
      break;
  }
  return schema.default;
}

// ============================================================================
// ENVIRONMENT EXPANSION
// ============================================================================

/**
 * Replace ${NAME} with the environment value (missing → empty + warning)
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      logWarn(`Environment variable ${name} is not set`);
      return '';
    }
    return resolved;
  });
}

/**
 * Convert a parsed YAML value to a plain setting value, expanding ${ENV} in strings
 */
function toSettingValue(value: unknown, env: NodeJS.ProcessEnv): SettingValue {
  if (typeof value === 'string') return expandEnv(value, env);
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(v => toSettingValue(v, env));
  if (isRecord(value)) {
    const out: Record<string, SettingValue> = {};
    for (const [k, v] of Object.entries(value)) out[k] = toSettingValue(v, env);
    return out;
  }
  return String(value);
}

function readModules(raw: unknown, env: NodeJS.ProcessEnv): Record<string, ModuleSettings> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError('modules must be a mapping of module name to settings');
  }
  const modules: Record<string, ModuleSettings> = {};
  for (const [name, section] of Object.entries(raw)) {
    if (section === null || section === undefined) {
      modules[name] = {};
    } else if (isRecord(section)) {
      const settings: ModuleSettings = {};
      for (const [k, v] of Object.entries(section)) settings[k] = toSettingValue(v, env);
      modules[name] = settings;
    } else {
      throw new ConfigError(`modules.${name} must be a mapping of settings`);
    }
  }
  return modules;
}

// ============================================================================
// CONFIG BUILDING & LOADING
// ============================================================================

/**
 * Build the typed config from YAML content. Pure apart from warnings.
 * @throws ConfigError on unparsable YAML or malformed `modules`
 */
export function parseConfig(content: string, overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): GlanceConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Could not parse config: ${reason}`);
  }
  if (parsed !== undefined && parsed !== null && !isRecord(parsed)) {
    throw new ConfigError('Config root must be a mapping');
  }

  const raw = deepMerge({}, isRecord(parsed) ? parsed : {});
  for (const [key, value] of Object.entries(overrides)) {
    setNestedValue(raw, key, value);
  }

  const values: Record<string, string | number | boolean> = {};
  for (const [key, schema] of Object.entries(CONFIG_SCHEMA)) {
    values[key] = validateValue(key, schema, getNestedValue(raw, key));
  }
  const str = (key: string) => String(values[key]);
  const num = (key: string) => Number(values[key]);
  const bool = (key: string) => values[key] === true;

  return {
    dashboard: {
      title: str('dashboard.title'),
      refresh_interval: num('dashboard.refresh_interval'),
      concurrent: bool('dashboard.concurrent'),
      theme: str('dashboard.theme') === 'dark' ? 'dark' : 'light',
      port: num('dashboard.port')
    },
    http: {
      timeout: num('http.timeout')
    },
    logging: {
      level: toLogLevel(str('logging.level')),
      file: str('logging.file')
    },
    modules: readModules(raw.modules, env)
  };
}

export function toLogLevel(value: string): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

export function toTheme(value: string | undefined, fallback: ThemeName): ThemeName {
  return value === 'dark' || value === 'light' ? value : fallback;
}

/**
 * Load configuration from file (cached)
 * A missing file yields the defaults with no modules enabled.
 * @throws ConfigError
 */
export function loadConfig(): GlanceConfig {
  if (_config) return _config;

  const configPath = getConfigPath();
  let content = '';
  if (fs.existsSync(configPath)) {
    content = fs.readFileSync(configPath, 'utf8');
    logDebug('Config loaded', { path: configPath });
  } else {
    logWarn(`No config file at ${configPath}, using defaults`);
  }

  _config = parseConfig(content, _configOverrides);
  return _config;
}

/**
 * Clear config cache (for testing or after config changes)
 */
export function clearConfigCache(): void {
  _config = null;
}

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/**
 * All schema values with defaults for display
 */
export function getConfigDisplay(config: GlanceConfig = loadConfig()): ConfigDisplayItem[] {
  return Object.entries(CONFIG_SCHEMA).map(([key, schema]) => {
    const value = getNestedValue(config, key);
    return {
      key,
      value,
      default: schema.default,
      description: schema.description,
      type: schema.type,
      values: schema.values,
      isDefault: value === schema.default
    };
  });
}
