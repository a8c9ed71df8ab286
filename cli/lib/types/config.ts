/**
 * Shared config-related types
 */

export type ThemeName = 'light' | 'dark';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SettingValue = string | number | boolean | null | SettingValue[] | { [key: string]: SettingValue };

/** Free-form settings of one module (the `modules.<name>` section) */
export type ModuleSettings = Record<string, SettingValue>;

export interface GlanceConfig {
  dashboard: {
    title: string;
    refresh_interval: number;
    concurrent: boolean;
    theme: ThemeName;
    port: number;
  };
  http: {
    timeout: number;
  };
  logging: {
    level: LogLevel;
    file: string;
  };
  modules: Record<string, ModuleSettings>;
}

export type ConfigValueType = 'string' | 'optional-string' | 'number' | 'boolean' | 'enum';

export interface ConfigSchemaEntry {
  type: ConfigValueType;
  default: string | number | boolean;
  description: string;
  values?: string[];
  /** Upper bound for numbers */
  max?: number;
}

export type ConfigSchema = Record<string, ConfigSchemaEntry>;

export interface ConfigDisplayItem {
  key: string;
  value: unknown;
  default: unknown;
  description: string;
  type: string;
  values?: string[];
  isDefault: boolean;
}

export type ConfigOverrides = Record<string, string | number | boolean>;
