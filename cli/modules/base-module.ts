/**
 * Base class for dashboard modules
 *
 * A module owns one data source client and one fragment template.
 * Subclasses build their client in the constructor, after validating settings.
 */
import { ConfigError, ModuleError } from '../lib/errors.js';
import { scopedLogger } from '../lib/logger.js';
import type { ScopedLogger } from '../lib/logger.js';
import { titleFromName } from '../lib/layout.js';
import { renderTemplate } from '../lib/template.js';
import type { ModuleSettings, SettingValue } from '../lib/types/config.js';
import type { DashboardModule, DataRecord, ModuleContext, ModuleInfo } from '../lib/types/module.js';

/** Anything that yields one record per call (HttpSourceClient and test stand-ins) */
export interface DataSource {
  fetch(): Promise<DataRecord>;
}

export abstract class BaseModule implements DashboardModule {
  readonly name: string;
  readonly title: string;
  protected readonly settings: ModuleSettings;
  protected readonly timeoutMs: number;
  protected readonly logger: ScopedLogger;

  abstract readonly info: ModuleInfo;
  protected abstract readonly client: DataSource;
  protected abstract readonly defaultTemplate: string;

  constructor(context: ModuleContext) {
    this.name = context.name;
    this.settings = context.settings;
    this.timeoutMs = context.timeoutMs;
    const title = context.settings.title;
    this.title = typeof title === 'string' && title.trim() !== '' ? title : titleFromName(context.name);
    this.logger = scopedLogger(this.title);
  }

  /**
   * Fetch this module's record
   * @throws ModuleError wrapping the client's failure
   */
  async fetch(): Promise<DataRecord> {
    try {
      return await this.client.fetch();
    } catch (e) {
      throw new ModuleError(this.name, e);
    }
  }

  render(record: DataRecord): string {
    return renderTemplate(this.template(), record);
  }

  init(): void {
    this.logger.debug('initialized', { version: this.info.version });
  }

  cleanup(): void {
    this.logger.debug('cleaned up');
  }

  protected template(): string {
    const custom = this.settings.template;
    return typeof custom === 'string' && custom.trim() !== '' ? custom : this.defaultTemplate;
  }

  /**
   * Check that required settings are present and non-empty
   * @throws ConfigError naming the first missing key
   */
  protected validateSettings(requiredKeys: string[]): void {
    for (const key of requiredKeys) {
      const value = this.settings[key];
      if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
        throw new ConfigError(`Missing setting '${key}' in modules.${this.name}`);
      }
    }
  }

  protected setting(key: string): SettingValue | undefined {
    return this.settings[key];
  }

  protected stringSetting(key: string, fallback: string): string;
  protected stringSetting(key: string): string | undefined;
  protected stringSetting(key: string, fallback?: string): string | undefined {
    const value = this.settings[key];
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return fallback;
  }

  protected numberSetting(key: string, fallback: number): number {
    const value = this.settings[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
    return fallback;
  }
}
