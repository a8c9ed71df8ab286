/**
 * Registry Manager - static module registry
 *
 * Maps a module name to the factory that builds it. Registration order is
 * display order. Adding a module means writing it and calling `register`.
 */
import { ConfigError } from '../lib/errors.js';
import type { DashboardModule, ModuleContext, ModuleFactory } from '../lib/types/module.js';

export class ModuleRegistry {
  private factories = new Map<string, ModuleFactory>();

  register(name: string, factory: ModuleFactory): this {
    if (!/^[a-z][a-z0-9_-]*$/.test(name)) {
      throw new Error(`Invalid module name: ${name} (lowercase letters, digits, _ and -)`);
    }
    if (this.factories.has(name)) {
      throw new Error(`Module already registered: ${name}`);
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /** Names in registration order */
  names(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * @throws ConfigError for unknown names
   */
  create(name: string, context: ModuleContext): DashboardModule {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError(`Unknown module: ${name}. Registered: ${this.names().join(', ') || '(none)'}`);
    }
    return factory(context);
  }
}
