/**
 * Built-in modules, in display order
 */
import type { ModuleRegistry } from '../managers/registry-manager.js';
import { WeatherModule } from './weather.js';
import { StocksModule } from './stocks.js';
import { NewsModule } from './news.js';

export function registerBuiltinModules(registry: ModuleRegistry): ModuleRegistry {
  return registry
    .register('weather', ctx => new WeatherModule(ctx))
    .register('stocks', ctx => new StocksModule(ctx))
    .register('news', ctx => new NewsModule(ctx));
}
