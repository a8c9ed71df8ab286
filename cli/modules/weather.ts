/**
 * Weather module - current conditions for one location
 *
 * Speaks the OpenWeatherMap "current weather" API by default:
 *   GET {endpoint}?q=<location>&units=<units>&appid=<api_key>
 */
import { HttpSourceClient, isObject, toNumber } from '../lib/source.js';
import type { DataRecord, ModuleContext } from '../lib/types/module.js';
import { BaseModule } from './base-module.js';

export const WEATHER_ENDPOINT = 'https://api.openweathermap.org/data/2.5/weather';

export class WeatherClient extends HttpSourceClient {
  protected parse(body: unknown): DataRecord {
    if (!isObject(body) || !isObject(body.main)) {
      throw this.malformed('missing "main" section');
    }
    const temp = toNumber(body.main.temp);
    if (temp === null) {
      throw this.malformed('missing temperature');
    }

    const conditions = Array.isArray(body.weather) ? body.weather : [];
    const first: unknown = conditions[0];
    const condition = isObject(first) && typeof first.description === 'string' ? first.description : 'unknown';

    return {
      location: typeof body.name === 'string' ? body.name : '',
      temp,
      condition,
      humidity: toNumber(body.main.humidity)
    };
  }
}

export class WeatherModule extends BaseModule {
  readonly info = {
    version: '1.0',
    description: 'Current temperature and conditions',
    author: 'glance'
  };
  protected readonly defaultTemplate = 'Weather: {{ temp | round }}°, {{ condition }}';
  protected readonly client: WeatherClient;

  constructor(context: ModuleContext) {
    super(context);
    this.validateSettings(['location']);
    this.client = new WeatherClient({
      endpoint: this.stringSetting('endpoint', WEATHER_ENDPOINT),
      apiKey: this.stringSetting('api_key'),
      apiKeyParam: 'appid',
      query: {
        q: this.stringSetting('location', ''),
        units: this.stringSetting('units', 'imperial')
      },
      timeoutMs: context.timeoutMs
    }, context.fetchFn);
  }
}
