/**
 * Stocks module - latest quote for one ticker symbol
 *
 * Speaks the Alpha Vantage GLOBAL_QUOTE API by default.
 */
import { HttpSourceClient, isObject, toNumber } from '../lib/source.js';
import type { DataRecord, ModuleContext } from '../lib/types/module.js';
import { BaseModule } from './base-module.js';

export const STOCKS_ENDPOINT = 'https://www.alphavantage.co/query';

export class StocksClient extends HttpSourceClient {
  protected parse(body: unknown): DataRecord {
    if (!isObject(body)) {
      throw this.malformed('expected an object');
    }
    const quote = body['Global Quote'];
    if (!isObject(quote) || Object.keys(quote).length === 0) {
      // Rate limits and bad symbols come back as 200 with a "Note"/"Information"/"Error Message" field
      const notice = body['Note'] ?? body['Information'] ?? body['Error Message'];
      throw this.malformed(typeof notice === 'string' ? notice : 'missing "Global Quote"');
    }

    const price = toNumber(quote['05. price']);
    if (price === null) {
      throw this.malformed('missing price');
    }

    return {
      symbol: typeof quote['01. symbol'] === 'string' ? quote['01. symbol'] : '',
      price,
      change: toNumber(quote['09. change']),
      changePercent: typeof quote['10. change percent'] === 'string' ? quote['10. change percent'] : ''
    };
  }
}

export class StocksModule extends BaseModule {
  readonly info = {
    version: '1.0',
    description: 'Latest price and daily change of a ticker',
    author: 'glance'
  };
  protected readonly defaultTemplate = 'Stocks: {{ symbol }} {{ price }} ({{ changePercent }})';
  protected readonly client: StocksClient;

  constructor(context: ModuleContext) {
    super(context);
    this.validateSettings(['symbol']);
    this.client = new StocksClient({
      endpoint: this.stringSetting('endpoint', STOCKS_ENDPOINT),
      apiKey: this.stringSetting('api_key'),
      apiKeyParam: 'apikey',
      query: {
        function: 'GLOBAL_QUOTE',
        symbol: this.stringSetting('symbol', '').toUpperCase()
      },
      timeoutMs: context.timeoutMs
    }, context.fetchFn);
  }
}
