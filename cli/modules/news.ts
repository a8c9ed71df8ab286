/**
 * News module - top headlines (NewsAPI format)
 */
import { HttpSourceClient, isObject } from '../lib/source.js';
import type { SourceConfig } from '../lib/source.js';
import type { FetchFn } from '../lib/http.js';
import type { DataRecord, ModuleContext } from '../lib/types/module.js';
import { BaseModule } from './base-module.js';

export const NEWS_ENDPOINT = 'https://newsapi.org/v2/top-headlines';

export class NewsClient extends HttpSourceClient {
  private readonly limit: number;

  constructor(config: SourceConfig, limit: number, fetchFn?: FetchFn) {
    super(config, fetchFn);
    this.limit = limit;
  }

  protected parse(body: unknown): DataRecord {
    if (!isObject(body) || !Array.isArray(body.articles)) {
      const message = isObject(body) && typeof body.message === 'string' ? body.message : 'missing "articles"';
      throw this.malformed(message);
    }

    const headlines: string[] = [];
    for (const article of body.articles) {
      if (headlines.length >= this.limit) break;
      if (isObject(article) && typeof article.title === 'string' && article.title.trim() !== '') {
        headlines.push(article.title.trim());
      }
    }
    return { headlines };
  }
}

export class NewsModule extends BaseModule {
  readonly info = {
    version: '1.0',
    description: 'Top headlines',
    author: 'glance'
  };
  protected readonly defaultTemplate = 'News: {{ headlines | join: " | " }}';
  protected readonly client: NewsClient;

  constructor(context: ModuleContext) {
    super(context);
    const limit = Math.max(1, Math.floor(this.numberSetting('limit', 3)));
    this.client = new NewsClient({
      endpoint: this.stringSetting('endpoint', NEWS_ENDPOINT),
      apiKey: this.stringSetting('api_key'),
      apiKeyParam: 'apiKey',
      query: {
        country: this.stringSetting('country', 'us'),
        pageSize: limit
      },
      timeoutMs: context.timeoutMs
    }, limit, context.fetchFn);
  }
}
