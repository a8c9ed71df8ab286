/**
 * Data source client base
 *
 * One client wraps one external API. Configuration is passed in explicitly;
 * clients never read the environment themselves.
 */
import { RequestError } from './errors.js';
import { buildUrl, requestJson, defaultFetch } from './http.js';
import type { FetchFn, QueryValue } from './http.js';
import type { DataRecord } from './types/module.js';

export interface SourceConfig {
  endpoint: string;
  /** API key, sent as a query parameter when `apiKeyParam` is set */
  apiKey?: string;
  apiKeyParam?: string;
  query?: Record<string, QueryValue>;
  /** 0 = no timeout */
  timeoutMs: number;
}

export abstract class HttpSourceClient {
  protected readonly config: SourceConfig;
  private readonly fetchFn: FetchFn;

  constructor(config: SourceConfig, fetchFn: FetchFn = defaultFetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  /** Full request URL, API key included */
  requestUrl(): string {
    const query: Record<string, QueryValue> = { ...this.config.query };
    if (this.config.apiKey && this.config.apiKeyParam) {
      query[this.config.apiKeyParam] = this.config.apiKey;
    }
    return buildUrl(this.config.endpoint, query);
  }

  /**
   * One request, one record.
   * @throws RequestError
   */
  async fetch(): Promise<DataRecord> {
    const body = await requestJson({ url: this.requestUrl(), timeoutMs: this.config.timeoutMs }, this.fetchFn);
    return this.parse(body);
  }

  /**
   * Turn the decoded body into a record. Throw (see `malformed`) on unexpected shapes.
   */
  protected abstract parse(body: unknown): DataRecord;

  protected malformed(detail: string): RequestError {
    return new RequestError('parse', `Malformed response: ${detail}`);
  }
}

// =============================================================================
// Shape helpers for parse()
// =============================================================================

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Number or numeric string */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}
