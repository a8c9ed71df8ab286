/**
 * HTTP helpers for data source clients
 *
 * PURE LIB: no config access. Callers pass everything in, including the
 * fetch implementation (tests inject a stand-in).
 */
import { RequestError } from './errors.js';

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export type QueryValue = string | number | boolean;

export interface JsonRequest {
  url: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

/**
 * Build a URL from an endpoint and query parameters.
 * Parameters already present on the endpoint are kept unless overridden.
 */
export function buildUrl(endpoint: string, query: Record<string, QueryValue> = {}): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (e) {
    throw new RequestError('network', `Invalid endpoint URL: ${endpoint}`, { cause: e });
  }
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Issue a single GET and parse the JSON body. No retries.
 * @throws RequestError
 */
export async function requestJson(request: JsonRequest, fetchFn: FetchFn = defaultFetch): Promise<unknown> {
  const init: HttpRequestInit = {
    headers: { Accept: 'application/json', ...request.headers }
  };
  if (request.timeoutMs > 0) {
    init.signal = AbortSignal.timeout(request.timeoutMs);
  }

  let response: HttpResponse;
  let body: string;
  try {
    response = await fetchFn(request.url, init);
    body = await response.text();
  } catch (e) {
    if (isTimeout(e)) {
      throw new RequestError('timeout', `No response within ${request.timeoutMs}ms`, { cause: e });
    }
    const reason = e instanceof Error ? e.message : String(e);
    throw new RequestError('network', `Request failed: ${reason}`, { cause: e });
  }

  if (response.status === 401 || response.status === 403) {
    throw new RequestError('auth', `Authentication rejected (${response.status} ${response.statusText})`, { status: response.status });
  }
  if (!response.ok) {
    throw new RequestError('http', `Unexpected status ${response.status} ${response.statusText}`, { status: response.status });
  }

  try {
    return JSON.parse(body);
  } catch (e) {
    throw new RequestError('parse', 'Response is not valid JSON', { cause: e });
  }
}
