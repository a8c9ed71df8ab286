/**
 * In-process stand-in for fetch
 */
import type { FetchFn, HttpRequestInit, HttpResponse } from '../../lib/http.js';

export interface FakeCall {
  url: string;
  init: HttpRequestInit;
}

export type FakeFetch = FetchFn & { calls: FakeCall[] };

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  500: 'Internal Server Error'
};

/**
 * Response with a JSON body (strings are sent as-is)
 */
export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: STATUS_TEXT[status] ?? '',
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body))
  };
}

/** Error shaped like the one fetch rejects with when AbortSignal.timeout fires */
export function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}

export function createFakeFetch(
  handler: (url: string, init: HttpRequestInit) => HttpResponse | Promise<HttpResponse>
): FakeFetch {
  const calls: FakeCall[] = [];
  const fn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return Object.assign(fn, { calls });
}
