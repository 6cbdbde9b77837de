// ============================================================================
// Upstream HTTP
// ============================================================================
// JSON GET with query parameters and a bounded deadline. Used by every REST
// adapter; failures surface as HttpRequestError with a one-line message.
// ============================================================================

import { withRequestScope, type RequestScope } from './abort.js';
import { log } from '../config.js';
import { describeError } from '../errors.js';

export type QueryValue = string | number | boolean;

export interface GetJsonOptions {
  timeoutMs: number;
  /** Caller cancellation, e.g. the MCP request's signal */
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export class HttpRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'HttpRequestError';
    this.status = status;
  }
}

export function buildUrl(base: string, query: Record<string, QueryValue>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function abortFailure(scope: RequestScope, timeoutMs: number): HttpRequestError | null {
  switch (scope.reason()) {
    case 'timeout':
      return new HttpRequestError(`Request timed out after ${timeoutMs}ms`);
    case 'cancelled':
      return new HttpRequestError('Request cancelled');
    default:
      return null;
  }
}

export async function getJson(
  base: string,
  query: Record<string, QueryValue>,
  options: GetJsonOptions
): Promise<unknown> {
  const url = buildUrl(base, query);

  return withRequestScope(options.timeoutMs, options.signal, async (scope) => {
    log(`HTTP GET ${url}`);

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...options.headers },
        signal: scope.signal,
      });
    } catch (err) {
      throw abortFailure(scope, options.timeoutMs) ?? new HttpRequestError(describeError(err));
    }

    if (!res.ok) {
      throw new HttpRequestError(`HTTP ${res.status} ${res.statusText} for ${url}`, res.status);
    }

    try {
      return await res.json();
    } catch {
      throw abortFailure(scope, options.timeoutMs) ?? new HttpRequestError('Invalid JSON in response');
    }
  });
}
