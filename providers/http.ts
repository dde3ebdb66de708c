/**
 * Single-request JSON transport shared by the source clients
 *
 * Never throws: every failure is returned as a FetchError so that the caller
 * can log it and move on to the next query.
 */

import { ok } from '../src/errors.js';
import type { FetchError, Result } from '../src/errors.js';

export interface RequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Build a URL with query parameters
 */
export function buildUrl(base: string, params: Record<string, string | number> = {}): URL {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url;
}

/**
 * GET a JSON document
 */
export async function requestJson(
  url: URL,
  options: RequestOptions
): Promise<Result<unknown, FetchError>> {
  let response: Response;
  try {
    response = await fetch(url.toString(), {
      headers: {
        Accept: 'application/json',
        ...options.headers,
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      return { ok: false, error: { kind: 'timeout', timeoutMs: options.timeoutMs } };
    }
    return {
      ok: false,
      error: { kind: 'transport_failure', message: error instanceof Error ? error.message : String(error) },
    };
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { kind: 'unauthorized', status: response.status } };
  }

  if (!response.ok) {
    return { ok: false, error: { kind: 'server_error', status: response.status } };
  }

  try {
    const body: unknown = await response.json();
    return ok(body);
  } catch (error) {
    if (isTimeout(error)) {
      return { ok: false, error: { kind: 'timeout', timeoutMs: options.timeoutMs } };
    }
    return {
      ok: false,
      error: {
        kind: 'transport_failure',
        message: `Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }
}

/**
 * True when a single bounded page came back full; results past the bound
 * were dropped by the server and are not fetched.
 */
export function isPageFull(returned: number, bound: number, total: number | null): boolean {
  return returned >= bound || (total !== null && total > returned);
}
