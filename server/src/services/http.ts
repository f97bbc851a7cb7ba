/**
 * Outbound HTTP helper
 *
 * Every network-calling tool goes through here so they share one bounded
 * timeout policy.
 */

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

export class HttpTimeoutError extends Error {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

/**
 * fetch() with an abort deadline
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  options: HttpClientOptions = {}
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  try {
    return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new HttpTimeoutError(url, timeoutMs);
    }
    throw error;
  }
}
