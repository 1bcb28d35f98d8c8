// ── Retry configuration ──

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_RETRY_WAIT_MS = 10_000;

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Longest `Retry-After` honoured; a server asking for more fails the call. */
  maxRetryWaitMs?: number;
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`HTTP request failed (${status}): ${body.slice(0, 300)}`);
    this.name = 'HttpError';
    this.status = status;
  }
}

/** `Retry-After` in delay-seconds form, as milliseconds. Other forms yield null. */
export function parseRetryAfter(header: string | null): number | null {
  if (!header || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim()) * 1000;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps a fetch call with retry logic and exponential backoff.
 * Specifically handles:
 *   - 429 Too Many Requests (rate limited): honours Retry-After up to `maxRetryWaitMs`
 *   - 5xx Server Errors: retries with backoff
 *   - Network errors and timeouts: retries with backoff
 * Any other non-2xx status throws an HttpError immediately.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {},
): Promise<Response> {
  const retries = options.retries ?? MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetryWaitMs = options.maxRetryWaitMs ?? MAX_RETRY_WAIT_MS;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    const backoffMs = baseDelayMs * Math.pow(2, attempt);
    try {
      const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });

      if (response.ok) return response;

      if (response.status === 429 || response.status >= 500) {
        lastError = new HttpError(response.status, await response.text());
        if (attempt < retries) {
          const requestedMs = response.status === 429 ? parseRetryAfter(response.headers.get('Retry-After')) : null;
          if (requestedMs !== null && requestedMs > maxRetryWaitMs) {
            throw new HttpError(response.status, `Retry-After of ${requestedMs}ms exceeds the ${maxRetryWaitMs}ms limit`);
          }
          const waitMs = requestedMs ?? backoffMs;
          console.warn(`[http] ${response.status} from ${new URL(url).host}, retrying in ${waitMs}ms (attempt ${attempt + 1}/${retries})`);
          await sleep(waitMs);
        }
        continue;
      }

      throw new HttpError(response.status, await response.text());
    } catch (error) {
      if (error instanceof HttpError) throw error;
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < retries) {
        console.warn(`[http] Network error, retrying in ${backoffMs}ms (attempt ${attempt + 1}/${retries}): ${lastError.message}`);
        await sleep(backoffMs);
      }
    }
  }

  throw lastError ?? new Error('HTTP request failed after retries');
}

export async function fetchJson<T>(url: string, options?: RetryOptions): Promise<T> {
  const response = await fetchWithRetry(url, { headers: { Accept: 'application/json' } }, options);
  return response.json() as Promise<T>;
}
