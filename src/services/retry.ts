/**
 * Retry
 * Truncated exponential backoff for Google API calls. Rate limiting (429),
 * request timeouts, 5xx responses and dropped connections are retried;
 * a Retry-After header stretches the wait up to the cap.
 */

export interface RetryPolicy {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** First backoff step (default: 1000) */
  baseDelayMs: number;
  /** Cap on any single wait, Retry-After included (default: 32000) */
  maxDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Jitter source, 0 <= n < 1 */
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 32000,
} satisfies Partial<RetryPolicy>;

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export class RetryError extends Error {
  public readonly code = 'RETRY_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;

  constructor(originalError: unknown, attempts: number) {
    super(`Still failing after ${attempts} attempts`);
    this.name = 'RetryError';
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

/**
 * HTTP status of an ofetch FetchError, or of anything shaped like one
 */
export function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Node error code anywhere on the cause chain (fetch wraps socket errors)
 */
export function networkCodeOf(error: unknown): string | undefined {
  let current = error;
  for (let depth = 0; depth < 4 && current && typeof current === 'object'; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUSES.has(status);
  }
  const code = networkCodeOf(error);
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}

/**
 * Wait requested by the server's Retry-After header (seconds or HTTP date)
 */
export function retryAfterMs(error: unknown, now: number = Date.now()): number | undefined {
  if (!error || typeof error !== 'object' || !('response' in error)) {
    return undefined;
  }
  const { response } = error;
  if (!(response instanceof Response)) {
    return undefined;
  }
  const header = response.headers.get('retry-after');
  if (header === null) {
    return undefined;
  }
  if (/^\d+$/.test(header.trim())) {
    return Number(header.trim()) * 1000;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * min(base * 2^(retry-1) + jitter, max), jitter below one base step
 * @param retry 1 for the first retry
 */
export function backoffDelay(
  retry: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  const step = policy.baseDelayMs * 2 ** (Math.max(1, retry) - 1);
  return Math.min(step + random() * policy.baseDelayMs, policy.maxDelayMs);
}

/**
 * Call fn until it succeeds, fails with a non-transient error, or retries run out
 * @throws RetryError wrapping the last transient error once at least one retry was made
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: Partial<RetryPolicy> = {}
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_POLICY, ...policy };
  const shouldRetry = policy.shouldRetry ?? isTransientError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt > maxRetries) {
        throw maxRetries > 0 ? new RetryError(error, attempt) : error;
      }

      const delayMs = Math.min(
        Math.max(backoffDelay(attempt, { baseDelayMs, maxDelayMs }, policy.random), retryAfterMs(error) ?? 0),
        maxDelayMs
      );
      policy.onRetry?.(error, attempt, delayMs);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
