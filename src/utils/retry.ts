/**
 * Retry with exponential backoff for explicit downloads (`sync`).
 *
 * Match requests are never retried; a failed fetch there is reported and
 * the request is dropped.
 */

export interface RetryOptions {
  maxRetries?: number;         // default: 3
  initialDelayMs?: number;     // default: 1000
  maxDelayMs?: number;         // default: 30000
  backoffMultiplier?: number;  // default: 2
  retryableStatuses?: number[]; // default: [408, 429, 500, 502, 503, 504]
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * An HTTP failure that carries its status and, when the server sent one,
 * its Retry-After delay.
 */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
};

const NETWORK_ERROR_MARKERS = ['fetch failed', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'];

/**
 * Execute `fn`, retrying retryable failures.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof Error) || !isRetryableError(error, opts.retryableStatuses)) {
        throw error;
      }
      if (attempt >= opts.maxRetries) {
        throw error;
      }

      const baseDelay =
        retryAfter(error) ?? calculateBackoff(attempt, opts.initialDelayMs, opts.backoffMultiplier);
      const delayMs = Math.min(addJitter(baseDelay), opts.maxDelayMs);

      options.onRetry?.(error, attempt + 1, delayMs);

      await sleep(delayMs);
    }
  }
}

export function isRetryableError(error: Error, retryableStatuses: number[]): boolean {
  if (error instanceof HttpStatusError) {
    return retryableStatuses.includes(error.statusCode);
  }

  const causeMessage = error.cause instanceof Error ? error.cause.message : '';
  return NETWORK_ERROR_MARKERS.some(
    (marker) => error.message.includes(marker) || causeMessage.includes(marker),
  );
}

function retryAfter(error: Error): number | undefined {
  return error instanceof HttpStatusError ? error.retryAfterMs : undefined;
}

/**
 * Parse a Retry-After header given in seconds. HTTP-date values are ignored.
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function calculateBackoff(attempt: number, initialDelayMs: number, multiplier: number): number {
  return initialDelayMs * Math.pow(multiplier, attempt);
}

// 0.5x to 1.5x
function addJitter(delayMs: number): number {
  return Math.floor(delayMs * (0.5 + Math.random()));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
