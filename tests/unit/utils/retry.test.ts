/**
 * Tests for retry logic with exponential backoff.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  withRetry,
  isRetryableError,
  parseRetryAfter,
  HttpStatusError,
} from '@/utils/retry.js';

const RETRYABLE = [408, 429, 500, 502, 503, 504];

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    // No jitter: every delay is exactly the base delay
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should return result on first success', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const promise = withRetry(fn);
    await vi.runAllTimersAsync();

    expect(await promise).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on a retryable HTTP status', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new HttpStatusError('Service unavailable', 503))
      .mockResolvedValueOnce('success');

    const promise = withRetry(fn, { initialDelayMs: 100 });

    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(100);

    expect(await promise).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry a client error', async () => {
    const fn = vi.fn().mockRejectedValue(new HttpStatusError('Not Found', 404));

    await expect(withRetry(fn, { initialDelayMs: 100 })).rejects.toThrow('Not Found');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on network errors', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('fetch failed'))
      .mockResolvedValueOnce('success');

    const promise = withRetry(fn, { initialDelayMs: 100 });
    await vi.advanceTimersByTimeAsync(100);

    expect(await promise).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop after max retries', async () => {
    vi.useRealTimers();

    const fn = vi.fn().mockRejectedValue(new HttpStatusError('Always fails', 503));

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 5 })).rejects.toThrow('Always fails');
    expect(fn).toHaveBeenCalledTimes(3); // Initial + 2 retries
  });

  it('should use exponential backoff', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new HttpStatusError('Error 1', 503))
      .mockRejectedValueOnce(new HttpStatusError('Error 2', 503))
      .mockResolvedValueOnce('success');
    const onRetry = vi.fn();

    const promise = withRetry(fn, { initialDelayMs: 1000, backoffMultiplier: 2, onRetry });

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(2000);
    expect(fn).toHaveBeenCalledTimes(3);

    expect(await promise).toBe('success');
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('should respect max delay', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new HttpStatusError('Error', 503))
      .mockResolvedValueOnce('success');
    const onRetry = vi.fn();

    const promise = withRetry(fn, { initialDelayMs: 10000, maxDelayMs: 5000, onRetry });
    await vi.advanceTimersByTimeAsync(5000);

    expect(await promise).toBe('success');
    expect(onRetry).toHaveBeenCalledWith(expect.any(HttpStatusError), 1, 5000);
  });

  it('should respect Retry-After', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new HttpStatusError('Rate limited', 429, 3000))
      .mockResolvedValueOnce('success');

    const promise = withRetry(fn, { initialDelayMs: 100 });

    await vi.advanceTimersByTimeAsync(2999);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(await promise).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('isRetryableError', () => {
  it('should decide HTTP errors by status', () => {
    expect(isRetryableError(new HttpStatusError('x', 429), RETRYABLE)).toBe(true);
    expect(isRetryableError(new HttpStatusError('x', 401), RETRYABLE)).toBe(false);
  });

  it('should recognise network failures in the cause', () => {
    const error = new Error('request failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:443') });
    expect(isRetryableError(error, RETRYABLE)).toBe(true);
  });

  it('should not retry unrelated errors', () => {
    expect(isRetryableError(new Error('Unexpected token < in JSON'), RETRYABLE)).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('should convert seconds to milliseconds', () => {
    expect(parseRetryAfter('7')).toBe(7000);
  });

  it('should ignore missing or non-numeric values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBeUndefined();
  });
});
