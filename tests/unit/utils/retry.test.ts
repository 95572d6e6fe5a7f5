import { describe, it, expect, vi } from 'vitest';
import {
  RetryAbortedError,
  isRetryableError,
  retryTokens,
  retryWithBackoff,
  type RetryAttemptContext,
  type RetryConfig,
} from '../../../src/utils/retry.js';

const config = (overrides: Partial<RetryConfig> = {}): RetryConfig => ({
  maxAttempts: 3,
  initialDelayMs: 1,
  maxDelayMs: 5,
  backoffMultiplier: 2,
  retryableErrors: ['ECONNRESET', 'HTTP_5XX'],
  ...overrides,
});

const connectionReset = (): Error => Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

describe('retryWithBackoff', () => {
  it('retries retryable failures with growing delays', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(connectionReset())
      .mockRejectedValueOnce(connectionReset())
      .mockResolvedValueOnce('ok');
    const retries: RetryAttemptContext[] = [];

    const result = await retryWithBackoff(fn, config({ onRetry: (context) => retries.push(context) }));

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(retries.map(({ attempt, delayMs }) => [attempt, delayMs])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('rethrows a non-retryable error unchanged on the first attempt', async () => {
    const error = new Error('bad request');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, config())).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const errors = [connectionReset(), connectionReset(), connectionReset()];
    let call = 0;
    const fn = vi.fn(async (): Promise<string> => {
      const error = errors[call] ?? connectionReset();
      call += 1;
      throw error;
    });

    await expect(retryWithBackoff(fn, config())).rejects.toBe(errors[2]);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops when the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(retryWithBackoff(async () => 'never', config({ signal: controller.signal }))).rejects.toBeInstanceOf(
      RetryAbortedError
    );
  });

  it('validates its configuration', async () => {
    await expect(retryWithBackoff(async () => 1, config({ maxAttempts: 0 }))).rejects.toThrow('maxAttempts must be >= 1');
    await expect(retryWithBackoff(async () => 1, config({ initialDelayMs: 10, maxDelayMs: 5 }))).rejects.toThrow(
      'maxDelayMs must be >= initialDelayMs'
    );
  });
});

describe('retryTokens', () => {
  it('derives tokens from code, status, cause and message', () => {
    expect(retryTokens(connectionReset())).toEqual(['ECONNRESET', 'ERROR']);
    expect(retryTokens(Object.assign(new Error('Service Unavailable'), { status: 503 }))).toEqual([
      'HTTP_503',
      'HTTP_5XX',
      'ERROR',
    ]);
    expect(retryTokens(new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } }))).toEqual([
      'ECONNREFUSED',
      'TYPEERROR',
    ]);
    expect(retryTokens(new Error('request timed out'))).toEqual(['ERROR', 'TIMEOUT']);
  });

  it('matches tokens case-insensitively', () => {
    expect(isRetryableError(Object.assign(new Error('x'), { status: 502 }), ['http_5xx'])).toBe(true);
    expect(isRetryableError(Object.assign(new Error('x'), { status: 404 }), ['HTTP_5XX'])).toBe(false);
    expect(isRetryableError(connectionReset(), [])).toBe(false);
  });
});
