/**
 * Exponential backoff retry for registry calls.
 *
 * Only errors carrying a retryable token (error code, HTTP status class,
 * error name or a timeout message) are retried; anything else fails on the
 * first attempt.
 */

import { sleep } from './timeout.js';

export interface RetryConfig {
  /** Initial call plus retries */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Case-insensitive tokens, e.g. ECONNRESET, TIMEOUT, HTTP_5XX */
  retryableErrors: string[];
  /** 0-1, spreads each delay by ±jitter */
  jitter?: number;
  signal?: AbortSignal;
  onRetry?: (context: RetryAttemptContext) => void;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

/**
 * Tokens an error can be matched on.
 *
 * HTTP statuses yield both the exact status (`HTTP_503`) and its class
 * (`HTTP_5XX`).
 */
export function retryTokens(error: unknown): string[] {
  const tokens: string[] = [];

  const code = readProperty(error, 'code');
  if (typeof code === 'string' || typeof code === 'number') {
    tokens.push(String(code));
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    tokens.push(`HTTP_${status}`, `HTTP_${Math.floor(status / 100)}XX`);
  }

  // fetch() wraps socket errors: TypeError('fetch failed', { cause: { code } })
  const causeCode = readProperty(readProperty(error, 'cause'), 'code');
  if (typeof causeCode === 'string') {
    tokens.push(causeCode);
  }

  if (error instanceof Error) {
    tokens.push(error.name);
    if (/(?:timeout|timed\s+out)/i.test(error.message)) {
      tokens.push('TIMEOUT');
    }
  }

  return tokens.map((token) => token.toUpperCase());
}

export function isRetryableError(error: unknown, retryableErrors: readonly string[]): boolean {
  if (retryableErrors.length === 0 || error instanceof RetryAbortedError) {
    return false;
  }

  const retryable = new Set(retryableErrors.map((token) => token.toUpperCase()));
  return retryTokens(error).some((token) => retryable.has(token));
}

function nextDelay(current: number, multiplier: number, max: number): number {
  return Math.min(max, Math.max(current, Math.round(current * multiplier)));
}

/**
 * Execute `fn` with retries and exponential backoff.
 *
 * The last error is rethrown unchanged once attempts are exhausted or a
 * non-retryable error occurs.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, config: RetryConfig): Promise<T> {
  if (config.maxAttempts < 1) {
    throw new Error('maxAttempts must be >= 1');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new Error('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new Error('backoffMultiplier must be >= 1');
  }

  const jitter = Math.min(Math.max(config.jitter ?? 0, 0), 1);
  let delayMs = config.initialDelayMs;

  for (let attempt = 1; ; attempt += 1) {
    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxAttempts || !isRetryableError(error, config.retryableErrors)) {
        throw error;
      }

      const waitMs = jitter > 0 ? Math.floor(delayMs * (1 - jitter + 2 * jitter * Math.random())) : delayMs;
      config.onRetry?.({ attempt, delayMs: waitMs, error });

      await sleep(waitMs, config.signal);
      delayMs = nextDelay(delayMs, config.backoffMultiplier, config.maxDelayMs);
    }
  }
}
