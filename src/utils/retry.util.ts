import { SourceApiError } from './errors.util';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Ceiling for a server-provided Retry-After, which is otherwise honoured as sent */
  maxRetryAfterMs: number;
  factor: number;
  isRetryable(error: unknown): boolean;
}

export interface RetryHooks {
  onRetry?(error: unknown, attempt: number, delayMs: number): void;
  sleep?(ms: number): Promise<void>;
}

/**
 * Thrown when every attempt failed; `lastError` is the final failure.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before attempt `attempt + 1`. A server-provided Retry-After wins over the curve
 * and is not bound by `maxDelayMs`.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, error?: unknown): number {
  if (error instanceof SourceApiError && error.retryAfterMs !== null && error.retryAfterMs > 0) {
    return Math.min(error.retryAfterMs, policy.maxRetryAfterMs);
  }
  const delay = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or runs out of attempts.
 * Non-retryable errors are rethrown as-is; exhaustion throws RetryExhaustedError.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!policy.isRetryable(error)) throw error;
      if (attempt >= policy.maxAttempts) throw new RetryExhaustedError(attempt, error);

      const delayMs = backoffDelay(policy, attempt, error);
      hooks.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

export function isTransientSourceError(error: unknown): boolean {
  return error instanceof SourceApiError && error.transient;
}

function statusOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return null;
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'ENOTFOUND']);

/**
 * Quota and server-side failures from the Google APIs (gaxios errors carry `code`/`status`).
 */
export function isRetryableSheetsError(error: unknown): boolean {
  const status = statusOf(error);
  if (status === 429 || (status !== null && status >= 500)) return true;

  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    if (NETWORK_CODES.has(error.code)) return true;
  }

  const message = error instanceof Error ? error.message : '';
  return /RESOURCE_EXHAUSTED|Quota exceeded|rate limit/i.test(message);
}

export function createRetryPolicy(
  isRetryable: (error: unknown) => boolean,
  overrides: Partial<Omit<RetryPolicy, 'isRetryable'>> = {}
): RetryPolicy {
  return {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    maxRetryAfterMs: 300000,
    factor: 2,
    ...overrides,
    isRetryable,
  };
}
