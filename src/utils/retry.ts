/**
 * Retry and Circuit Breaker patterns for calls to the Discovery Engine service
 */

import {
  RateLimitedError,
  ServiceUnavailableError,
  TransientNetworkError,
} from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Upper bound for a single attempt */
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 60000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Executes a function with exponential backoff retry logic.
 *
 * Only retryable errors (see {@link isRetryableError}) are retried; anything else
 * is rethrown at once. Exhausting the attempts raises a ServiceUnavailableError.
 *
 * @param fn - Async function to execute, called with the 1-based attempt number
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 * @param sleepFn - Delay implementation, replaceable in tests
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  sleepFn: SleepFn = sleep
): Promise<T> {
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn(attempt), config.timeoutMs);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      const delay =
        error instanceof RateLimitedError
          ? Math.min(Math.max(lastDelay, error.retryAfterMs), config.maxDelayMs)
          : lastDelay;
      const willRetry = attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? delay : undefined,
      });

      if (!willRetry) {
        break;
      }

      await sleepFn(delay);

      // Calculate next delay (exponential backoff)
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
  throw new ServiceUnavailableError(
    `Discovery Engine is unavailable: failed after ${config.maxAttempts} attempts. Last error: ${lastMessage}`,
    config.maxAttempts,
    { cause: lastError }
  );
}

/**
 * Race a promise against a timer; the timer is always cleared
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransientNetworkError(`Timeout after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Suggested delay before the next status poll: starts at 5s, doubles, caps at 60s
 */
export function suggestedPollDelayMs(pollCount: number, floorMs = 5000, capMs = 60000): number {
  const exponent = Math.max(0, pollCount - 1);
  return Math.min(floorMs * 2 ** exponent, capMs);
}

type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling the service after repeated transient failures
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private now: () => number = Date.now
  ) {}

  /**
   * Execute function with circuit breaker protection.
   * Only availability failures count against the circuit; a 4xx answer means the service is up.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.successCount = 0;
      } else {
        const waitMs = this.resetTimeout - (now - (this.lastFailureTime ?? now));
        throw new ServiceUnavailableError(
          `Circuit breaker is OPEN. Discovery Engine is temporarily unavailable. Try again in ${waitMs}ms`,
          0
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          // After 2 successful attempts in half-open, close the circuit
          this.state = 'closed';
          this.failureCount = 0;
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (isAvailabilityFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Reset circuit breaker manually
   */
  reset() {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransientNetworkError;
}

function isAvailabilityFailure(error: unknown): boolean {
  return error instanceof TransientNetworkError || error instanceof ServiceUnavailableError;
}
