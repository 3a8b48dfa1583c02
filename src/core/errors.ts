import type { JobStatus } from './entities/Job.js';

/**
 * Base class for every error the client surfaces to tool callers
 */
export abstract class DiscoveryError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Structured fields rendered next to the message in tool responses
   */
  details(): Record<string, unknown> {
    return {};
  }
}

/**
 * Malformed request: bad depth, unsupported format, oversized file, empty target column
 */
export class ValidationError extends DiscoveryError {
  readonly retryable = false;

  constructor(message: string, public readonly constraint: string) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { constraint: this.constraint };
  }
}

export class InsufficientCreditsError extends DiscoveryError {
  readonly retryable = false;

  constructor(
    public readonly required: number,
    public readonly available: number | null
  ) {
    super(
      available === null
        ? `Insufficient credits: this run needs ${required} credits.`
        : `Insufficient credits: this run needs ${required} credits but only ${available} are available.`
    );
  }

  details(): Record<string, unknown> {
    return {
      required_credits: this.required,
      available_credits: this.available,
      hint: 'Purchase credits, upgrade your plan, or choose visibility "public" explicitly.',
    };
  }
}

/**
 * Connection failures, timeouts, 5xx responses. Retried by the transport client.
 */
export class TransientNetworkError extends DiscoveryError {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  details(): Record<string, unknown> {
    return this.status === undefined ? {} : { status: this.status };
  }
}

export class RateLimitedError extends TransientNetworkError {
  constructor(public readonly retryAfterMs: number) {
    super(`Rate limited. Retry after ${Math.ceil(retryAfterMs / 1000)} seconds.`, 429);
  }

  details(): Record<string, unknown> {
    return { status: 429, retry_after_seconds: Math.ceil(this.retryAfterMs / 1000) };
  }
}

/**
 * Retries exhausted, or the circuit breaker is open
 */
export class ServiceUnavailableError extends DiscoveryError {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  details(): Record<string, unknown> {
    return { attempts: this.attempts };
  }
}

export class AuthenticationError extends DiscoveryError {
  readonly retryable = false;

  constructor(message = 'Authentication failed. Check your API key.') {
    super(message);
  }
}

/**
 * Non-retryable 4xx answer from the service
 */
export class RemoteServiceError extends DiscoveryError {
  readonly retryable = false;

  constructor(
    public readonly status: number,
    public readonly detail: string,
    public readonly body?: unknown
  ) {
    super(`API error (${status}): ${detail}`);
  }

  details(): Record<string, unknown> {
    return { status: this.status };
  }
}

export class PaymentRequiredError extends RemoteServiceError {
  constructor(detail = 'Payment required. Add a payment method first.') {
    super(402, detail);
  }
}

export class JobNotFoundError extends DiscoveryError {
  readonly retryable = false;

  constructor(public readonly runId: string, message = `Run not found: ${runId}`) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { run_id: this.runId, status: 'not_found' };
  }
}

/**
 * The run was accepted once but the service no longer knows it.
 * Data loss, not a computation failure.
 */
export class JobExpiredError extends JobNotFoundError {
  constructor(runId: string) {
    super(
      runId,
      `Run ${runId} is no longer available on the service. It expired; resubmit the analysis to get results.`
    );
  }

  details(): Record<string, unknown> {
    return { run_id: this.runId, status: 'expired' };
  }
}

export class InvalidStateError extends DiscoveryError {
  readonly retryable = false;

  constructor(
    public readonly runId: string,
    public readonly status: JobStatus,
    public readonly reason: string | null = null
  ) {
    super(
      status === 'queued' || status === 'running'
        ? `Run ${runId} is still ${status}. Keep polling discovery_status until it is completed.`
        : `Run ${runId} has status "${status}"; results are only available for completed runs.`
    );
  }

  details(): Record<string, unknown> {
    return { run_id: this.runId, status: this.status, reason: this.reason };
  }
}
