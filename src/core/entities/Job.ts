/**
 * Analysis run domain entity
 */
export type JobStatus = 'submitting' | 'queued' | 'running' | 'completed' | 'failed' | 'expired';

export type Visibility = 'public' | 'private';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'expired'];

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  submitting: ['queued', 'running', 'completed', 'failed'],
  queued: ['running', 'completed', 'failed', 'expired'],
  running: ['completed', 'failed', 'expired'],
  completed: [],
  failed: [],
  expired: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface Job {
  runId: string;
  status: JobStatus;
  submittedAt: Date;
  /** null when the run was adopted from a status check and the service did not say */
  visibility: Visibility | null;
  idempotencyToken: string | null;
  /** Credits charged for the run; null until known */
  costCharged: number | null;
  lastPolledAt: Date | null;
  pollCount: number;
  failureReason: string | null;
  /** Report URL once the run is completed */
  resultRef: string | null;
}

export interface AnalysisRequest {
  readonly filePath: string;
  readonly targetColumn: string;
  readonly depth: number;
  readonly visibility: Visibility;
  readonly columnDescriptions?: Readonly<Record<string, string>>;
  readonly title?: string;
  readonly description?: string;
  /** Column count declared by the caller; enables the depth bound before any upload */
  readonly numColumns?: number;
  /** Caller nonce mixed into the derived idempotency token */
  readonly nonce?: string;
  /** Explicit idempotency token; overrides the derived one */
  readonly idempotencyToken?: string;
}

export interface SubmitResult {
  runId: string;
  /** null when the run is no longer tracked locally (results fetched or evicted) */
  status: JobStatus | null;
  /** true when an earlier submission with the same token was returned */
  deduplicated: boolean;
  estimatedCredits: number;
  idempotencyToken: string;
}

export interface JobStatusReport {
  runId: string;
  status: JobStatus;
  failureReason: string | null;
  resultRef: string | null;
  lastPolledAt: Date | null;
  pollCount: number;
  /** Suggested wait before the next poll; null once the run is terminal */
  suggestedPollDelayMs: number | null;
}

/**
 * Structured pattern data from the service. Passed through untouched.
 */
export type ResultPayload = Record<string, unknown>;
