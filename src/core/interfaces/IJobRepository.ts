import type { Job } from '../entities/Job.js';

export interface IdempotencyEntry {
  /** null while run creation is pending: the service may or may not have accepted it */
  runId: string | null;
  createdAt: Date;
}

/**
 * Interface for the session job registry and idempotency ledger
 */
export interface IJobRepository {
  saveJob(job: Job): void;

  loadJob(runId: string): Job | null;

  deleteJob(runId: string): void;

  /**
   * Delete jobs whose last activity (last poll, else submission) is before the cutoff
   */
  deleteJobsIdleSince(cutoff: Date): number;

  recordIdempotencyKey(token: string, runId: string | null, createdAt: Date): void;

  /**
   * Ledger entry recorded for the token at or after `notBefore`, if any
   */
  findIdempotencyEntry(token: string, notBefore: Date): IdempotencyEntry | null;

  deleteIdempotencyKey(token: string): void;

  deleteIdempotencyKeysBefore(cutoff: Date): number;
}
