import Database from 'better-sqlite3';
import type { IdempotencyEntry, IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import type { Job, JobStatus, Visibility } from '../../../core/entities/Job.js';

interface RunRow {
  run_id: string;
  status: JobStatus;
  submitted_at: string;
  visibility: Visibility | null;
  idempotency_token: string | null;
  cost_charged: number | null;
  last_polled_at: string | null;
  poll_count: number;
  failure_reason: string | null;
  result_ref: string | null;
}

function rowToJob(row: RunRow): Job {
  return {
    runId: row.run_id,
    status: row.status,
    submittedAt: new Date(row.submitted_at),
    visibility: row.visibility,
    idempotencyToken: row.idempotency_token,
    costCharged: row.cost_charged,
    lastPolledAt: row.last_polled_at ? new Date(row.last_polled_at) : null,
    pollCount: row.poll_count,
    failureReason: row.failure_reason,
    resultRef: row.result_ref,
  };
}

/**
 * SQLite implementation of the job registry and idempotency ledger
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, status, submitted_at, visibility, idempotency_token,
        cost_charged, last_polled_at, poll_count, failure_reason, result_ref)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.runId,
      job.status,
      job.submittedAt.toISOString(),
      job.visibility,
      job.idempotencyToken,
      job.costCharged,
      job.lastPolledAt ? job.lastPolledAt.toISOString() : null,
      job.pollCount,
      job.failureReason,
      job.resultRef
    );
  }

  loadJob(runId: string): Job | null {
    const row = this.db
      .prepare<[string], RunRow>('SELECT * FROM runs WHERE run_id = ?')
      .get(runId);

    return row ? rowToJob(row) : null;
  }

  deleteJob(runId: string): void {
    this.db.prepare('DELETE FROM runs WHERE run_id = ?').run(runId);
  }

  deleteJobsIdleSince(cutoff: Date): number {
    const result = this.db
      .prepare('DELETE FROM runs WHERE COALESCE(last_polled_at, submitted_at) < ?')
      .run(cutoff.toISOString());

    return result.changes;
  }

  recordIdempotencyKey(token: string, runId: string | null, createdAt: Date): void {
    this.db
      .prepare('INSERT OR REPLACE INTO idempotency_keys (token, run_id, created_at) VALUES (?, ?, ?)')
      .run(token, runId, createdAt.toISOString());
  }

  findIdempotencyEntry(token: string, notBefore: Date): IdempotencyEntry | null {
    const row = this.db
      .prepare<[string, string], { run_id: string | null; created_at: string }>(
        'SELECT run_id, created_at FROM idempotency_keys WHERE token = ? AND created_at >= ?'
      )
      .get(token, notBefore.toISOString());

    return row ? { runId: row.run_id, createdAt: new Date(row.created_at) } : null;
  }

  deleteIdempotencyKey(token: string): void {
    this.db.prepare('DELETE FROM idempotency_keys WHERE token = ?').run(token);
  }

  deleteIdempotencyKeysBefore(cutoff: Date): number {
    return this.db
      .prepare('DELETE FROM idempotency_keys WHERE created_at < ?')
      .run(cutoff.toISOString()).changes;
  }
}
