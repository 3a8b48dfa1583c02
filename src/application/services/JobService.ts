import type {
  CreateRunResult,
  DatasetFile,
  IDiscoveryClient,
  RemoteRunStatus,
} from '../../core/interfaces/IDiscoveryClient.js';
import type { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import {
  canTransition,
  isTerminal,
  type AnalysisRequest,
  type Job,
  type JobStatus,
  type JobStatusReport,
  type ResultPayload,
  type SubmitResult,
} from '../../core/entities/Job.js';
import {
  InsufficientCreditsError,
  InvalidStateError,
  JobExpiredError,
  JobNotFoundError,
  PaymentRequiredError,
  ServiceUnavailableError,
  TransientNetworkError,
} from '../../core/errors.js';
import { deriveIdempotencyToken } from '../../utils/idempotency.js';
import { suggestedPollDelayMs } from '../../utils/retry.js';
import { noopDebugLog, type DebugLog } from '../../utils/logger.js';
import { bytesToMb, estimateCost } from './CostEstimator.js';
import { inspectDataset, validateAgainstColumns, validateAnalysisRequest } from './RequestValidator.js';
import type { AccountService } from './AccountService.js';

const REMOTE_STATUS_MAP: Readonly<Record<string, JobStatus>> = {
  pending: 'queued',
  queued: 'queued',
  uploading: 'queued',
  processing: 'running',
  running: 'running',
  analyzing: 'running',
  completed: 'completed',
  succeeded: 'completed',
  failed: 'failed',
  error: 'failed',
  cancelled: 'failed',
};

/**
 * Lifecycle status for a status string reported by the service; null when unrecognised
 */
export function mapRemoteStatus(status: string): JobStatus | null {
  return REMOTE_STATUS_MAP[status.trim().toLowerCase()] ?? null;
}

export interface JobServiceOptions {
  /** Idle time after which a tracked job is evicted by sweep() */
  ttlMs: number;
  /** How long a ledger entry answers a repeated submission without a network call */
  idempotencyWindowMs: number;
  clock?: () => Date;
  debugLog?: DebugLog;
}

/**
 * Job lifecycle manager: submit, poll, fetch.
 *
 * Nothing here waits for a run to finish. The caller drives polling, using
 * `suggestedPollDelayMs` from each status report as its cadence.
 */
export class JobService {
  private inFlight = new Map<string, Promise<SubmitResult>>();
  private ttlMs: number;
  private idempotencyWindowMs: number;
  private clock: () => Date;
  private debugLog: DebugLog;

  constructor(
    private client: IDiscoveryClient,
    private jobRepository: IJobRepository,
    private accounts: AccountService,
    options: JobServiceOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.idempotencyWindowMs = options.idempotencyWindowMs;
    this.clock = options.clock ?? (() => new Date());
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  /**
   * Submit an analysis and return as soon as the service has assigned a run id.
   * Repeating a submission with the same idempotency token never creates a second billed run.
   */
  async submit(request: AnalysisRequest): Promise<SubmitResult> {
    validateAnalysisRequest(request);
    const dataset = await inspectDataset(request.filePath);

    const { credits: estimatedCredits } = estimateCost({
      fileSizeMb: bytesToMb(dataset.sizeBytes),
      depth: request.depth,
      visibility: request.visibility,
    });
    const token = deriveIdempotencyToken(request, dataset);

    const pending = this.inFlight.get(token);
    if (pending) {
      this.debugLog(`Joining in-flight submission for ${token}`);
      const result = await pending;
      return { ...result, deduplicated: true };
    }

    const notBefore = new Date(this.clock().getTime() - this.idempotencyWindowMs);
    const entry = this.jobRepository.findIdempotencyEntry(token, notBefore);
    if (entry !== null && entry.runId !== null) {
      this.debugLog(`Idempotency hit for ${token}: returning run ${entry.runId}`);
      // Evicted after its results were fetched, or swept: the local state is unknown
      const existing = this.jobRepository.loadJob(entry.runId);
      return {
        runId: entry.runId,
        status: existing ? existing.status : null,
        deduplicated: true,
        estimatedCredits,
        idempotencyToken: token,
      };
    }

    // A pending entry means an earlier attempt may already have been billed; the
    // service answers the reused token with the existing run, so skip the credit check.
    const resumed = entry !== null;
    if (resumed) {
      this.debugLog(`Resuming pending submission for ${token}`);
    }

    const submission = this.submitNew(request, dataset, token, estimatedCredits, resumed);
    this.inFlight.set(token, submission);
    try {
      return await submission;
    } finally {
      this.inFlight.delete(token);
    }
  }

  /**
   * One status check. Terminal jobs answer from the registry without a network call.
   */
  async poll(runId: string): Promise<JobStatusReport> {
    const known = this.jobRepository.loadJob(runId);
    if (known && isTerminal(known.status)) {
      return this.toReport(known);
    }

    let remote: RemoteRunStatus;
    try {
      remote = await this.client.getRunStatus(runId);
    } catch (error) {
      if (error instanceof JobNotFoundError && known) {
        return this.toReport(this.markExpired(known));
      }
      throw error;
    }

    const now = this.clock();
    const job = known ?? this.adopt(runId, now);
    const updated: Job = { ...job, lastPolledAt: now, pollCount: job.pollCount + 1 };

    const next = mapRemoteStatus(remote.status);
    if (next === null) {
      this.debugLog(`Run ${runId}: unrecognised remote status "${remote.status}", keeping ${job.status}`);
    } else if (next !== job.status) {
      if (canTransition(job.status, next)) {
        this.debugLog(`Run ${runId}: ${job.status} -> ${next}`);
        updated.status = next;
      } else {
        this.debugLog(`Run ${runId}: ignoring remote status ${next} while ${job.status}`);
      }
    }

    if (updated.status === 'failed') {
      updated.failureReason = remote.errorMessage ?? 'The analysis failed without a reason from the service.';
    }
    if (updated.status === 'completed') {
      updated.resultRef = remote.reportUrl;
    }
    if (updated.visibility === null && remote.isPublic !== null) {
      updated.visibility = remote.isPublic ? 'public' : 'private';
    }

    this.jobRepository.saveJob(updated);
    return this.toReport(updated);
  }

  /**
   * Results of a completed run, passed through untouched. The job is evicted afterwards.
   */
  async fetchResults(runId: string): Promise<ResultPayload> {
    let job = this.jobRepository.loadJob(runId);
    if (!job) {
      await this.poll(runId);
      job = this.jobRepository.loadJob(runId);
      if (!job) {
        throw new JobNotFoundError(runId);
      }
    }

    if (job.status === 'expired') {
      throw new JobExpiredError(runId);
    }
    if (job.status !== 'completed') {
      throw new InvalidStateError(runId, job.status, job.failureReason);
    }

    let payload: ResultPayload;
    try {
      payload = await this.client.getRunResults(runId);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        this.markExpired(job);
        throw new JobExpiredError(runId);
      }
      throw error;
    }

    const reported = payload.status;
    if (typeof reported === 'string' && mapRemoteStatus(reported) !== 'completed') {
      throw new InvalidStateError(runId, mapRemoteStatus(reported) ?? job.status, `Service reported "${reported}"`);
    }

    this.jobRepository.deleteJob(runId);
    this.debugLog(`Run ${runId}: results fetched, evicted from registry`);
    return payload;
  }

  /**
   * Evict jobs idle for longer than the TTL and ledger entries older than the idempotency window
   */
  sweep(): number {
    const now = this.clock().getTime();
    const evicted = this.jobRepository.deleteJobsIdleSince(new Date(now - this.ttlMs));
    const expiredKeys = this.jobRepository.deleteIdempotencyKeysBefore(new Date(now - this.idempotencyWindowMs));
    if (evicted > 0 || expiredKeys > 0) {
      this.debugLog(`Swept ${evicted} idle job(s) and ${expiredKeys} expired idempotency key(s)`);
    }
    return evicted;
  }

  getJob(runId: string): Job | null {
    return this.jobRepository.loadJob(runId);
  }

  private async submitNew(
    request: AnalysisRequest,
    dataset: DatasetFile,
    token: string,
    estimatedCredits: number,
    resumed: boolean
  ): Promise<SubmitResult> {
    const isPrivate = request.visibility === 'private';

    if (isPrivate && !resumed && !(await this.accounts.canAfford(estimatedCredits))) {
      const snapshot = this.accounts.peek();
      throw new InsufficientCreditsError(estimatedCredits, snapshot ? snapshot.creditsAvailable : null);
    }

    const uploaded = await this.client.uploadDataset(dataset);
    validateAgainstColumns(request, uploaded.columns);

    this.jobRepository.recordIdempotencyKey(token, null, this.clock());

    let created: CreateRunResult;
    try {
      created = await this.client.createRun(uploaded, request, token);
    } catch (error) {
      if (error instanceof TransientNetworkError || error instanceof ServiceUnavailableError) {
        // The run may exist and be billed; keep the pending entry for the retry
        this.accounts.invalidate();
        throw error;
      }
      this.jobRepository.deleteIdempotencyKey(token);
      if (error instanceof PaymentRequiredError) {
        this.accounts.invalidate();
        throw new InsufficientCreditsError(estimatedCredits, null);
      }
      throw error;
    }

    const now = this.clock();
    const existing = created.duplicate ? this.jobRepository.loadJob(created.runId) : null;
    const job: Job = existing ?? {
      runId: created.runId,
      status: 'queued',
      submittedAt: now,
      visibility: request.visibility,
      idempotencyToken: token,
      costCharged: created.creditsCharged ?? (isPrivate ? estimatedCredits : 0),
      lastPolledAt: null,
      pollCount: 0,
      failureReason: null,
      resultRef: null,
    };

    if (!existing) {
      this.jobRepository.saveJob(job);
    }
    this.jobRepository.recordIdempotencyKey(token, job.runId, now);

    if (isPrivate) {
      this.accounts.invalidate();
    }

    this.debugLog(
      `Submitted run ${job.runId} (${request.visibility}, depth ${request.depth}, ~${estimatedCredits} credits${created.duplicate ? ', duplicate token' : ''})`
    );

    return {
      runId: job.runId,
      status: job.status,
      deduplicated: created.duplicate,
      estimatedCredits,
      idempotencyToken: token,
    };
  }

  private adopt(runId: string, now: Date): Job {
    this.debugLog(`Adopting run ${runId} not submitted in this session`);
    return {
      runId,
      status: 'queued',
      submittedAt: now,
      visibility: null,
      idempotencyToken: null,
      costCharged: null,
      lastPolledAt: null,
      pollCount: 0,
      failureReason: null,
      resultRef: null,
    };
  }

  private markExpired(job: Job): Job {
    const expired: Job = {
      ...job,
      status: 'expired',
      lastPolledAt: this.clock(),
      pollCount: job.pollCount + 1,
      failureReason: 'The service no longer knows this run. It was cleaned up, not failed.',
    };
    this.jobRepository.saveJob(expired);
    this.debugLog(`Run ${job.runId}: marked expired`);
    return expired;
  }

  private toReport(job: Job): JobStatusReport {
    return {
      runId: job.runId,
      status: job.status,
      failureReason: job.failureReason,
      resultRef: job.resultRef,
      lastPolledAt: job.lastPolledAt,
      pollCount: job.pollCount,
      suggestedPollDelayMs: isTerminal(job.status) ? null : suggestedPollDelayMs(job.pollCount),
    };
  }
}
