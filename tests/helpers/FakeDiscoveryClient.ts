import type {
  CreateRunResult,
  DatasetColumn,
  DatasetFile,
  IDiscoveryClient,
  RemoteRunStatus,
  UploadedDataset,
} from '../../src/core/interfaces/IDiscoveryClient.js';
import type { AnalysisRequest, ResultPayload } from '../../src/core/entities/Job.js';
import type { PlanTier, SignupResult } from '../../src/core/entities/Account.js';
import {
  AuthenticationError,
  JobNotFoundError,
  PaymentRequiredError,
  TransientNetworkError,
} from '../../src/core/errors.js';

interface FakeRun {
  runId: string;
  token: string;
  status: string;
  errorMessage: string | null;
  isPublic: boolean;
  charged: number;
}

type CallName =
  | 'upload'
  | 'createRun'
  | 'status'
  | 'results'
  | 'account'
  | 'signup'
  | 'subscribe'
  | 'purchase'
  | 'paymentMethod'
  | 'plans';

export const DEFAULT_COLUMNS: DatasetColumn[] = ['age', 'income', 'region', 'tenure', 'churned'].map(
  (name) => ({ name, raw: { name, type: 'numeric' } })
);

/**
 * In-process stand-in for the Discovery Engine service.
 * Charges credits on run creation and deduplicates by idempotency token.
 */
export class FakeDiscoveryClient implements IDiscoveryClient {
  credits = 10;
  plan = 'free_tier';
  columns: DatasetColumn[] = DEFAULT_COLUMNS;
  runs = new Map<string, FakeRun>();
  calls: Record<CallName, number> = {
    upload: 0,
    createRun: 0,
    status: 0,
    results: 0,
    account: 0,
    signup: 0,
    subscribe: 0,
    purchase: 0,
    paymentMethod: 0,
    plans: 0,
  };
  /** Charge and record the next run, then fail as if the acknowledgement was lost */
  loseNextAcknowledgement = false;
  /** Resolves pending getAccount calls when set; lets tests interleave with a refresh */
  accountGate: Promise<void> | null = null;

  private apiKey: string | undefined;
  private sequence = 0;

  constructor(apiKey: string | undefined = 'test-key') {
    this.apiKey = apiKey;
  }

  hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  getApiKey(): string | undefined {
    return this.apiKey;
  }

  async uploadDataset(dataset: DatasetFile): Promise<UploadedDataset> {
    this.calls.upload++;
    this.requireKey();
    return {
      key: `uploads/${dataset.fileName}`,
      name: dataset.fileName,
      size: dataset.sizeBytes,
      fileHash: 'hash-of-file',
      columns: this.columns,
    };
  }

  async createRun(dataset: UploadedDataset, request: AnalysisRequest, token: string): Promise<CreateRunResult> {
    this.calls.createRun++;
    this.requireKey();

    for (const run of this.runs.values()) {
      if (run.token === token) {
        return { runId: run.runId, duplicate: true, creditsCharged: null };
      }
    }

    const cost =
      request.visibility === 'private'
        ? Math.max(1, Math.ceil((dataset.size / (1024 * 1024)) * request.depth))
        : 0;
    if (cost > this.credits) {
      throw new PaymentRequiredError('Insufficient credits.');
    }
    this.credits -= cost;

    const runId = `run-${++this.sequence}`;
    this.runs.set(runId, {
      runId,
      token,
      status: 'pending',
      errorMessage: null,
      isPublic: request.visibility === 'public',
      charged: cost,
    });

    if (this.loseNextAcknowledgement) {
      this.loseNextAcknowledgement = false;
      throw new TransientNetworkError('Timeout after 30000ms');
    }
    return { runId, duplicate: false, creditsCharged: cost };
  }

  async getRunStatus(runId: string): Promise<RemoteRunStatus> {
    this.calls.status++;
    const run = this.findRun(runId);
    return {
      runId,
      status: run.status,
      errorMessage: run.errorMessage,
      reportUrl: run.status === 'completed' ? `https://reports.example.test/${runId}` : null,
      isPublic: run.isPublic,
    };
  }

  async getRunResults(runId: string): Promise<ResultPayload> {
    this.calls.results++;
    const run = this.findRun(runId);
    return {
      run_id: runId,
      status: run.status,
      is_public: run.isPublic,
      patterns: [
        {
          conditions: [{ feature: 'tenure', operator: '<', value: 2 }],
          p_value: 0.003,
          novelty: 'novel',
        },
      ],
      summary: 'Short tenure drives churn in the north region.',
      report_url: `https://reports.example.test/${runId}`,
      hidden_deep_count: 0,
    };
  }

  async listPlans(): Promise<unknown> {
    this.calls.plans++;
    return { plans: [{ id: 'free_tier', credits: 10 }, { id: 'tier_1', credits: 50 }] };
  }

  async signup(email: string): Promise<SignupResult> {
    this.calls.signup++;
    return { apiKey: 'disco_test-key', raw: { api_key: 'disco_test-key', email } };
  }

  async getAccount(): Promise<Record<string, unknown>> {
    this.calls.account++;
    this.requireKey();
    const snapshot = {
      plan: this.plan,
      credits: { subscription: this.credits, purchased: 0 },
      usage: { runs: this.runs.size },
      has_payment_method: false,
    };
    if (this.accountGate) {
      await this.accountGate;
    }
    return snapshot;
  }

  async subscribe(plan: PlanTier): Promise<unknown> {
    this.calls.subscribe++;
    this.plan = plan;
    return { plan };
  }

  async purchaseCredits(packs: number): Promise<unknown> {
    this.calls.purchase++;
    this.credits += packs * 20;
    return { purchased: packs * 20 };
  }

  async addPaymentMethod(paymentMethodId: string): Promise<unknown> {
    this.calls.paymentMethod++;
    return { payment_method_id: paymentMethodId, attached: true };
  }

  setRunStatus(runId: string, status: string, errorMessage: string | null = null): void {
    const run = this.findRun(runId);
    run.status = status;
    run.errorMessage = errorMessage;
  }

  forgetRun(runId: string): void {
    this.runs.delete(runId);
  }

  totalCharged(): number {
    let total = 0;
    for (const run of this.runs.values()) {
      total += run.charged;
    }
    return total;
  }

  private findRun(runId: string): FakeRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new JobNotFoundError(runId);
    }
    return run;
  }

  private requireKey(): void {
    if (this.apiKey === undefined) {
      throw new AuthenticationError('API key required.');
    }
  }
}
