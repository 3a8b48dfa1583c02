import type { AnalysisRequest, ResultPayload } from '../entities/Job.js';
import type { PlanTier, SignupResult } from '../entities/Account.js';

export interface DatasetFile {
  resolvedPath: string;
  fileName: string;
  extension: string;
  sizeBytes: number;
  modifiedAtMs: number;
}

export interface DatasetColumn {
  name: string | null;
  raw: unknown;
}

/**
 * Dataset stored by the service, ready to be referenced by a run
 */
export interface UploadedDataset {
  key: string;
  name: string;
  size: number;
  fileHash: string;
  columns: DatasetColumn[];
}

export interface CreateRunResult {
  runId: string;
  /** The service recognised the idempotency token and returned the existing run */
  duplicate: boolean;
  creditsCharged: number | null;
}

export interface RemoteRunStatus {
  runId: string;
  /** Raw status string as reported by the service */
  status: string;
  errorMessage: string | null;
  reportUrl: string | null;
  isPublic: boolean | null;
}

/**
 * Remote Discovery Engine contract
 */
export interface IDiscoveryClient {
  uploadDataset(dataset: DatasetFile): Promise<UploadedDataset>;

  createRun(
    dataset: UploadedDataset,
    request: AnalysisRequest,
    idempotencyToken: string
  ): Promise<CreateRunResult>;

  /**
   * Throws JobNotFoundError when the service does not know the run
   */
  getRunStatus(runId: string): Promise<RemoteRunStatus>;

  getRunResults(runId: string): Promise<ResultPayload>;

  listPlans(): Promise<unknown>;

  signup(email: string, name?: string): Promise<SignupResult>;

  getAccount(): Promise<Record<string, unknown>>;

  subscribe(plan: PlanTier): Promise<unknown>;

  purchaseCredits(packs: number): Promise<unknown>;

  addPaymentMethod(paymentMethodId: string): Promise<unknown>;

  hasApiKey(): boolean;

  setApiKey(apiKey: string): void;
}
