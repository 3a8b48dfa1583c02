import fetch, { type RequestInit, type Response } from 'node-fetch';
import fs from 'fs';
import { z } from 'zod';
import type {
  CreateRunResult,
  DatasetColumn,
  DatasetFile,
  IDiscoveryClient,
  RemoteRunStatus,
  UploadedDataset,
} from '../../core/interfaces/IDiscoveryClient.js';
import type { AnalysisRequest, ResultPayload } from '../../core/entities/Job.js';
import type { PlanTier, SignupResult } from '../../core/entities/Account.js';
import {
  AuthenticationError,
  JobNotFoundError,
  PaymentRequiredError,
  RateLimitedError,
  RemoteServiceError,
  TransientNetworkError,
  ValidationError,
} from '../../core/errors.js';
import {
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  sleep,
  withRetry,
  type RetryConfig,
  type RetryLog,
  type SleepFn,
} from '../../utils/retry.js';
import { noopDebugLog, type DebugLog } from '../../utils/logger.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface DiscoveryApiClientOptions {
  apiUrl: string;
  dashboardUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  uploadTimeoutMs?: number;
  retryConfig?: RetryConfig;
  circuitBreaker?: CircuitBreaker;
  fetchImpl?: FetchFn;
  sleepFn?: SleepFn;
  debugLog?: DebugLog;
}

type Base = 'api' | 'dashboard';

interface RequestOptions {
  body?: Record<string, unknown>;
  auth?: boolean;
  idempotencyKey?: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.xls': 'application/vnd.ms-excel',
  '.json': 'application/json',
  '.parquet': 'application/vnd.apache.parquet',
  '.arff': 'text/plain',
  '.feather': 'application/octet-stream',
};

const DEFAULT_RETRY_AFTER_MS = 60000;

const PresignSchema = z.object({
  uploadUrl: z.string().min(1),
  key: z.string().min(1),
  uploadToken: z.string().min(1),
});

const FinalizeSchema = z.object({
  ok: z.boolean(),
  file: z
    .object({
      key: z.string(),
      name: z.string(),
      size: z.number(),
      fileHash: z.string(),
    })
    .optional(),
  columns: z.array(z.unknown()).default([]),
  issues: z
    .object({
      errors: z.array(z.object({ message: z.string() })).default([]),
    })
    .optional(),
});

const NamedColumnSchema = z.union([z.string(), z.object({ name: z.string() }).passthrough()]);

const CreateRunSchema = z
  .object({
    run_id: z.string().min(1).optional(),
    runId: z.string().min(1).optional(),
    duplicate: z.boolean().optional(),
    credits_charged: z.number().nullish(),
  })
  .passthrough();

const RunStatusSchema = z
  .object({
    run_id: z.string().nullish(),
    status: z.string().min(1),
    error_message: z.string().nullish(),
    report_url: z.string().nullish(),
    is_public: z.boolean().nullish(),
  })
  .passthrough();

const ObjectSchema = z.record(z.unknown());

const SignupSchema = z
  .object({
    api_key: z.string().min(1).optional(),
  })
  .passthrough();

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new RemoteServiceError(502, `Unexpected ${what} response from API (${issues})`, data);
  }
  return parsed.data;
}

function toColumn(raw: unknown): DatasetColumn {
  const parsed = NamedColumnSchema.safeParse(raw);
  if (!parsed.success) {
    return { name: null, raw };
  }
  return { name: typeof parsed.data === 'string' ? parsed.data : parsed.data.name, raw };
}

/**
 * HTTP client for the Discovery Engine API and dashboard.
 *
 * Every call goes through {@link withRetry} inside a {@link CircuitBreaker}.
 * Run creation carries the idempotency token on every attempt, so retrying a
 * timed-out acknowledgement cannot create a second billed run.
 */
export class DiscoveryApiClient implements IDiscoveryClient {
  private apiUrl: string;
  private dashboardUrl: string;
  private apiKey: string | undefined;
  private timeoutMs: number;
  private uploadTimeoutMs: number;
  private retryConfig: RetryConfig;
  private circuitBreaker: CircuitBreaker;
  private fetchImpl: FetchFn;
  private sleepFn: SleepFn;
  private debugLog: DebugLog;

  constructor(options: DiscoveryApiClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.dashboardUrl = options.dashboardUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey || undefined;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? 300000;
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleepFn = options.sleepFn ?? sleep;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  async uploadDataset(dataset: DatasetFile): Promise<UploadedDataset> {
    const contentType = CONTENT_TYPES[dataset.extension] ?? 'application/octet-stream';

    // Step 1: Get presigned upload URL
    const presign = parseOrThrow(
      PresignSchema,
      await this.request('dashboard', 'POST', '/api/data/upload/presign', {
        body: {
          fileName: dataset.fileName,
          contentType,
          fileSize: dataset.sizeBytes,
        },
      }),
      'upload presign'
    );

    // Step 2: Upload file to presigned URL (no API credentials go to storage)
    await withRetry(
      async () => {
        const res = await this.send(presign.uploadUrl, {
          method: 'PUT',
          body: fs.createReadStream(dataset.resolvedPath),
          headers: {
            'Content-Type': contentType,
            'Content-Length': String(dataset.sizeBytes),
          },
          timeout: this.uploadTimeoutMs,
        });
        if (res.status >= 500) {
          throw new TransientNetworkError(`File upload failed: ${res.status}`, res.status);
        }
        if (!res.ok) {
          throw new RemoteServiceError(res.status, `File upload failed: ${res.status}`);
        }
      },
      { ...this.retryConfig, timeoutMs: this.uploadTimeoutMs },
      this.logRetry('PUT upload'),
      this.sleepFn
    );
    this.debugLog(`Uploaded ${dataset.fileName} (${dataset.sizeBytes} bytes)`);

    // Step 3: Finalize the upload
    const finalize = parseOrThrow(
      FinalizeSchema,
      await this.request('dashboard', 'POST', '/api/data/upload/finalize', {
        body: { key: presign.key, uploadToken: presign.uploadToken },
      }),
      'upload finalize'
    );

    if (!finalize.ok || !finalize.file) {
      const firstError = finalize.issues?.errors[0]?.message;
      throw new ValidationError(firstError ?? 'Upload finalize failed', 'dataset accepted by service');
    }

    return {
      ...finalize.file,
      columns: finalize.columns.map(toColumn),
    };
  }

  async createRun(
    dataset: UploadedDataset,
    request: AnalysisRequest,
    idempotencyToken: string
  ): Promise<CreateRunResult> {
    const payload: Record<string, unknown> = {
      file: {
        key: dataset.key,
        name: dataset.name,
        size: dataset.size,
        fileHash: dataset.fileHash,
      },
      columns: dataset.columns.map((column) => column.raw),
      targetColumn: request.targetColumn,
      depthIterations: request.depth,
      isPublic: request.visibility === 'public',
      idempotencyKey: idempotencyToken,
    };
    if (request.columnDescriptions && Object.keys(request.columnDescriptions).length > 0) {
      payload.columnDescriptions = request.columnDescriptions;
    }
    if (request.title) payload.title = request.title;
    if (request.description) payload.description = request.description;

    let body: unknown;
    let conflict = false;
    try {
      body = await this.request('dashboard', 'POST', '/api/reports/create-from-upload', {
        body: payload,
        idempotencyKey: idempotencyToken,
      });
    } catch (error) {
      // 409 with a run id: the token was already used, the body names the existing run
      if (error instanceof RemoteServiceError && error.status === 409 && error.body !== undefined) {
        body = error.body;
        conflict = true;
      } else {
        throw error;
      }
    }

    const parsed = CreateRunSchema.safeParse(body);
    const runId = parsed.success ? parsed.data.run_id ?? parsed.data.runId : undefined;
    if (!parsed.success || runId === undefined) {
      if (conflict) {
        throw new RemoteServiceError(409, 'Run creation conflicted without naming an existing run', body);
      }
      throw new RemoteServiceError(502, 'Unexpected run creation response from API (missing run id)', body);
    }

    return {
      runId,
      duplicate: conflict || parsed.data.duplicate === true,
      creditsCharged: parsed.data.credits_charged ?? null,
    };
  }

  async getRunStatus(runId: string): Promise<RemoteRunStatus> {
    const body = await this.runRequest(runId);
    const parsed = parseOrThrow(RunStatusSchema, body, 'run status');

    return {
      runId: parsed.run_id ?? runId,
      status: parsed.status,
      errorMessage: parsed.error_message ?? null,
      reportUrl: parsed.report_url ?? null,
      isPublic: parsed.is_public ?? null,
    };
  }

  async getRunResults(runId: string): Promise<ResultPayload> {
    return parseOrThrow(ObjectSchema, await this.runRequest(runId), 'run results');
  }

  async listPlans(): Promise<unknown> {
    return this.request('api', 'GET', '/v1/plans', { auth: false });
  }

  async signup(email: string, name?: string): Promise<SignupResult> {
    const body: Record<string, unknown> = { email };
    if (name) body.name = name;

    const result = parseOrThrow(
      SignupSchema,
      await this.request('api', 'POST', '/v1/signup', { body, auth: false }),
      'signup'
    );
    return { apiKey: result.api_key ?? null, raw: result };
  }

  async getAccount(): Promise<Record<string, unknown>> {
    return parseOrThrow(ObjectSchema, await this.request('api', 'GET', '/v1/account'), 'account');
  }

  async subscribe(plan: PlanTier): Promise<unknown> {
    return this.request('api', 'POST', '/v1/account/subscribe', { body: { plan } });
  }

  async purchaseCredits(packs: number): Promise<unknown> {
    return this.request('api', 'POST', '/v1/account/credits/purchase', { body: { packs } });
  }

  async addPaymentMethod(paymentMethodId: string): Promise<unknown> {
    return this.request('api', 'POST', '/v1/account/payment-method', {
      body: { payment_method_id: paymentMethodId },
    });
  }

  /**
   * Status and results share one dashboard endpoint; 404 means the service does not know the run
   */
  private async runRequest(runId: string): Promise<unknown> {
    try {
      return await this.request('dashboard', 'GET', `/api/runs/${encodeURIComponent(runId)}/results`);
    } catch (error) {
      if (error instanceof RemoteServiceError && error.status === 404) {
        throw new JobNotFoundError(runId);
      }
      throw error;
    }
  }

  private async request(
    base: Base,
    method: 'GET' | 'POST',
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const { body, auth = true, idempotencyKey } = options;

    if (auth && this.apiKey === undefined) {
      throw new AuthenticationError(
        'API key required. Set DISCOVERY_API_KEY (or --api-key), or create an account with discovery_signup.'
      );
    }

    const url = `${base === 'api' ? this.apiUrl : this.dashboardUrl}${path}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Client-Type': 'mcp',
    };
    if (auth && this.apiKey !== undefined) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    if (idempotencyKey) {
      headers['Idempotency-Key'] = idempotencyKey;
    }

    const init: RequestInit = {
      method,
      headers,
      timeout: this.timeoutMs,
    };
    if (method === 'POST') {
      init.body = JSON.stringify(body ?? {});
    }

    return this.circuitBreaker.execute(() =>
      withRetry(
        async () => this.readResponse(await this.send(url, init)),
        { ...this.retryConfig, timeoutMs: this.timeoutMs },
        this.logRetry(`${method} ${path}`),
        this.sleepFn
      )
    );
  }

  /**
   * Issue one request; anything the fetch layer throws is a network failure
   */
  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`Connection failed: ${message}`, undefined, { cause: error });
    }
  }

  private async readResponse(res: Response): Promise<unknown> {
    const text = await res.text();
    let json: unknown = undefined;
    if (text.length > 0) {
      try {
        json = JSON.parse(text);
      } catch {
        json = undefined;
      }
    }

    if (res.status === 401) {
      throw new AuthenticationError('Authentication failed. Check your API key or session token.');
    }
    if (res.status === 402) {
      throw new PaymentRequiredError();
    }
    if (res.status === 429) {
      const retryAfterSeconds = Number.parseInt(res.headers.get('Retry-After') ?? '', 10);
      throw new RateLimitedError(
        Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : DEFAULT_RETRY_AFTER_MS
      );
    }
    if (res.status >= 500) {
      throw new TransientNetworkError(`Service error (${res.status}): ${extractDetail(json, text)}`, res.status);
    }
    if (res.status >= 400) {
      throw new RemoteServiceError(res.status, extractDetail(json, text), json);
    }

    if (json === undefined) {
      if (text.length === 0) return {};
      throw new RemoteServiceError(502, `API returned a non-JSON response (${res.status})`);
    }
    return json;
  }

  private logRetry(label: string): (log: RetryLog) => void {
    return (log) => {
      if (!log.success) {
        this.debugLog(
          `${label} attempt ${log.attempt} failed: ${log.error}${
            log.nextRetryInMs !== undefined ? ` (retrying in ${log.nextRetryInMs}ms)` : ''
          }`
        );
      }
    };
  }
}

function extractDetail(json: unknown, text: string): string {
  const parsed = z.object({ detail: z.string() }).safeParse(json);
  if (parsed.success) return parsed.data.detail;
  return text.length > 0 ? text : 'no detail';
}
