import { Readable } from 'stream';
import { Headers, Response, type RequestInit } from 'node-fetch';
import { DiscoveryApiClient, type FetchFn } from '../src/infrastructure/http/DiscoveryApiClient.js';
import { inspectDataset } from '../src/application/services/RequestValidator.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../src/utils/retry.js';
import {
  AuthenticationError,
  JobNotFoundError,
  PaymentRequiredError,
  RemoteServiceError,
  ServiceUnavailableError,
  ValidationError,
} from '../src/core/errors.js';
import type { AnalysisRequest } from '../src/core/entities/Job.js';
import type { UploadedDataset } from '../src/core/interfaces/IDiscoveryClient.js';
import { DatasetDir, SAMPLE_CSV } from './helpers/datasets.js';

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

const json = (status: number, body: unknown, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), { status, headers });

const uploaded: UploadedDataset = {
  key: 'uploads/churn.csv',
  name: 'churn.csv',
  size: 2048,
  fileHash: 'hash-of-file',
  columns: [
    { name: 'age', raw: { name: 'age' } },
    { name: 'churned', raw: { name: 'churned' } },
  ],
};

const runRequest: AnalysisRequest = {
  filePath: 'churn.csv',
  targetColumn: 'churned',
  depth: 2,
  visibility: 'private',
  title: 'Churn drivers',
};

describe('DiscoveryApiClient', () => {
  let calls: RecordedCall[];
  let queue: Array<Response | Error>;
  let sleeps: number[];
  let client: DiscoveryApiClient;

  const fetchImpl: FetchFn = async (url, init) => {
    calls.push({ url, init });
    if (init?.body instanceof Readable) {
      init.body.destroy();
    }
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`Unexpected request to ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  const headersOf = (call: RecordedCall) => new Headers(call.init?.headers);
  const bodyOf = (call: RecordedCall): unknown => JSON.parse(String(call.init?.body));

  const makeClient = (overrides: { apiKey?: string; circuitBreaker?: CircuitBreaker } = {}) =>
    new DiscoveryApiClient({
      apiUrl: 'https://api.example.test',
      dashboardUrl: 'https://dashboard.example.test/',
      apiKey: 'apiKey' in overrides ? overrides.apiKey : 'test-key',
      retryConfig: { ...DEFAULT_RETRY_CONFIG, maxAttempts: 3 },
      circuitBreaker: overrides.circuitBreaker ?? new CircuitBreaker(5, 60000),
      fetchImpl,
      sleepFn: async (ms) => {
        sleeps.push(ms);
      },
    });

  beforeEach(() => {
    calls = [];
    queue = [];
    sleeps = [];
    client = makeClient();
  });

  describe('requests', () => {
    test('sends the API key and client type', async () => {
      queue.push(json(200, { plan: 'free_tier' }));

      const account = await client.getAccount();

      expect(account).toEqual({ plan: 'free_tier' });
      expect(calls[0].url).toBe('https://api.example.test/v1/account');
      expect(calls[0].init?.method).toBe('GET');
      expect(headersOf(calls[0]).get('Authorization')).toBe('Bearer test-key');
      expect(headersOf(calls[0]).get('X-Client-Type')).toBe('mcp');
    });

    test('refuses authenticated calls without a key and without a request', async () => {
      client = makeClient({ apiKey: undefined });

      await expect(client.getAccount()).rejects.toBeInstanceOf(AuthenticationError);
      expect(calls).toHaveLength(0);
    });

    test('lists plans without authentication', async () => {
      client = makeClient({ apiKey: undefined });
      queue.push(json(200, { plans: [] }));

      expect(await client.listPlans()).toEqual({ plans: [] });
      expect(headersOf(calls[0]).get('Authorization')).toBeNull();
    });

    test('signs up without authentication', async () => {
      client = makeClient({ apiKey: undefined });
      queue.push(json(200, { api_key: 'disco_test-key', email: 'ada@example.test' }));

      const result = await client.signup('ada@example.test', 'Ada');

      expect(result.apiKey).toBe('disco_test-key');
      expect(calls[0].url).toBe('https://api.example.test/v1/signup');
      expect(bodyOf(calls[0])).toEqual({ email: 'ada@example.test', name: 'Ada' });
      expect(headersOf(calls[0]).get('Authorization')).toBeNull();
    });

    test('posts account mutations to their endpoints', async () => {
      queue.push(json(200, { ok: true }), json(200, { ok: true }), json(200, { ok: true }));

      await client.subscribe('tier_1');
      await client.purchaseCredits(2);
      await client.addPaymentMethod('pm_test');

      expect(calls.map((call) => call.url)).toEqual([
        'https://api.example.test/v1/account/subscribe',
        'https://api.example.test/v1/account/credits/purchase',
        'https://api.example.test/v1/account/payment-method',
      ]);
      expect(calls.map(bodyOf)).toEqual([{ plan: 'tier_1' }, { packs: 2 }, { payment_method_id: 'pm_test' }]);
    });

    test('treats an empty body as an empty object', async () => {
      queue.push(new Response('', { status: 200 }));

      expect(await client.addPaymentMethod('pm_test')).toEqual({});
    });

    test('rejects a non-JSON body', async () => {
      queue.push(new Response('<html>oops</html>', { status: 200 }));

      await expect(client.listPlans()).rejects.toMatchObject({ status: 502 });
    });
  });

  describe('status mapping', () => {
    test('401 is an authentication error', async () => {
      queue.push(json(401, { detail: 'bad key' }));
      await expect(client.getAccount()).rejects.toBeInstanceOf(AuthenticationError);
    });

    test('402 is a payment error', async () => {
      queue.push(json(402, { detail: 'no credits' }));
      await expect(client.purchaseCredits(1)).rejects.toBeInstanceOf(PaymentRequiredError);
    });

    test('other 4xx answers carry the service detail and are not retried', async () => {
      queue.push(json(400, { detail: 'Unknown plan' }));

      await expect(client.subscribe('tier_2')).rejects.toThrow('API error (400): Unknown plan');
      expect(calls).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    test('5xx answers are retried with backoff', async () => {
      queue.push(json(503, { detail: 'busy' }), json(502, {}), json(200, { plan: 'tier_1' }));

      expect(await client.getAccount()).toEqual({ plan: 'tier_1' });
      expect(calls).toHaveLength(3);
      expect(sleeps).toEqual([1000, 2000]);
    });

    test('exhausted retries raise ServiceUnavailableError', async () => {
      queue.push(json(500, {}), json(500, {}), json(500, { detail: 'still broken' }));

      const error = await client.getAccount().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceUnavailableError);
      expect(error).toMatchObject({
        attempts: 3,
        message:
          'Discovery Engine is unavailable: failed after 3 attempts. Last error: Service error (500): still broken',
      });
    });

    test('connection failures are retried', async () => {
      queue.push(new Error('connect ECONNREFUSED'), json(200, { plan: 'free_tier' }));

      expect(await client.getAccount()).toEqual({ plan: 'free_tier' });
      expect(calls).toHaveLength(2);
    });

    test('429 waits for Retry-After', async () => {
      queue.push(json(429, {}, { 'Retry-After': '3' }), json(200, { plan: 'free_tier' }));

      await client.getAccount();

      expect(sleeps).toEqual([3000]);
    });

    test('the circuit opens after repeated outages', async () => {
      const breaker = new CircuitBreaker(2, 60000);
      client = makeClient({ circuitBreaker: breaker });
      for (let i = 0; i < 6; i++) {
        queue.push(json(503, {}));
      }

      await expect(client.getAccount()).rejects.toBeInstanceOf(ServiceUnavailableError);
      await expect(client.getAccount()).rejects.toBeInstanceOf(ServiceUnavailableError);
      expect(client.getCircuitBreakerState()).toBe('open');

      await expect(client.getAccount()).rejects.toThrow('Circuit breaker is OPEN');
      expect(calls).toHaveLength(6);
    });
  });

  describe('runs', () => {
    test('creates a run with the idempotency token in header and body', async () => {
      queue.push(json(200, { run_id: 'run-9', credits_charged: 2 }));

      const result = await client.createRun(uploaded, runRequest, 'idem_token');

      expect(result).toEqual({ runId: 'run-9', duplicate: false, creditsCharged: 2 });
      expect(calls[0].url).toBe('https://dashboard.example.test/api/reports/create-from-upload');
      expect(headersOf(calls[0]).get('Idempotency-Key')).toBe('idem_token');
      expect(bodyOf(calls[0])).toEqual({
        file: { key: 'uploads/churn.csv', name: 'churn.csv', size: 2048, fileHash: 'hash-of-file' },
        columns: [{ name: 'age' }, { name: 'churned' }],
        targetColumn: 'churned',
        depthIterations: 2,
        isPublic: false,
        idempotencyKey: 'idem_token',
        title: 'Churn drivers',
      });
    });

    test('reuses the token on every retry', async () => {
      queue.push(json(504, {}), json(200, { runId: 'run-9' }));

      const result = await client.createRun(uploaded, runRequest, 'idem_token');

      expect(result).toEqual({ runId: 'run-9', duplicate: false, creditsCharged: null });
      expect(calls.map((call) => headersOf(call).get('Idempotency-Key'))).toEqual(['idem_token', 'idem_token']);
    });

    test('a duplicate-token conflict returns the existing run', async () => {
      queue.push(json(409, { detail: 'Duplicate idempotency key', run_id: 'run-3' }));

      expect(await client.createRun(uploaded, runRequest, 'idem_token')).toEqual({
        runId: 'run-3',
        duplicate: true,
        creditsCharged: null,
      });
    });

    test('a conflict without a run id is an error', async () => {
      queue.push(json(409, { detail: 'Conflict' }));

      await expect(client.createRun(uploaded, runRequest, 'idem_token')).rejects.toMatchObject({ status: 409 });
    });

    test('reads a run status', async () => {
      queue.push(
        json(200, { run_id: 'run-1', status: 'processing', error_message: null, is_public: false, patterns: [] })
      );

      expect(await client.getRunStatus('run-1')).toEqual({
        runId: 'run-1',
        status: 'processing',
        errorMessage: null,
        reportUrl: null,
        isPublic: false,
      });
      expect(calls[0].url).toBe('https://dashboard.example.test/api/runs/run-1/results');
    });

    test('an unknown run is JobNotFoundError', async () => {
      queue.push(json(404, { detail: 'Run not found' }));

      await expect(client.getRunStatus('run-1')).rejects.toBeInstanceOf(JobNotFoundError);
    });

    test('returns results verbatim', async () => {
      const payload = { run_id: 'run-1', status: 'completed', patterns: [{ p_value: 0.01 }], summary: 'ok' };
      queue.push(json(200, payload));

      expect(await client.getRunResults('run-1')).toEqual(payload);
    });
  });

  describe('uploadDataset', () => {
    let datasets: DatasetDir;

    beforeEach(() => {
      datasets = new DatasetDir();
    });

    afterEach(() => {
      datasets.cleanup();
    });

    test('presigns, uploads and finalizes', async () => {
      const dataset = await inspectDataset(datasets.write('churn.csv'));
      queue.push(
        json(200, { uploadUrl: 'https://storage.example.test/put', key: 'k1', uploadToken: 't1' }),
        new Response('', { status: 200 }),
        json(200, {
          ok: true,
          file: { key: 'k1', name: 'churn.csv', size: dataset.sizeBytes, fileHash: 'h1' },
          columns: ['age', { name: 'income', type: 'numeric' }, 7],
        })
      );

      const result = await client.uploadDataset(dataset);

      expect(result).toEqual({
        key: 'k1',
        name: 'churn.csv',
        size: Buffer.byteLength(SAMPLE_CSV),
        fileHash: 'h1',
        columns: [
          { name: 'age', raw: 'age' },
          { name: 'income', raw: { name: 'income', type: 'numeric' } },
          { name: null, raw: 7 },
        ],
      });

      expect(calls.map((call) => call.url)).toEqual([
        'https://dashboard.example.test/api/data/upload/presign',
        'https://storage.example.test/put',
        'https://dashboard.example.test/api/data/upload/finalize',
      ]);
      expect(bodyOf(calls[0])).toEqual({
        fileName: 'churn.csv',
        contentType: 'text/csv',
        fileSize: Buffer.byteLength(SAMPLE_CSV),
      });
      expect(calls[1].init?.method).toBe('PUT');
      expect(headersOf(calls[1]).get('Authorization')).toBeNull();
      expect(bodyOf(calls[2])).toEqual({ key: 'k1', uploadToken: 't1' });
    });

    test('surfaces the first finalize issue as a validation error', async () => {
      const dataset = await inspectDataset(datasets.write('churn.csv'));
      queue.push(
        json(200, { uploadUrl: 'https://storage.example.test/put', key: 'k1', uploadToken: 't1' }),
        new Response('', { status: 200 }),
        json(200, { ok: false, issues: { errors: [{ message: 'Target column has no variance' }] } })
      );

      const error = await client.uploadDataset(dataset).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Target column has no variance',
        constraint: 'dataset accepted by service',
      });
    });

    test('a rejected upload is not retried', async () => {
      const dataset = await inspectDataset(datasets.write('churn.csv'));
      queue.push(
        json(200, { uploadUrl: 'https://storage.example.test/put', key: 'k1', uploadToken: 't1' }),
        new Response('', { status: 403 })
      );

      await expect(client.uploadDataset(dataset)).rejects.toBeInstanceOf(RemoteServiceError);
      expect(calls).toHaveLength(2);
    });
  });
});
