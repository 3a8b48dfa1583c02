import * as dotenv from 'dotenv';
import { z } from 'zod';
import { IN_MEMORY_DATABASE } from './infrastructure/database/DatabaseConnection.js';

export const DEFAULT_API_URL = 'https://leap-labs-production--discovery-api.modal.run';
export const DEFAULT_DASHBOARD_URL = 'https://disco.leap-labs.com';

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  discovery: z.object({
    apiUrl: z.string().url('Invalid Discovery API URL format'),
    dashboardUrl: z.string().url('Invalid dashboard URL format'),
    apiKey: z.string().min(1).optional(),
  }),
  http: z.object({
    timeoutMs: z.number().int().min(1000).max(300000),
    uploadTimeoutMs: z.number().int().min(1000).max(3600000),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(100).max(10000),
    maxDelayMs: z.number().int().min(1000).max(60000),
  }),
  circuitBreaker: z.object({
    failureThreshold: z.number().int().min(1).max(50),
    resetTimeoutMs: z.number().int().min(1000).max(600000),
  }),
  jobs: z.object({
    ttlMinutes: z.number().int().min(1).max(10080),
    sweepIntervalSeconds: z.number().int().min(10).max(86400),
    idempotencyWindowHours: z.number().int().min(1).max(168),
    databasePath: z.string().min(1),
  }),
  account: z.object({
    stalenessSeconds: z.number().int().min(0).max(3600),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --api-url https://... --job-ttl-minutes 120 --debug
 */
function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const key = arg.slice(2);
    const next = argv[i + 1];

    // Check if next arg is a value or another flag
    if (next !== undefined && !next.startsWith('--')) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }

  return args;
}

/**
 * Assemble the configuration from CLI arguments, then environment variables, then defaults.
 * Throws the ZodError when a value is invalid.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'discovery-engine'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    discovery: {
      apiUrl: getString('api-url', 'DISCOVERY_API_URL', DEFAULT_API_URL),
      dashboardUrl: getString('dashboard-url', 'DISCOVERY_DASHBOARD_URL', DEFAULT_DASHBOARD_URL),
      apiKey: getOptionalString('api-key', 'DISCOVERY_API_KEY'),
    },
    http: {
      timeoutMs: getNumber('timeout-ms', 'HTTP_TIMEOUT_MS', 30000),
      uploadTimeoutMs: getNumber('upload-timeout-ms', 'UPLOAD_TIMEOUT_MS', 300000),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 4),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
    },
    circuitBreaker: {
      failureThreshold: getNumber('circuit-failure-threshold', 'CIRCUIT_FAILURE_THRESHOLD', 5),
      resetTimeoutMs: getNumber('circuit-reset-timeout', 'CIRCUIT_RESET_TIMEOUT_MS', 60000),
    },
    jobs: {
      ttlMinutes: getNumber('job-ttl-minutes', 'JOB_TTL_MINUTES', 240),
      sweepIntervalSeconds: getNumber('sweep-interval', 'JOB_SWEEP_INTERVAL_SECONDS', 300),
      idempotencyWindowHours: getNumber('idempotency-window-hours', 'IDEMPOTENCY_WINDOW_HOURS', 24),
      databasePath: getString('database-path', 'JOB_DATABASE_PATH', IN_MEMORY_DATABASE),
    },
    account: {
      stalenessSeconds: getNumber('account-staleness', 'ACCOUNT_STALENESS_SECONDS', 60),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from the .env file, environment variables or CLI arguments.
 * Exits the process when the configuration is invalid.
 */
export function getConfig(): Config {
  // Load environment variables from .env file
  dotenv.config();

  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - API and dashboard URLs must be valid (e.g., https://disco.leap-labs.com)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration to stderr. The API key is never printed.
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║            Discovery Engine MCP Server - Configuration             ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 API: ${config.discovery.apiUrl}`);
  console.error(`🔗 Dashboard: ${config.discovery.dashboardUrl}`);
  console.error(`🔑 API key: ${config.discovery.apiKey ? 'configured' : 'not set (use discovery_signup or DISCOVERY_API_KEY)'}`);

  console.error(
    `\n⚙️  HTTP: ${config.http.timeoutMs}ms timeout (upload ${config.http.uploadTimeoutMs}ms) | Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`
  );
  console.error(
    `🔌 Circuit breaker: opens after ${config.circuitBreaker.failureThreshold} failures, resets after ${config.circuitBreaker.resetTimeoutMs}ms`
  );
  console.error(
    `📋 Jobs: TTL ${config.jobs.ttlMinutes}m, sweep every ${config.jobs.sweepIntervalSeconds}s, idempotency window ${config.jobs.idempotencyWindowHours}h, store ${config.jobs.databasePath}`
  );
  console.error(`💳 Account cache: ${config.account.stalenessSeconds}s`);

  console.error('\n' + '─'.repeat(68));
}
