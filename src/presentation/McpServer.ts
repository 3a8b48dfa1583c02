import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Config } from '../config.js';
import {
  initializeDatabase,
  closeDatabase,
  type DatabaseConnection,
} from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { DiscoveryApiClient } from '../infrastructure/http/DiscoveryApiClient.js';
import { AccountService } from '../application/services/AccountService.js';
import { JobService } from '../application/services/JobService.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { createDebugLog, logWarning, scopedDebugLog, type DebugLog } from '../utils/logger.js';
import { registerAnalysisTools } from './tools/AnalysisTools.js';
import { registerAccountTools } from './tools/AccountTools.js';

const SERVER_INSTRUCTIONS =
  'Discovery Engine finds novel, statistically validated patterns in tabular data: feature ' +
  'interactions, subgroup effects and conditional relationships nobody thought to look for. ' +
  'Analyses run for minutes; submit with discovery_analyze, poll with discovery_status and ' +
  'fetch with discovery_get_results.';

/**
 * Main MCP Server class that wires every component and serves the tools over stdio
 */
export class McpServer {
  private server: BaseMcpServer;
  private client: DiscoveryApiClient;
  private accountService: AccountService;
  private jobService: JobService;
  private dbConnection: DatabaseConnection;
  private debugLog: DebugLog;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private config: Config) {
    this.debugLog = createDebugLog(config.server.debug);

    // Initialize database
    this.dbConnection = initializeDatabase(config.jobs.databasePath);
    const jobRepo = new JobRepository(this.dbConnection.getDatabase());

    // Initialize infrastructure
    const circuitBreaker = new CircuitBreaker(
      config.circuitBreaker.failureThreshold,
      config.circuitBreaker.resetTimeoutMs
    );
    this.client = new DiscoveryApiClient({
      apiUrl: config.discovery.apiUrl,
      dashboardUrl: config.discovery.dashboardUrl,
      apiKey: config.discovery.apiKey,
      timeoutMs: config.http.timeoutMs,
      uploadTimeoutMs: config.http.uploadTimeoutMs,
      retryConfig: {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
      },
      circuitBreaker,
      debugLog: scopedDebugLog(this.debugLog, 'Transport'),
    });

    // Initialize services
    this.accountService = new AccountService(this.client, {
      stalenessMs: config.account.stalenessSeconds * 1000,
      debugLog: scopedDebugLog(this.debugLog, 'Account'),
    });
    this.jobService = new JobService(this.client, jobRepo, this.accountService, {
      ttlMs: config.jobs.ttlMinutes * 60 * 1000,
      idempotencyWindowMs: config.jobs.idempotencyWindowHours * 60 * 60 * 1000,
      debugLog: scopedDebugLog(this.debugLog, 'Jobs'),
    });

    this.server = new BaseMcpServer(
      {
        name: config.server.name,
        version: config.server.version,
      },
      { instructions: SERVER_INSTRUCTIONS }
    );

    registerAnalysisTools(this.server, this.jobService, this.accountService);
    registerAccountTools(this.server, this.accountService, this.client);
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    console.error(`📋 Job Statistics: ${stats.totalRuns} tracked runs, ${stats.idempotencyKeys} idempotency keys`);
  }

  /**
   * Start the periodic sweep of idle jobs. The timer never keeps the process alive.
   */
  startSweeper() {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => {
      try {
        this.jobService.sweep();
      } catch (error) {
        logWarning('Jobs', 'Sweep failed', error);
      }
    }, this.config.jobs.sweepIntervalSeconds * 1000);
    this.sweepTimer.unref();
  }

  /**
   * Start the MCP server
   */
  async start() {
    this.debugLog(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
    this.startSweeper();

    const transport = new StdioServerTransport();

    // Add stdio error handling to prevent unexpected disconnections
    process.stdin.on('error', (error) => {
      logWarning('Stdio', 'stdin error (non-fatal)', error);
    });

    process.stdout.on('error', (error) => {
      logWarning('Stdio', 'stdout error (non-fatal)', error);
    });

    process.stdin.on('end', () => {
      logWarning('Stdio', 'stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error(`\n✅ Discovery Engine MCP Server running on stdio`);
    this.debugLog('stdio transport connected successfully');
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    await this.server.close();
    closeDatabase();
  }
}
