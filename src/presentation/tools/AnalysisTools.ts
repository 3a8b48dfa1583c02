import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { JobService } from '../../application/services/JobService.js';
import { balanceCovers, type AccountService } from '../../application/services/AccountService.js';
import type { JobStatusReport, ResultPayload } from '../../core/entities/Job.js';
import { estimateCost, PUBLIC_MAX_DEPTH } from '../../application/services/CostEstimator.js';
import { validateDepth } from '../../application/services/RequestValidator.js';
import { runTool } from '../toolResponse.js';

export const analyzeInputShape = {
  file_path: z
    .string()
    .min(1)
    .describe('Path to the dataset file (CSV, TSV, Excel, JSON, Parquet, ARFF, Feather)'),
  target_column: z.string().describe('Column to explain: what drives it beyond the obvious'),
  depth_iterations: z.number().int().default(1).describe('Search depth (1 = fast). At most num_columns - 2'),
  visibility: z
    .enum(['public', 'private'])
    .default('public')
    .describe('"public" is free and publishes results; "private" costs credits'),
  title: z.string().optional().describe('Title for the analysis'),
  description: z.string().optional().describe('Description of the dataset'),
  column_descriptions: z
    .record(z.string())
    .optional()
    .describe('Plain-language description per column name'),
  num_columns: z
    .number()
    .int()
    .optional()
    .describe('Number of columns, if known. Lets the depth bound be checked before upload'),
  nonce: z
    .string()
    .optional()
    .describe('Change this to submit the same request again as a new, separately billed run'),
  idempotency_token: z
    .string()
    .optional()
    .describe('Explicit idempotency token. Retries with the same token never create a second run'),
};

export const runIdInputShape = {
  run_id: z.string().min(1).describe('The run ID returned by discovery_analyze'),
};

export const estimateInputShape = {
  file_size_mb: z.number().describe('Size of the dataset in megabytes'),
  depth_iterations: z.number().int().default(1).describe('Search depth (1 = fast)'),
  visibility: z.enum(['public', 'private']).default('public').describe('"public" (free) or "private"'),
  num_columns: z.number().int().optional().describe('Number of columns, to check the depth bound'),
};

type AnalyzeArgs = z.infer<z.ZodObject<typeof analyzeInputShape>>;
type RunIdArgs = z.infer<z.ZodObject<typeof runIdInputShape>>;
type EstimateArgs = z.infer<z.ZodObject<typeof estimateInputShape>>;

/**
 * Hints appended to completed results: locked deep patterns and the public-run notice
 */
export function buildResultHints(payload: ResultPayload): string[] {
  const hints: string[] = [];

  const hiddenDeep = typeof payload.hidden_deep_count === 'number' ? payload.hidden_deep_count : 0;
  const hiddenDeepNovel =
    typeof payload.hidden_deep_novel_count === 'number' ? payload.hidden_deep_novel_count : 0;

  if (hiddenDeep > 0) {
    const novelPart = hiddenDeepNovel > 0 ? `, including ${hiddenDeepNovel} novel` : '';
    hints.push(
      `Deep analysis found ${hiddenDeep} more pattern${hiddenDeep === 1 ? '' : 's'}${novelPart}. ` +
        'Upgrade to a paid plan to unlock them (see discovery_list_plans and discovery_subscribe).'
    );
  }

  const isPublic = payload.is_public === undefined ? true : Boolean(payload.is_public);
  if (isPublic) {
    hints.push(
      'This was a public run: results are visible in the public gallery. ' +
        'Use visibility "private" for confidential data.'
    );
  }

  return hints;
}

function nextStep(report: JobStatusReport): string {
  switch (report.status) {
    case 'completed':
      return 'Call discovery_get_results with this run_id.';
    case 'failed':
      return 'The analysis failed. Fix the dataset or request and submit a new analysis.';
    case 'expired':
      return 'The service no longer has this run. Submit the analysis again to get results.';
    default: {
      const seconds = Math.round((report.suggestedPollDelayMs ?? 0) / 1000);
      return `Still ${report.status}. Call discovery_status again in about ${seconds} seconds.`;
    }
  }
}

export interface AnalysisToolHandlers {
  analyze(args: AnalyzeArgs): Promise<CallToolResult>;
  status(args: RunIdArgs): Promise<CallToolResult>;
  getResults(args: RunIdArgs): Promise<CallToolResult>;
  estimate(args: EstimateArgs): Promise<CallToolResult>;
}

export function createAnalysisToolHandlers(jobs: JobService, accounts: AccountService): AnalysisToolHandlers {
  return {
    analyze: (args) =>
      runTool(async () => {
        const result = await jobs.submit({
          filePath: args.file_path,
          targetColumn: args.target_column,
          depth: args.depth_iterations,
          visibility: args.visibility,
          title: args.title,
          description: args.description,
          columnDescriptions: args.column_descriptions,
          numColumns: args.num_columns,
          nonce: args.nonce,
          idempotencyToken: args.idempotency_token,
        });

        return {
          run_id: result.runId,
          status: result.status,
          deduplicated: result.deduplicated,
          estimated_credits: result.estimatedCredits,
          idempotency_token: result.idempotencyToken,
          next_step:
            result.status === null
              ? 'This run is no longer tracked locally. Call discovery_status with this run_id to check it.'
              : 'The analysis runs in the background and usually takes 3-15 minutes. ' +
                'Poll discovery_status with this run_id, then call discovery_get_results once it is completed.',
        };
      }),

    status: ({ run_id }) =>
      runTool(async () => {
        const report = await jobs.poll(run_id);
        return {
          run_id: report.runId,
          status: report.status,
          failure_reason: report.failureReason,
          report_url: report.resultRef,
          last_polled_at: report.lastPolledAt,
          poll_count: report.pollCount,
          suggested_poll_delay_seconds:
            report.suggestedPollDelayMs === null ? null : report.suggestedPollDelayMs / 1000,
          next_step: nextStep(report),
        };
      }),

    getResults: ({ run_id }) =>
      runTool(async () => {
        const payload = await jobs.fetchResults(run_id);
        return { ...payload, hints: buildResultHints(payload) };
      }),

    estimate: (args) =>
      runTool(async () => {
        if (args.num_columns !== undefined) {
          validateDepth(args.depth_iterations, args.num_columns);
        }
        const estimate = estimateCost({
          fileSizeMb: args.file_size_mb,
          depth: args.depth_iterations,
          visibility: args.visibility,
        });

        const result: Record<string, unknown> = {
          credits: estimate.credits,
          file_size_mb: estimate.fileSizeMb,
          depth_iterations: estimate.depth,
          visibility: estimate.visibility,
        };

        if (estimate.visibility === 'public') {
          if (estimate.depth > PUBLIC_MAX_DEPTH) {
            result.note = `Public runs are limited to depth ${PUBLIC_MAX_DEPTH}; use "private" for deeper searches.`;
          }
          return result;
        }

        result.public_alternative = {
          credits: 0,
          depth_iterations: PUBLIC_MAX_DEPTH,
          note: 'Public runs are free but their results are published.',
        };

        if (accounts.hasApiKey()) {
          try {
            const snapshot = await accounts.snapshot();
            result.credits_available = snapshot.creditsAvailable;
            result.sufficient_credits = balanceCovers(snapshot, estimate.credits);
          } catch (error) {
            result.sufficient_credits = null;
            result.note = `The balance could not be checked: ${error instanceof Error ? error.message : String(error)}`;
          }
        } else {
          result.sufficient_credits = null;
          result.note = 'No API key configured, so the balance was not checked.';
        }
        return result;
      }),
  };
}

/**
 * Register the analysis tools: analyze, status, get_results, estimate
 */
export function registerAnalysisTools(server: McpServer, jobs: JobService, accounts: AccountService) {
  const handlers = createAnalysisToolHandlers(jobs, accounts);

  server.tool(
    'discovery_analyze',
    'Run Discovery Engine on a tabular dataset to find novel, statistically validated patterns ' +
      '(feature interactions, subgroup effects, conditional relationships) that explain a target column. ' +
      'Returns a run_id immediately; the analysis itself takes minutes. Poll with discovery_status and ' +
      'fetch with discovery_get_results. Public runs are free and published; private runs cost credits, ' +
      'so call discovery_estimate first.',
    analyzeInputShape,
    (args) => handlers.analyze(args)
  );

  server.tool(
    'discovery_status',
    'Check the status of a Discovery Engine run (queued, running, completed, failed, expired). ' +
      'One lightweight check; the response suggests when to poll again.',
    runIdInputShape,
    (args) => handlers.status(args)
  );

  server.tool(
    'discovery_get_results',
    'Fetch the results of a completed run: patterns with conditions, FDR-corrected p-values, novelty ' +
      'and citations, plus a summary and a shareable report URL. Only valid once discovery_status reports "completed".',
    runIdInputShape,
    (args) => handlers.getResults(args)
  );

  server.tool(
    'discovery_estimate',
    'Estimate the credit cost of an analysis before running it, and whether your balance covers it. ' +
      'Always call this before a private discovery_analyze.',
    estimateInputShape,
    (args) => handlers.estimate(args)
  );
}
