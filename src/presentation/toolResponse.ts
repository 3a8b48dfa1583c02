import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { DiscoveryError } from '../core/errors.js';
import { logWarning } from '../utils/logger.js';

/**
 * Pretty-printed JSON text result
 */
export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Render an error as `{ error: { type, message, ...details } }` with isError set.
 * Errors outside the DiscoveryError hierarchy are logged; their message is still returned.
 */
export function errorResult(error: unknown): CallToolResult {
  let body: Record<string, unknown>;

  if (error instanceof DiscoveryError) {
    body = {
      type: error.name,
      message: error.message,
      retryable: error.retryable,
      ...error.details(),
    };
  } else if (error instanceof ZodError) {
    body = {
      type: 'ValidationError',
      message: error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; '),
      retryable: false,
    };
  } else {
    logWarning('Tools', 'Unexpected error', error);
    body = {
      type: 'InternalError',
      message: error instanceof Error ? error.message : String(error),
      retryable: false,
    };
  }

  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: JSON.stringify({ error: body }, null, 2),
      },
    ],
  };
}

/**
 * Run a tool body and render its value or its error
 */
export async function runTool(body: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await body());
  } catch (error) {
    return errorResult(error);
  }
}
