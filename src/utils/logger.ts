/**
 * stderr logging. stdout carries the MCP stdio transport and must stay clean.
 */
export type DebugLog = (message: string) => void;

export function createDebugLog(enabled: boolean, scope?: string): DebugLog {
  const prefix = scope ? `[DEBUG] [${scope}]` : '[DEBUG]';
  return (message: string) => {
    if (enabled) {
      console.error(`${prefix} ${message}`);
    }
  };
}

/**
 * Derive a scoped logger that shares the parent's enabled flag
 */
export function scopedDebugLog(parent: DebugLog, scope: string): DebugLog {
  return (message: string) => parent(`[${scope}] ${message}`);
}

export const noopDebugLog: DebugLog = () => {};

export function logWarning(scope: string, message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`[${scope}] ⚠️ ${message}`);
  } else {
    console.error(`[${scope}] ⚠️ ${message}:`, error instanceof Error ? error.message : error);
  }
}
