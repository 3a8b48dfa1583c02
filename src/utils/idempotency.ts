import { createHash } from 'crypto';
import type { AnalysisRequest } from '../core/entities/Job.js';
import type { DatasetFile } from '../core/interfaces/IDiscoveryClient.js';

/**
 * Token identifying one logical submission.
 *
 * An explicit token wins. Otherwise the token is a SHA-256 over the canonical
 * request content (dataset identity, target, depth, visibility, descriptions,
 * title) plus the caller nonce, so a retry of the same request reproduces it and
 * a new nonce starts a new run.
 */
export function deriveIdempotencyToken(request: AnalysisRequest, dataset: DatasetFile): string {
  if (request.idempotencyToken !== undefined) {
    return request.idempotencyToken;
  }

  const descriptions = Object.entries(request.columnDescriptions ?? {}).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );

  const canonical = JSON.stringify([
    dataset.resolvedPath,
    dataset.sizeBytes,
    dataset.modifiedAtMs,
    request.targetColumn,
    request.depth,
    request.visibility,
    descriptions,
    request.title ?? null,
    request.description ?? null,
    request.nonce ?? '',
  ]);

  return `idem_${createHash('sha256').update(canonical).digest('hex')}`;
}
