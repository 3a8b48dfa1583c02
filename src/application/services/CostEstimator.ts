/**
 * Local credit estimate for an analysis run.
 *
 * Private runs cost `max(1, ceil(fileSizeMb * depth))` credits; public runs are
 * free (capped at depth 1, results published). Pure: no I/O, nothing cached.
 */

import type { CostEstimate, CostEstimateInput } from '../../core/entities/CostEstimate.js';
import { ValidationError } from '../../core/errors.js';

export const BYTES_PER_MB = 1024 * 1024;

/** Depth the service supports for public runs */
export const PUBLIC_MAX_DEPTH = 1;

export function estimateCost(input: CostEstimateInput): CostEstimate {
  const { fileSizeMb, depth, visibility } = input;

  if (!Number.isFinite(fileSizeMb) || fileSizeMb <= 0) {
    throw new ValidationError(
      `file_size_mb must be a positive number (got ${fileSizeMb}).`,
      'file_size_mb > 0'
    );
  }
  if (!Number.isInteger(depth) || depth <= 0) {
    throw new ValidationError(
      `depth_iterations must be a positive integer (got ${depth}).`,
      'depth >= 1'
    );
  }

  const credits = visibility === 'public' ? 0 : Math.max(1, Math.ceil(fileSizeMb * depth));

  return { fileSizeMb, depth, visibility, credits };
}

/**
 * Deepest search the service accepts for a dataset with this many columns
 */
export function maxDepthForColumns(numColumns: number): number {
  return numColumns - 2;
}

export function bytesToMb(sizeBytes: number): number {
  return sizeBytes / BYTES_PER_MB;
}
