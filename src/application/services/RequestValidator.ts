import { promises as fs } from 'fs';
import path from 'path';
import type { AnalysisRequest, Visibility } from '../../core/entities/Job.js';
import type { DatasetColumn, DatasetFile } from '../../core/interfaces/IDiscoveryClient.js';
import { ValidationError } from '../../core/errors.js';
import { bytesToMb, maxDepthForColumns, PUBLIC_MAX_DEPTH } from './CostEstimator.js';

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.arff',
  '.csv',
  '.feather',
  '.json',
  '.parquet',
  '.tsv',
  '.xls',
  '.xlsx',
];

export const MAX_FILE_SIZE_BYTES = 1024 * 1024 * 1024; // 1 GB

const VISIBILITIES: readonly Visibility[] = ['public', 'private'];

/**
 * Check depth against its own bounds and, when the column count is known, against `numColumns - 2`
 */
export function validateDepth(depth: number, numColumns?: number): void {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new ValidationError(
      `depth_iterations must be a positive integer (got ${depth}).`,
      'depth >= 1'
    );
  }

  if (numColumns === undefined) return;

  if (!Number.isInteger(numColumns) || numColumns < 1) {
    throw new ValidationError(
      `num_columns must be a positive integer (got ${numColumns}).`,
      'num_columns >= 1'
    );
  }

  const maxDepth = maxDepthForColumns(numColumns);
  if (maxDepth < 1) {
    throw new ValidationError(
      `The dataset needs at least 3 columns to be analyzed (got ${numColumns}).`,
      'num_columns >= 3'
    );
  }
  if (depth > maxDepth) {
    throw new ValidationError(
      `depth_iterations ${depth} exceeds the maximum of ${maxDepth} for a dataset with ${numColumns} columns (num_columns - 2).`,
      'depth <= num_columns - 2'
    );
  }
}

/**
 * Validate the request shape. Does not touch the filesystem.
 */
export function validateAnalysisRequest(request: AnalysisRequest): void {
  if (request.targetColumn.trim().length === 0) {
    throw new ValidationError('target_column must not be empty.', 'target_column non-empty');
  }

  if (!VISIBILITIES.includes(request.visibility)) {
    throw new ValidationError(
      `Invalid visibility '${request.visibility}'. Must be 'public' or 'private'.`,
      'visibility in {public, private}'
    );
  }

  validateDepth(request.depth, request.numColumns);

  if (request.visibility === 'public' && request.depth > PUBLIC_MAX_DEPTH) {
    throw new ValidationError(
      `Public runs are limited to depth ${PUBLIC_MAX_DEPTH}. Use visibility 'private' for deeper searches.`,
      'public implies depth == 1'
    );
  }

  if (request.idempotencyToken !== undefined && request.idempotencyToken.trim().length === 0) {
    throw new ValidationError('idempotency_token must not be empty when given.', 'idempotency_token non-empty');
  }
}

/**
 * Resolve and check the dataset file before anything is sent.
 *
 * The size ceiling is checked before the extension so an oversized file is
 * rejected whatever format it claims.
 */
export async function inspectDataset(filePath: string): Promise<DatasetFile> {
  let resolvedPath: string;
  try {
    resolvedPath = await fs.realpath(filePath);
  } catch {
    throw new ValidationError(`File not found: ${filePath}`, 'file exists');
  }

  const stats = await fs.stat(resolvedPath);
  if (!stats.isFile()) {
    throw new ValidationError(`Not a file: ${filePath}`, 'regular file');
  }

  if (stats.size > MAX_FILE_SIZE_BYTES) {
    throw new ValidationError(
      `File too large (${bytesToMb(stats.size).toFixed(1)} MB). Maximum: ${bytesToMb(MAX_FILE_SIZE_BYTES).toFixed(0)} MB.`,
      'file size <= 1 GB'
    );
  }

  if (stats.size === 0) {
    throw new ValidationError('File is empty.', 'file size > 0');
  }

  const extension = path.extname(resolvedPath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new ValidationError(
      `Unsupported file type '${extension}'. Allowed: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      'supported file extension'
    );
  }

  return {
    resolvedPath,
    fileName: path.basename(resolvedPath),
    extension,
    sizeBytes: stats.size,
    modifiedAtMs: stats.mtimeMs,
  };
}

/**
 * Check the request against the columns the service detected on upload,
 * before the billed run is created
 */
export function validateAgainstColumns(request: AnalysisRequest, columns: DatasetColumn[]): void {
  if (columns.length === 0) return;

  validateDepth(request.depth, columns.length);

  const names = columns.flatMap((column) => (column.name === null ? [] : [column.name]));
  if (names.length === columns.length && !names.includes(request.targetColumn)) {
    throw new ValidationError(
      `Target column '${request.targetColumn}' is not in the dataset. Columns: ${names.join(', ')}`,
      'target_column in dataset'
    );
  }
}
