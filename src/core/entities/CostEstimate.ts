import type { Visibility } from './Job.js';

export interface CostEstimateInput {
  fileSizeMb: number;
  depth: number;
  visibility: Visibility;
}

export interface CostEstimate extends CostEstimateInput {
  credits: number;
}
