/**
 * Batch job file loading and block range resolution
 */

import fs from 'fs';
import Joi from 'joi';
import { PoolVersion } from '../types/dex.types';
import { InvalidRangeError } from '../services/utils/AnalysisErrors';

const ADDRESS = /^0x[0-9a-fA-F]{40}$/;

export interface AnalysisJob {
  token: string;
  pool: string;
  version?: PoolVersion;
  startBlock?: number;
  endBlock?: number;
  blocks?: number; // Window ending at endBlock (or the latest block)
  refThresholdUsd?: string;
  label?: string;
}

export interface BlockRange {
  startBlock: number;
  endBlock: number;
}

const jobSchema = Joi.object<AnalysisJob>({
  token: Joi.string().pattern(ADDRESS).required(),
  pool: Joi.string().pattern(ADDRESS).required(),
  version: Joi.string().valid(PoolVersion.V2, PoolVersion.V3),
  startBlock: Joi.number().integer().min(0),
  endBlock: Joi.number().integer().min(0),
  blocks: Joi.number().integer().min(1),
  refThresholdUsd: Joi.string().pattern(/^\d+(\.\d+)?$/),
  label: Joi.string(),
});

const jobsSchema = Joi.array<AnalysisJob[]>().items(jobSchema).min(1).required();

/**
 * Validate parsed job definitions
 */
export function parseJobs(input: unknown): AnalysisJob[] {
  const { error, value } = jobsSchema.validate(input, { abortEarly: false });

  if (error) {
    const errorMessages = error.details.map((detail) => detail.message).join(', ');
    throw new Error(`Invalid job definitions: ${errorMessages}`);
  }

  return value;
}

export function loadJobs(filePath: string): AnalysisJob[] {
  const contents = fs.readFileSync(filePath, 'utf8');
  const parsed: unknown = JSON.parse(contents);
  return parseJobs(parsed);
}

/**
 * Explicit bounds win; otherwise the window ends at the latest block
 */
export function resolveBlockRange(
  job: Pick<AnalysisJob, 'startBlock' | 'endBlock' | 'blocks'>,
  latestBlock: number,
  defaultWindow: number
): BlockRange {
  const endBlock = job.endBlock ?? latestBlock;
  const window = job.blocks ?? defaultWindow;
  const startBlock = job.startBlock ?? Math.max(0, endBlock - window);

  if (startBlock > endBlock) {
    throw new InvalidRangeError(startBlock, endBlock);
  }

  return { startBlock, endBlock };
}
