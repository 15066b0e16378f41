/**
 * Runs analysis jobs with bounded concurrency over shared caches
 */

import EventEmitter from 'events';
import { logger, logServiceError } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';
import { AnalysisCancelledError, isAnalysisError } from '../utils/AnalysisErrors';
import { SwapAnalyzer } from './SwapAnalyzer';
import { AnalysisJob, BlockRange, resolveBlockRange } from '../../config/jobs';
import { thresholdsFromConfig } from '../../config/thresholds';
import { BlockSource } from '../../types/transport.types';
import { AnalysisResult } from '../../types/analysis.types';

export interface BatchRunnerOptions {
  concurrency: number;
  defaultWindow: number;
  baseThreshold: string;
  refThresholdUsd: string; // Jobs may override
}

export type BatchOutcome =
  | { job: AnalysisJob; ok: true; range: BlockRange; result: AnalysisResult }
  | { job: AnalysisJob; ok: false; error: string; code: string };

/**
 * Emits 'jobComplete' (BatchOutcome) as each job settles
 */
export class BatchRunner extends EventEmitter {
  private latestBlock: Promise<number> | null = null;

  constructor(
    private createAnalyzer: () => SwapAnalyzer,
    private blocks: BlockSource,
    private options: BatchRunnerOptions
  ) {
    super();
  }

  /**
   * Outcomes are returned in job order; a failing job does not stop the batch
   */
  async run(jobs: AnalysisJob[], signal?: AbortSignal): Promise<BatchOutcome[]> {
    const outcomes: BatchOutcome[] = new Array(jobs.length);
    const workers = Math.max(1, Math.min(this.options.concurrency, jobs.length));
    let next = 0;

    logger.info(`Running ${jobs.length} analysis job(s) with concurrency ${workers}`);

    const worker = async (): Promise<void> => {
      const analyzer = this.createAnalyzer();

      while (next < jobs.length) {
        const index = next++;
        const job = jobs[index];

        const outcome = signal?.aborted
          ? this.failed(job, new AnalysisCancelledError(null))
          : await this.runJob(analyzer, job, signal);

        outcomes[index] = outcome;
        this.emit('jobComplete', outcome);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    this.latestBlock = null;
    return outcomes;
  }

  private async runJob(
    analyzer: SwapAnalyzer,
    job: AnalysisJob,
    signal?: AbortSignal
  ): Promise<BatchOutcome> {
    try {
      const needsLatest = job.startBlock === undefined || job.endBlock === undefined;
      const latest = needsLatest ? await this.getLatestBlock() : 0;
      const range = resolveBlockRange(job, latest, this.options.defaultWindow);

      const thresholds = thresholdsFromConfig(
        {
          BIG_BUY_BASE_THRESHOLD: this.options.baseThreshold,
          BIG_BUY_REF_THRESHOLD_USD: this.options.refThresholdUsd,
        },
        job.refThresholdUsd
      );

      const result = await analyzer.analyze({
        token: job.token,
        pool: job.pool,
        version: job.version,
        startBlock: range.startBlock,
        endBlock: range.endBlock,
        thresholds,
        signal,
      });

      return { job, ok: true, range, result };
    } catch (error) {
      logServiceError('BatchRunner', error, { pool: job.pool, token: job.token });
      return this.failed(job, error);
    }
  }

  private failed(job: AnalysisJob, error: unknown): BatchOutcome {
    return {
      job,
      ok: false,
      error: parseErrorMessage(error),
      code: isAnalysisError(error) ? error.code : 'UNEXPECTED',
    };
  }

  /**
   * Fetched once per batch
   */
  private getLatestBlock(): Promise<number> {
    if (!this.latestBlock) {
      this.latestBlock = this.blocks.getLatestBlock().catch((error: unknown) => {
        this.latestBlock = null;
        throw error;
      });
    }
    return this.latestBlock;
  }
}

export default BatchRunner;
