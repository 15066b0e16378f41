/**
 * Main entry point: runs the configured job file and reports results
 */

import { AnalysisService } from './service';
import { getConfig, validateDataSource } from './config/environment';
import { loadJobs } from './config/jobs';
import { logger } from './services/utils/Logger';
import { describeSummary } from './services/analysis/SummaryBuilder';
import sqlite from './database/sqlite';

async function main(): Promise<void> {
  const config = getConfig();
  validateDataSource(config);

  await sqlite.initialize(config.DATABASE_PATH);

  const service = new AnalysisService({ config, persist: true });
  const jobs = loadJobs(config.JOBS_FILE);

  if (config.SERVE_API) {
    await service.startApi();
  }

  // Cancellation takes effect between chunks
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current chunk');
    controller.abort();
  });

  const outcomes = await service.runJobs(jobs, controller.signal);

  for (const outcome of outcomes) {
    if (outcome.ok) {
      for (const line of describeSummary(outcome.result.summary, outcome.result.pool, service.chain.baseSymbol)) {
        logger.info(line);
      }
    } else {
      logger.error(`Job ${outcome.job.label ?? outcome.job.pool} failed: ${outcome.error}`, {
        code: outcome.code,
      });
    }
  }

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  logger.info(`Finished ${outcomes.length} job(s), ${failed} failed`);

  if (!config.SERVE_API) {
    await service.stop();
    sqlite.close();
  }
}

main().catch((error: unknown) => {
  logger.error(`Analysis failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
