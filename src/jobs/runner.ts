/**
 * Concurrent job runner
 *
 * Runs every job exactly once with at most `workers` in flight. A job's
 * failure is counted and reported, never propagated to its siblings, and
 * the returned promise settles only after every job has finished.
 */

import type { JobReport, RepositoryJob, ScanOutcome } from '../types/job.js';
import type { StatsAggregator, StatsSnapshot } from './stats.js';

export type JobHandler = (job: RepositoryJob) => Promise<ScanOutcome>;

export interface RunJobsOptions {
  workers: number;
  stats: StatsAggregator;
  /** Called once per worker; each worker owns what its handler builds */
  createHandler: (workerId: number) => JobHandler;
}

export interface RunJobsResult {
  /** In submission order */
  reports: JobReport[];
  stats: StatsSnapshot;
}

export async function runJobs(jobs: readonly RepositoryJob[], options: RunJobsOptions): Promise<RunJobsResult> {
  const { stats } = options;
  const reports: JobReport[] = [];

  async function execute(handler: JobHandler, index: number): Promise<void> {
    const job = jobs[index];
    if (!job) return;
    const started = Date.now();

    try {
      const outcome = await handler(job);
      stats.recordOutcome(outcome);
      reports[index] = { job, outcome, durationMs: Date.now() - started };
    } catch (error) {
      stats.recordOutcome('failed');
      reports[index] = {
        job,
        outcome: 'failed',
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - started,
      };
    }
  }

  if (options.workers <= 1 || jobs.length <= 1) {
    const handler = options.createHandler(0);
    for (let index = 0; index < jobs.length; index++) {
      await execute(handler, index);
    }
    return { reports, stats: stats.snapshot() };
  }

  const poolSize = Math.min(options.workers, jobs.length);
  const handlers = Array.from({ length: poolSize }, (_, workerId) => options.createHandler(workerId));
  let next = 0;

  async function work(handler: JobHandler): Promise<void> {
    while (next < jobs.length) {
      const index = next;
      next += 1;
      await execute(handler, index);
    }
  }

  await Promise.all(handlers.map((handler) => work(handler)));
  return { reports, stats: stats.snapshot() };
}
