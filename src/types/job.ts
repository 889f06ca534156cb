/**
 * Job-related type definitions
 * One RepositoryJob per repository; outcomes feed the run statistics
 */

import { z } from 'zod';

/**
 * Where a job was enumerated from
 */
export type JobSource = 'remote' | 'local';

/**
 * One repository's unit of work. Immutable once created.
 */
export interface RepositoryJob {
  readonly prefix: string;
  readonly name: string;
  /** Analysis-server identity: `${prefix}_${name}` */
  readonly projectKey: string;
  /** Display name on the analysis server: `${prefix}-${name}` */
  readonly displayName: string;
  readonly checkoutPath: string;
  /** Set when an override redirects scanning into a subdirectory */
  readonly scanPath?: string;
  /** Clone URL; absent for local-directory jobs */
  readonly repoUrl?: string;
  readonly source: JobSource;
}

/**
 * Terminal outcome of a job. Every job ends in exactly one of these.
 */
export const ScanOutcomeSchema = z.enum(['scanned', 'config-only', 'empty', 'failed']);
export type ScanOutcome = z.infer<typeof ScanOutcomeSchema>;

/**
 * Registrar branch taken for a job
 */
export type RegistrationOutcome = 'created' | 'exists';

/**
 * Per-job report collected by the runner
 */
export interface JobReport {
  job: RepositoryJob;
  outcome: ScanOutcome;
  error?: string;
  durationMs: number;
}
