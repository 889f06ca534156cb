/**
 * Per-job pipeline
 *
 * register → sync → override commands → classify → detect → build/test/scan.
 * Steps run strictly in order; the terminal outcome is recorded by the runner.
 */

import type { ExtraCommandOverride, ScannerSettings, ServerSettings } from '../config/schema.js';
import type { CommandRunner } from '../pipeline/command-runner.js';
import { buildScanPlan, executeScanPlan } from '../pipeline/dispatch.js';
import { runPhase, type PhaseContext } from '../pipeline/phase.js';
import type { ProjectRegistrar } from '../registrar/registrar.js';
import { classifyTree } from '../scanner/classifier.js';
import type { RepositorySync } from '../source/git.js';
import type { RepositoryJob, ScanOutcome } from '../types/job.js';
import { resolveScanPath } from './job.js';
import type { JobLogger } from './job-logger.js';
import type { StatsAggregator } from './stats.js';

export interface PipelineSettings {
  server: ServerSettings;
  scanner: ScannerSettings;
  /** Branch each working copy is brought to */
  branch: string;
  overrides: Record<string, ExtraCommandOverride>;
}

export interface JobContext {
  registrar: ProjectRegistrar;
  stats: StatsAggregator;
  sync: RepositorySync;
  run: CommandRunner;
  settings: PipelineSettings;
  logger: JobLogger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

async function runOverrideCommands(
  phaseCtx: PhaseContext,
  commands: readonly string[],
  scanPath: string,
  timeoutMs: number
): Promise<void> {
  for (const command of commands) {
    await runPhase(phaseCtx, {
      stage: 'override',
      policy: 'tolerated',
      description: 'Override command',
      command: { command, shell: true, cwd: scanPath, timeoutMs },
    });
  }
}

/**
 * Run one job end to end
 *
 * @returns Terminal outcome when the job did not fail
 * @throws Any error that makes the job fail (logged here, counted by the runner)
 */
export async function processJob(
  job: RepositoryJob,
  ctx: JobContext
): Promise<Exclude<ScanOutcome, 'failed'>> {
  const { logger, settings } = ctx;
  logger.info('job', `Processing ${job.name} (${job.prefix})`);

  try {
    const registration = await ctx.registrar.ensureProject(job.projectKey, job.displayName, logger);
    ctx.stats.recordRegistration(registration);

    const synced = await ctx.sync(
      { repoUrl: job.repoUrl, checkoutPath: job.checkoutPath, branch: settings.branch },
      logger
    );
    if (synced.action !== 'skipped') {
      await ctx.registrar.syncDefaultBranch(job.projectKey, synced.branch ?? settings.branch, logger);
    }

    const override = settings.overrides[job.name];
    const { scanPath, warning } = await resolveScanPath(job.checkoutPath, override);
    if (warning) {
      logger.warn('override', warning);
    }
    const scopedJob: RepositoryJob = { ...job, scanPath };

    const phaseCtx: PhaseContext = { run: ctx.run, logger, secrets: [settings.server.token] };
    if (override && override.commands.length > 0) {
      logger.info('override', `Running ${override.commands.length} override command(s) in ${scanPath}`);
      await runOverrideCommands(phaseCtx, override.commands, scanPath, settings.scanner.command_timeout_ms);
    }

    const classification = await classifyTree(scanPath);
    logger.info(
      'classify',
      classification.tags.length > 0
        ? `Category: ${classification.category} (${classification.tags.join(', ')})`
        : `Category: ${classification.category}`
    );

    const plan = await buildScanPlan(classification, scanPath);
    return await executeScanPlan(plan, {
      ...phaseCtx,
      job: scopedJob,
      scanPath,
      server: settings.server,
      scanner: settings.scanner,
      registrar: ctx.registrar,
    });
  } catch (error) {
    logger.error('job', `Failed processing ${job.name}: ${errorMessage(error)}`);
    throw error;
  }
}
