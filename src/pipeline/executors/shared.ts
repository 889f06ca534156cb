/**
 * Context and helpers shared by the ecosystem executors
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ScannerSettings, ServerSettings } from '../../config/schema.js';
import type { MetadataUpdater } from '../../registrar/registrar.js';
import type { RepositoryJob } from '../../types/job.js';
import type { CommandSpec } from '../command-runner.js';
import { existingReport } from '../coverage.js';
import type { PhaseContext } from '../phase.js';
import { baseProperties, toDefineArgs, type ScannerProperties } from '../scanner-args.js';

export interface ExecutorContext extends PhaseContext {
  job: RepositoryJob;
  /** Directory every command runs in */
  scanPath: string;
  server: ServerSettings;
  scanner: ScannerSettings;
  registrar: MetadataUpdater;
}

/**
 * Command spec running in the job's scan path with the configured timeout
 */
export function commandIn(ctx: ExecutorContext, command: string, args: string[]): CommandSpec {
  return {
    command,
    args,
    cwd: ctx.scanPath,
    timeoutMs: ctx.scanner.command_timeout_ms,
  };
}

/**
 * Scanner CLI invocation with the job's base properties plus extras
 */
export function scannerCommand(ctx: ExecutorContext, extra: ScannerProperties): CommandSpec {
  const props = { ...baseProperties(ctx.job, ctx.server, ctx.scanner), ...extra };
  return commandIn(ctx, ctx.scanner.binary, toDefineArgs(props));
}

/**
 * Add a coverage property when the report exists; warn otherwise
 *
 * @param props - Properties to extend in place
 * @param property - Scanner property naming the report
 * @param reportPath - Report location relative to the scan path
 */
export async function attachCoverageIfPresent(
  ctx: ExecutorContext,
  props: ScannerProperties,
  property: string,
  reportPath: string
): Promise<boolean> {
  const found = await existingReport(ctx.scanPath, reportPath);
  if (!found) {
    ctx.logger.warn('coverage', `No coverage report at ${reportPath}; scanning without coverage`);
    return false;
  }
  props[property] = found;
  ctx.logger.info('coverage', `Attaching coverage report ${found}`);
  return true;
}

/**
 * Delete a report left behind by an earlier run, so only a report written
 * by this run's test phase can be attached
 */
export async function removeStaleReport(ctx: ExecutorContext, reportPath: string): Promise<void> {
  await fs.rm(path.join(ctx.scanPath, reportPath), { force: true });
}
