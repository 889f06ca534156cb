/**
 * Phase policy
 *
 * Every build/test/scan step of an executor runs through runPhase, which
 * applies the step's declared policy to its result:
 * - fatal: failure aborts the pipeline (PhaseError)
 * - tolerated: failure is logged as a warning and the pipeline continues
 * - fallback: failure asks the caller to downgrade (FallbackRequiredError)
 */

import {
  formatCommand,
  maskSecrets,
  type CommandResult,
  type CommandRunner,
  type CommandSpec,
} from './command-runner.js';
import type { JobLogger, JobStage } from '../jobs/job-logger.js';

export type PhasePolicy = 'fatal' | 'tolerated' | 'fallback';

export interface PhaseSpec {
  stage: JobStage;
  policy: PhasePolicy;
  description: string;
  command: CommandSpec;
}

export type PhaseResult =
  | { ok: true; result: CommandResult }
  | { ok: false; result: CommandResult };

export interface PhaseContext {
  run: CommandRunner;
  logger: JobLogger;
  /** Values masked wherever a command line or its output is logged */
  secrets: readonly string[];
}

/**
 * A phase failed under the fatal or fallback policy
 */
export class PhaseError extends Error {
  constructor(
    message: string,
    readonly stage: JobStage,
    readonly policy: PhasePolicy,
    readonly result: CommandResult
  ) {
    super(message);
    this.name = 'PhaseError';
  }
}

/**
 * A fallback-policy phase failed; the caller should downgrade
 */
export class FallbackRequiredError extends PhaseError {
  constructor(message: string, stage: JobStage, result: CommandResult) {
    super(message, stage, 'fallback', result);
    this.name = 'FallbackRequiredError';
  }
}

/**
 * Short description of why a command failed
 */
export function describeFailure(result: CommandResult): string {
  if (result.timedOut) return 'timed out';
  return `exit code ${result.exitCode}`;
}

function lastLines(text: string, count: number): string {
  return text.trimEnd().split('\n').slice(-count).join('\n');
}

/**
 * Run one phase and apply its policy
 *
 * @param ctx - Runner, logger and secrets for the job
 * @param spec - Phase definition
 * @throws PhaseError for a failed fatal phase
 * @throws FallbackRequiredError for a failed fallback phase
 */
export async function runPhase(ctx: PhaseContext, spec: PhaseSpec): Promise<PhaseResult> {
  const { logger } = ctx;
  logger.info(spec.stage, `${spec.description}: ${maskSecrets(formatCommand(spec.command), ctx.secrets)}`);

  const result = await ctx.run(spec.command);

  if (result.status === 'pass') {
    logger.debug(spec.stage, `${spec.description} finished in ${result.durationMs}ms`);
    return { ok: true, result };
  }

  const reason = `${spec.description} failed (${describeFailure(result)})`;
  if (result.stderrTail) {
    logger.debug(spec.stage, maskSecrets(lastLines(result.stderrTail, 20), ctx.secrets));
  }

  switch (spec.policy) {
    case 'tolerated':
      logger.warn(spec.stage, `${reason}, continuing`);
      return { ok: false, result };
    case 'fallback':
      logger.warn(spec.stage, reason);
      throw new FallbackRequiredError(reason, spec.stage, result);
    case 'fatal':
      logger.error(spec.stage, reason);
      throw new PhaseError(reason, spec.stage, 'fatal', result);
  }
}
