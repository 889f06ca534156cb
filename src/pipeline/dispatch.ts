/**
 * Scan dispatcher
 * Turns a classification into a scan plan and runs the matching executor
 */

import { detectEcosystem } from '../scanner/ecosystem.js';
import {
  assertNever,
  describeEcosystem,
  type Classification,
  type Ecosystem,
  type ScanPlan,
} from '../types/classification.js';
import type { ScanOutcome } from '../types/job.js';
import {
  runDotnetScan,
  runGenericScan,
  runGoScan,
  runJavaScan,
  runPythonScan,
  type ExecutorContext,
} from './executors/index.js';

/**
 * Build the scan plan. The ecosystem is only detected for code.
 *
 * @param classification - Result of classifyTree for scanPath
 * @param scanPath - Directory that was classified
 */
export async function buildScanPlan(classification: Classification, scanPath: string): Promise<ScanPlan> {
  switch (classification.category) {
    case 'code':
      return { category: 'code', ecosystem: await detectEcosystem(scanPath) };
    case 'config':
      return { category: 'config', tags: classification.tags };
    case 'performance-test':
      return { category: 'performance-test' };
    case 'empty':
      return { category: 'empty' };
    default:
      return assertNever(classification);
  }
}

async function runCodeScan(ecosystem: Ecosystem, ctx: ExecutorContext): Promise<void> {
  switch (ecosystem.kind) {
    case 'java':
      return runJavaScan(ctx, ecosystem.buildTool);
    case 'dotnet':
      return runDotnetScan(ctx, ecosystem.projectFile);
    case 'python':
      return runPythonScan(ctx);
    case 'go':
      return runGoScan(ctx);
    case 'generic':
      return runGenericScan(ctx, { kind: 'sources' });
    default:
      return assertNever(ecosystem);
  }
}

/**
 * Execute a scan plan
 *
 * @returns The job's terminal outcome when nothing failed
 * @throws PhaseError from a fatal phase
 */
export async function executeScanPlan(plan: ScanPlan, ctx: ExecutorContext): Promise<Exclude<ScanOutcome, 'failed'>> {
  switch (plan.category) {
    case 'code':
      ctx.logger.info('detect', `Detected ${describeEcosystem(plan.ecosystem)} project`);
      await runCodeScan(plan.ecosystem, ctx);
      ctx.logger.success('scan', `Scan completed for ${ctx.job.projectKey}`);
      return 'scanned';
    case 'config':
      ctx.logger.info('detect', `Configuration-only repository (${plan.tags.join(', ')})`);
      await runGenericScan(ctx, { kind: 'config', tags: plan.tags });
      ctx.logger.success('scan', `Configuration scan completed for ${ctx.job.projectKey}`);
      return 'config-only';
    case 'performance-test':
      ctx.logger.info('detect', 'Performance-test repository');
      await runGenericScan(ctx, { kind: 'performance-test' });
      ctx.logger.success('scan', `Performance-test scan completed for ${ctx.job.projectKey}`);
      return 'config-only';
    case 'empty':
      ctx.logger.warn('detect', 'No recognised files; skipping scan');
      return 'empty';
    default:
      return assertNever(plan);
  }
}
