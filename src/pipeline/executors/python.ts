/**
 * Python executor
 * Test failures are tolerated; coverage is attached only if the report exists.
 */

import path from 'node:path';
import { pathExists } from '../../scanner/walk.js';
import { runPhase } from '../phase.js';
import type { ScannerProperties } from '../scanner-args.js';
import {
  attachCoverageIfPresent,
  commandIn,
  removeStaleReport,
  scannerCommand,
  type ExecutorContext,
} from './shared.js';

export const PYTHON_COVERAGE_REPORT = 'coverage.xml';

export async function runPythonScan(ctx: ExecutorContext): Promise<void> {
  if (await pathExists(path.join(ctx.scanPath, 'requirements.txt'))) {
    await runPhase(ctx, {
      stage: 'build',
      policy: 'tolerated',
      description: 'Install requirements',
      command: commandIn(ctx, 'python3', ['-m', 'pip', 'install', '-r', 'requirements.txt']),
    });
  }

  await removeStaleReport(ctx, PYTHON_COVERAGE_REPORT);
  await runPhase(ctx, {
    stage: 'test',
    policy: 'tolerated',
    description: 'pytest with coverage',
    command: commandIn(ctx, 'python3', [
      '-m',
      'pytest',
      '--cov=.',
      `--cov-report=xml:${PYTHON_COVERAGE_REPORT}`,
    ]),
  });

  const props: ScannerProperties = { 'sonar.sources': '.' };
  await attachCoverageIfPresent(ctx, props, 'sonar.python.coverage.reportPaths', PYTHON_COVERAGE_REPORT);

  await runPhase(ctx, {
    stage: 'scan',
    policy: 'fatal',
    description: 'Python scan',
    command: scannerCommand(ctx, props),
  });
}
