/**
 * Go executor
 * Same tolerance as Python: build and test failures are logged, the scan
 * still runs.
 */

import { runPhase } from '../phase.js';
import type { ScannerProperties } from '../scanner-args.js';
import {
  attachCoverageIfPresent,
  commandIn,
  removeStaleReport,
  scannerCommand,
  type ExecutorContext,
} from './shared.js';

export const GO_COVERAGE_REPORT = 'coverage.out';

export async function runGoScan(ctx: ExecutorContext): Promise<void> {
  await runPhase(ctx, {
    stage: 'build',
    policy: 'tolerated',
    description: 'go build',
    command: commandIn(ctx, 'go', ['build', './...']),
  });

  await removeStaleReport(ctx, GO_COVERAGE_REPORT);
  await runPhase(ctx, {
    stage: 'test',
    policy: 'tolerated',
    description: 'go test with coverage',
    command: commandIn(ctx, 'go', ['test', './...', `-coverprofile=${GO_COVERAGE_REPORT}`]),
  });

  const props: ScannerProperties = {
    'sonar.sources': '.',
    'sonar.exclusions': '**/*_test.go,**/vendor/**',
    'sonar.tests': '.',
    'sonar.test.inclusions': '**/*_test.go',
  };
  await attachCoverageIfPresent(ctx, props, 'sonar.go.coverage.reportPaths', GO_COVERAGE_REPORT);

  await runPhase(ctx, {
    stage: 'scan',
    policy: 'fatal',
    description: 'Go scan',
    command: scannerCommand(ctx, props),
  });
}
