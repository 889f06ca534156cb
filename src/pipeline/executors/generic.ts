/**
 * Generic executor: scan only, no build or test phase. Serves code
 * repositories without a recognised build, config repositories and
 * performance-test repositories, with inclusions tuned to each.
 */

import { CONFIG_INCLUSIONS, PERFORMANCE_TEST_INCLUSIONS } from '../../scanner/extensions.js';
import { CONFIG_ONLY_SUFFIX } from '../../registrar/registrar.js';
import type { ConfigTag } from '../../types/classification.js';
import { runPhase } from '../phase.js';
import { joinList, type ScannerProperties } from '../scanner-args.js';
import { scannerCommand, type ExecutorContext } from './shared.js';

export type GenericScanMode =
  | { kind: 'sources' }
  | { kind: 'config'; tags: readonly ConfigTag[] }
  | { kind: 'performance-test' };

export const PERFORMANCE_TEST_DESCRIPTION = 'Performance test plans; configuration-only analysis';

/**
 * Scanner properties for a generic scan
 */
export function genericScanProperties(mode: GenericScanMode): ScannerProperties {
  const props: ScannerProperties = { 'sonar.sources': '.' };

  switch (mode.kind) {
    case 'sources':
      break;
    case 'config':
      props['sonar.inclusions'] = joinList(mode.tags.flatMap((tag) => CONFIG_INCLUSIONS[tag]));
      break;
    case 'performance-test':
      props['sonar.inclusions'] = joinList(PERFORMANCE_TEST_INCLUSIONS);
      break;
  }

  return props;
}

/**
 * Run a scan-only pipeline
 *
 * @throws PhaseError when the scanner fails
 */
export async function runGenericScan(ctx: ExecutorContext, mode: GenericScanMode): Promise<void> {
  const props = genericScanProperties(mode);

  if (mode.kind === 'performance-test') {
    const name = `${ctx.job.displayName}${CONFIG_ONLY_SUFFIX}`;
    await ctx.registrar.updateMetadata(ctx.job.projectKey, name, PERFORMANCE_TEST_DESCRIPTION, ctx.logger);
    // The analysis would otherwise reset the name to the plain display name
    props['sonar.projectName'] = name;
    props['sonar.projectDescription'] = PERFORMANCE_TEST_DESCRIPTION;
  }

  await runPhase(ctx, {
    stage: 'scan',
    policy: 'fatal',
    description: mode.kind === 'sources' ? 'Sources-only scan' : `Scan (${mode.kind})`,
    command: scannerCommand(ctx, props),
  });
}
