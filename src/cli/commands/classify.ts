/**
 * Classify command
 * Shows how a directory would be categorised and which executor it gets,
 * without contacting the server or running any tool
 */

import { Command } from 'commander';
import path from 'node:path';
import { classifyTree } from '../../scanner/classifier.js';
import { isDirectory } from '../../scanner/walk.js';
import { buildScanPlan } from '../../pipeline/dispatch.js';
import { describeEcosystem, type ScanPlan } from '../../types/classification.js';
import { printHeader, printKeyValue, printError } from '../output.js';

/**
 * Executor label for a scan plan
 */
export function describePlan(plan: ScanPlan): string {
  switch (plan.category) {
    case 'code':
      return describeEcosystem(plan.ecosystem);
    case 'config':
      return 'configuration-only scan';
    case 'performance-test':
      return 'performance-test scan';
    case 'empty':
      return 'none (skipped)';
  }
}

export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Classify a repository directory and show the selected executor')
    .argument('<dir>', 'Repository directory')
    .action(async (dir: string) => {
      const root = path.resolve(dir);
      if (!(await isDirectory(root))) {
        printError(`Not a directory: ${root}`);
        process.exit(1);
      }

      const classification = await classifyTree(root);
      const plan = await buildScanPlan(classification, root);

      printHeader(`Classification: ${path.basename(root)}`);
      printKeyValue('Category', classification.category);
      printKeyValue('Tags', classification.tags.length > 0 ? classification.tags.join(', ') : '-');
      printKeyValue('Executor', describePlan(plan));
    });
}
