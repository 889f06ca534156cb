/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { createClassifyCommand, createScanCommand } from './commands/index.js';
import { printError } from './output.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../../package.json');
export const VERSION: string =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('scanfleet')
    .description('Bulk-onboard source repositories into a static-analysis server')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createScanCommand(), { isDefault: true });
  program.addCommand(createClassifyCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
