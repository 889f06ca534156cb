#!/usr/bin/env node
/**
 * scanfleet CLI
 * Bulk-onboards repositories into a static-analysis server
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
