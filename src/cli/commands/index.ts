/**
 * CLI commands index
 * Exports all command creators
 */

export { createScanCommand } from './scan.js';
export { createClassifyCommand } from './classify.js';
