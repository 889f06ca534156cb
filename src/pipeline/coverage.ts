/**
 * Coverage report lookup
 */

import path from 'node:path';
import { walkFiles, pathExists } from '../scanner/walk.js';

/** JaCoCo XML report names written by Maven and Gradle */
export const JACOCO_REPORT_NAMES = new Set(['jacoco.xml', 'jacocoTestReport.xml']);

/**
 * Find JaCoCo XML reports anywhere below rootDir (multi-module builds
 * write one per module)
 *
 * @returns Paths relative to rootDir, in walk order
 */
export async function findJacocoReports(rootDir: string): Promise<string[]> {
  const reports: string[] = [];
  for await (const file of walkFiles(rootDir)) {
    if (JACOCO_REPORT_NAMES.has(file.name)) {
      reports.push(file.relativePath.split(path.sep).join('/'));
    }
  }
  return reports;
}

/**
 * Return the report path if the file exists after the test step
 *
 * @param rootDir - Scan root
 * @param relativePath - Expected report location
 */
export async function existingReport(rootDir: string, relativePath: string): Promise<string | null> {
  return (await pathExists(path.join(rootDir, relativePath))) ? relativePath : null;
}
