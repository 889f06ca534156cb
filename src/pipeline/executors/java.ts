/**
 * Java executor (Maven or Gradle)
 *
 * Build and test are fatal: analysis needs compiled classes, so a failed
 * build aborts the job before the scanner is launched.
 */

import path from 'node:path';
import { pathExists } from '../../scanner/walk.js';
import type { JavaBuildTool } from '../../types/classification.js';
import { findJacocoReports } from '../coverage.js';
import { runPhase } from '../phase.js';
import { baseProperties, joinList, toDefineArgs, type ScannerProperties } from '../scanner-args.js';
import { commandIn, scannerCommand, type ExecutorContext } from './shared.js';

const MAVEN_BUILD_GOALS = [
  '-B',
  'clean',
  'org.jacoco:jacoco-maven-plugin:prepare-agent',
  'verify',
  'org.jacoco:jacoco-maven-plugin:report',
];

/**
 * Prefer the repository's wrapper script over a global install
 */
async function resolveBuildBinary(scanPath: string, wrapper: string, fallback: string): Promise<string> {
  return (await pathExists(path.join(scanPath, wrapper))) ? `./${wrapper}` : fallback;
}

/**
 * Coverage properties for whatever JaCoCo reports the build produced
 */
async function coverageProperties(ctx: ExecutorContext): Promise<ScannerProperties> {
  const reports = await findJacocoReports(ctx.scanPath);
  if (reports.length === 0) {
    ctx.logger.warn('coverage', 'No JaCoCo report found after build; scanning without coverage');
    return {};
  }
  ctx.logger.info('coverage', `Attaching ${reports.length} JaCoCo report(s)`);
  return { 'sonar.coverage.jacoco.xmlReportPaths': joinList(reports) };
}

async function runMaven(ctx: ExecutorContext): Promise<void> {
  const mvn = await resolveBuildBinary(ctx.scanPath, 'mvnw', 'mvn');

  await runPhase(ctx, {
    stage: 'build',
    policy: 'fatal',
    description: 'Maven build and test',
    command: commandIn(ctx, mvn, MAVEN_BUILD_GOALS),
  });

  const props = {
    ...baseProperties(ctx.job, ctx.server, ctx.scanner),
    ...(await coverageProperties(ctx)),
  };

  await runPhase(ctx, {
    stage: 'scan',
    policy: 'fatal',
    description: 'Maven scan',
    command: commandIn(ctx, mvn, ['-B', 'sonar:sonar', ...toDefineArgs(props)]),
  });
}

async function runGradle(ctx: ExecutorContext): Promise<void> {
  const gradle = await resolveBuildBinary(ctx.scanPath, 'gradlew', 'gradle');

  await runPhase(ctx, {
    stage: 'build',
    policy: 'fatal',
    description: 'Gradle build and test',
    command: commandIn(ctx, gradle, ['clean', 'build', '--no-daemon']),
  });

  await runPhase(ctx, {
    stage: 'scan',
    policy: 'fatal',
    description: 'Gradle project scan',
    command: scannerCommand(ctx, {
      'sonar.sources': '.',
      'sonar.java.binaries': '**/build/classes',
      ...(await coverageProperties(ctx)),
    }),
  });
}

/**
 * Run the Java pipeline
 *
 * @throws PhaseError when build, test or scan fails
 */
export async function runJavaScan(ctx: ExecutorContext, buildTool: JavaBuildTool): Promise<void> {
  switch (buildTool) {
    case 'maven':
      return runMaven(ctx);
    case 'gradle':
      return runGradle(ctx);
  }
}
