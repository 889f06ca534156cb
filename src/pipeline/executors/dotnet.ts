/**
 * .NET executor
 *
 * begin → restore → build → test → end. Restore, build and test are
 * tolerated so a broken build still yields an analysis; if anything
 * throws before `end` is reached the job falls back to a sources-only scan.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { runPhase } from '../phase.js';
import { baseProperties, toDotnetBeginArgs } from '../scanner-args.js';
import { runGenericScan } from './generic.js';
import { commandIn, type ExecutorContext } from './shared.js';

/** Throwaway project written when the repository has C# sources only */
export const GENERATED_PROJECT_FILE = 'scanfleet-autogen.csproj';

export const OPENCOVER_REPORT_GLOB = '**/coverage.opencover.xml';
export const TEST_RESULTS_GLOB = '**/*.trx';

export function generatedProjectXml(): string {
  return [
    '<Project Sdk="Microsoft.NET.Sdk">',
    '  <PropertyGroup>',
    '    <TargetFramework>net8.0</TargetFramework>',
    '    <OutputType>Library</OutputType>',
    '    <Nullable>enable</Nullable>',
    '    <EnableDefaultCompileItems>true</EnableDefaultCompileItems>',
    '  </PropertyGroup>',
    '</Project>',
    '',
  ].join('\n');
}

/**
 * Arguments for `dotnet sonarscanner begin`. Coverage and test-result globs
 * are always passed; the scanner ignores missing files.
 */
export function dotnetBeginArgs(ctx: ExecutorContext): string[] {
  return [
    'sonarscanner',
    'begin',
    ...toDotnetBeginArgs({
      ...baseProperties(ctx.job, ctx.server, ctx.scanner),
      'sonar.cs.opencover.reportsPaths': OPENCOVER_REPORT_GLOB,
      'sonar.cs.vstest.reportsPaths': TEST_RESULTS_GLOB,
    }),
  ];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the .NET pipeline
 *
 * @param projectFile - Solution or project file relative to the scan path, or null
 * @throws PhaseError when `end` or the fallback scan fails
 */
export async function runDotnetScan(ctx: ExecutorContext, projectFile: string | null): Promise<void> {
  let generatedPath: string | null = null;

  try {
    try {
      let target = projectFile;
      if (!target) {
        generatedPath = path.join(ctx.scanPath, GENERATED_PROJECT_FILE);
        await fs.writeFile(generatedPath, generatedProjectXml(), 'utf-8');
        target = GENERATED_PROJECT_FILE;
        ctx.logger.info('build', `No solution or project file; generated ${GENERATED_PROJECT_FILE}`);
      }

      await runPhase(ctx, {
        stage: 'scan',
        policy: 'fallback',
        description: '.NET scanner begin',
        command: commandIn(ctx, 'dotnet', dotnetBeginArgs(ctx)),
      });

      await runPhase(ctx, {
        stage: 'build',
        policy: 'tolerated',
        description: '.NET restore',
        command: commandIn(ctx, 'dotnet', ['restore', target]),
      });

      await runPhase(ctx, {
        stage: 'build',
        policy: 'tolerated',
        description: '.NET build',
        command: commandIn(ctx, 'dotnet', ['build', target, '--no-restore']),
      });

      await runPhase(ctx, {
        stage: 'test',
        policy: 'tolerated',
        description: '.NET test',
        command: commandIn(ctx, 'dotnet', [
          'test',
          target,
          '--no-build',
          '--logger',
          'trx',
          '--collect',
          'XPlat Code Coverage',
          '--',
          'DataCollectionRunSettings.DataCollectors.DataCollector.Configuration.Format=opencover',
        ]),
      });
    } catch (error) {
      ctx.logger.warn('fallback', `.NET pipeline aborted (${errorMessage(error)}); falling back to sources-only scan`);
      await runGenericScan(ctx, { kind: 'sources' });
      return;
    }

    await runPhase(ctx, {
      stage: 'scan',
      policy: 'fatal',
      description: '.NET scanner end',
      command: commandIn(ctx, 'dotnet', [
        'sonarscanner',
        'end',
        `/d:${ctx.scanner.token_property}=${ctx.server.token}`,
      ]),
    });
  } finally {
    if (generatedPath) {
      await fs.rm(generatedPath, { force: true });
    }
  }
}
