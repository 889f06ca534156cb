/**
 * Scanner property helpers
 * Builds the analysis properties shared by every executor and renders
 * them for the scanner CLI, Maven/Gradle and the .NET scanner
 */

import type { ServerSettings, ScannerSettings } from '../config/schema.js';
import type { RepositoryJob } from '../types/job.js';

export type ScannerProperties = Record<string, string>;

/**
 * Identity and server properties for a job
 */
export function baseProperties(
  job: RepositoryJob,
  server: ServerSettings,
  scanner: Pick<ScannerSettings, 'token_property'>
): ScannerProperties {
  return {
    'sonar.projectKey': job.projectKey,
    'sonar.projectName': job.displayName,
    'sonar.host.url': server.host,
    [scanner.token_property]: server.token,
  };
}

/**
 * Render as `-Dkey=value` arguments (scanner CLI, Maven, Gradle)
 */
export function toDefineArgs(props: ScannerProperties): string[] {
  return Object.entries(props).map(([key, value]) => `-D${key}=${value}`);
}

/**
 * Render as .NET scanner `begin` arguments. Key and name use the dedicated
 * /k: and /n: switches.
 */
export function toDotnetBeginArgs(props: ScannerProperties): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(props)) {
    if (key === 'sonar.projectKey') {
      args.push(`/k:${value}`);
    } else if (key === 'sonar.projectName') {
      args.push(`/n:${value}`);
    } else {
      args.push(`/d:${key}=${value}`);
    }
  }
  return args;
}

/**
 * Join glob or path lists the way scanner properties expect them
 */
export function joinList(values: readonly string[]): string {
  return values.join(',');
}
