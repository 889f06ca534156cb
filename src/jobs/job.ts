/**
 * Job enumeration
 * Builds RepositoryJobs from a repository list or from a local directory
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isDirectory } from '../scanner/walk.js';
import { repoNameFromUrl, toSshUrl } from '../source/git.js';
import type { ExtraCommandOverride } from '../config/schema.js';
import type { RepositoryJob } from '../types/job.js';

export interface EnumeratedJobs {
  jobs: RepositoryJob[];
  warnings: string[];
}

/**
 * Key and display name for a prefix/name pair
 */
export function projectIdentity(prefix: string, name: string): { projectKey: string; displayName: string } {
  return {
    projectKey: `${prefix}_${name}`,
    displayName: `${prefix}-${name}`,
  };
}

/**
 * Job for one repository-list entry
 *
 * @param prefix - Namespace for the project key
 * @param repoUrl - URL as written in the list
 * @param workspaceDir - Directory holding all checkouts
 */
export function createRemoteJob(prefix: string, repoUrl: string, workspaceDir: string): RepositoryJob {
  const sshUrl = toSshUrl(repoUrl);
  const name = repoNameFromUrl(sshUrl);
  return {
    prefix,
    name,
    ...projectIdentity(prefix, name),
    checkoutPath: path.resolve(workspaceDir, prefix, name),
    repoUrl: sshUrl,
    source: 'remote',
  };
}

/**
 * Parse `prefix,repository-url` lines
 *
 * Blank lines and `#` comments are skipped silently; lines without a
 * separator or with an empty field are skipped with a warning.
 */
export function parseRepoList(text: string, workspaceDir: string): EnumeratedJobs {
  const jobs: RepositoryJob[] = [];
  const warnings: string[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) return;

    const separator = line.indexOf(',');
    if (separator === -1) {
      warnings.push(`Line ${index + 1}: missing ',' separator, skipped: ${line}`);
      return;
    }

    const prefix = line.slice(0, separator).trim();
    const repoUrl = line.slice(separator + 1).trim();
    if (!prefix || !repoUrl) {
      warnings.push(`Line ${index + 1}: empty prefix or URL, skipped: ${line}`);
      return;
    }

    const job = createRemoteJob(prefix, repoUrl, workspaceDir);
    if (!job.name) {
      warnings.push(`Line ${index + 1}: cannot derive a repository name, skipped: ${line}`);
      return;
    }
    jobs.push(job);
  });

  return { jobs, warnings };
}

/**
 * Read and parse a repository list file
 */
export async function loadRepoList(listPath: string, workspaceDir: string): Promise<EnumeratedJobs> {
  const content = await fs.readFile(listPath, 'utf-8');
  return parseRepoList(content, workspaceDir);
}

/**
 * One job per immediate, non-hidden subdirectory of rootDir, sorted by name
 */
export async function enumerateLocalJobs(rootDir: string, prefix: string): Promise<RepositoryJob[]> {
  const root = path.resolve(rootDir);
  const entries = await fs.readdir(root, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => ({
      prefix,
      name,
      ...projectIdentity(prefix, name),
      checkoutPath: path.join(root, name),
      source: 'local' as const,
    }));
}

/**
 * Keep the first job per project key
 */
export function dedupeJobs(jobs: readonly RepositoryJob[]): { jobs: RepositoryJob[]; duplicates: RepositoryJob[] } {
  const seen = new Set<string>();
  const unique: RepositoryJob[] = [];
  const duplicates: RepositoryJob[] = [];

  for (const job of jobs) {
    if (seen.has(job.projectKey)) {
      duplicates.push(job);
    } else {
      seen.add(job.projectKey);
      unique.push(job);
    }
  }

  return { jobs: unique, duplicates };
}

/**
 * Apply an override's workdir. The result always lies inside the checkout;
 * a missing or escaping workdir falls back to the checkout root.
 */
export async function resolveScanPath(
  checkoutPath: string,
  override: ExtraCommandOverride | undefined
): Promise<{ scanPath: string; warning?: string }> {
  if (!override) {
    return { scanPath: checkoutPath };
  }
  if (!override.workdir) {
    return { scanPath: checkoutPath, warning: 'no workdir configured; using repository root' };
  }

  const candidate = path.resolve(checkoutPath, override.workdir);
  const relative = path.relative(checkoutPath, candidate);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return {
      scanPath: checkoutPath,
      warning: `workdir ${override.workdir} lies outside the repository; using repository root`,
    };
  }

  if (!(await isDirectory(candidate))) {
    return {
      scanPath: checkoutPath,
      warning: `workdir ${override.workdir} not found; using repository root`,
    };
  }

  return { scanPath: candidate };
}
