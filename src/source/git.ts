/**
 * Source synchronisation
 *
 * Brings a working copy to the tip of a branch: clone when missing,
 * otherwise fetch, checkout and pull. Only a failed clone is fatal.
 */

import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isDirectory } from '../scanner/walk.js';
import type { JobLogger } from '../jobs/job-logger.js';

export interface SyncRequest {
  /** Clone URL; absent for local-directory jobs */
  repoUrl?: string;
  checkoutPath: string;
  branch: string;
}

export interface SyncResult {
  action: 'cloned' | 'updated' | 'skipped';
  /** Branch checked out after synchronisation, when known */
  branch?: string;
}

export type RepositorySync = (request: SyncRequest, logger: JobLogger) => Promise<SyncResult>;

/**
 * Rewrite GitHub/Bitbucket HTTPS URLs to their SSH form
 */
export function toSshUrl(repoUrl: string): string {
  const url = repoUrl.trim().replace(/\/+$/, '');
  if (url.startsWith('https://github.com/')) {
    return url.replace('https://github.com/', 'git@github.com:');
  }
  if (url.startsWith('https://bitbucket.org/')) {
    return url.replace('https://bitbucket.org/', 'git@bitbucket.org:');
  }
  return url;
}

/**
 * Repository name from a clone or browse URL
 *
 * @example repoNameFromUrl('git@github.com:acme/widgets.git') // 'widgets'
 */
export function repoNameFromUrl(repoUrl: string): string {
  const url = repoUrl.trim().replace(/\/+$/, '').replace(/\/browse$/, '');
  const lastSegment = url.split('/').pop() ?? url;
  const name = lastSegment.split(':').pop() ?? lastSegment;
  return name.replace(/\.git$/, '');
}

function createGit(baseDir: string): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir,
    binary: 'git',
    maxConcurrentProcesses: 1,
  };
  return simpleGit(options);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function currentBranch(git: SimpleGit): Promise<string | undefined> {
  try {
    const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    return branch && branch !== 'HEAD' ? branch : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Checkout and pull an existing working copy; failures are warnings
 */
async function updateWorkingCopy(git: SimpleGit, branch: string, logger: JobLogger): Promise<void> {
  try {
    await git.fetch();
  } catch (error) {
    logger.warn('sync', `git fetch failed: ${errorMessage(error)}, continuing with existing repo`);
  }

  try {
    await git.checkout(branch);
  } catch (error) {
    logger.warn('sync', `Could not checkout ${branch}: ${errorMessage(error)}, keeping current branch`);
  }

  try {
    await git.pull();
  } catch (error) {
    logger.warn('sync', `git pull failed: ${errorMessage(error)}, continuing with existing repo`);
  }
}

/**
 * Synchronise a job's working copy
 *
 * @throws When a missing repository cannot be cloned
 */
export const syncRepository: RepositorySync = async (request, logger) => {
  const exists = await isDirectory(request.checkoutPath);

  if (!request.repoUrl) {
    if (!(await isDirectory(path.join(request.checkoutPath, '.git')))) {
      logger.info('sync', 'Not a git work tree; scanning directory as is');
      return { action: 'skipped' };
    }
    const git = createGit(request.checkoutPath);
    await updateWorkingCopy(git, request.branch, logger);
    return { action: 'updated', branch: await currentBranch(git) };
  }

  if (exists) {
    logger.info('sync', `Repo already exists at ${request.checkoutPath}, pulling latest changes...`);
    const git = createGit(request.checkoutPath);
    await updateWorkingCopy(git, request.branch, logger);
    return { action: 'updated', branch: await currentBranch(git) };
  }

  logger.info('sync', `Cloning repo: ${request.repoUrl}`);
  await fs.mkdir(path.dirname(request.checkoutPath), { recursive: true });
  await simpleGit().clone(request.repoUrl, request.checkoutPath);

  const git = createGit(request.checkoutPath);
  try {
    await git.checkout(request.branch);
  } catch (error) {
    logger.warn('sync', `Could not checkout ${request.branch}: ${errorMessage(error)}, keeping default branch`);
  }
  return { action: 'cloned', branch: await currentBranch(git) };
};
