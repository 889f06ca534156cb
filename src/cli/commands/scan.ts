/**
 * Scan command
 * Onboards every repository from the list (or a local directory) and
 * prints the run summary
 */

import { Command } from 'commander';
import path from 'node:path';
import {
  loadConfig,
  loadDotEnv,
  loadServerSettings,
  getConfigPath,
  WorkerCountSchema,
  type Config,
  type ServerSettings,
} from '../../config/index.js';
import { dedupeJobs, enumerateLocalJobs, loadRepoList } from '../../jobs/job.js';
import { createConsoleSink, JobLogger, type LogSink } from '../../jobs/job-logger.js';
import { processJob, type PipelineSettings } from '../../jobs/process-job.js';
import { runJobs, type JobHandler } from '../../jobs/runner.js';
import { StatsAggregator } from '../../jobs/stats.js';
import { runCommand } from '../../pipeline/command-runner.js';
import { ProjectRegistrar } from '../../registrar/registrar.js';
import { createSonarClient } from '../../registrar/sonar-client.js';
import { syncRepository } from '../../source/git.js';
import type { RepositoryJob } from '../../types/job.js';
import {
  printHeader,
  printSection,
  printError,
  printWarning,
  printKeyValue,
  printTable,
  printRunSummary,
  startSpinner,
  succeedSpinner,
  failSpinner,
} from '../output.js';

export interface ScanCommandOptions {
  local?: string;
  repos?: string;
  workers?: string;
  prefix?: string;
  branch?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Apply command-line flags on top of the loaded configuration
 */
export function applyCliOptions(config: Config, options: ScanCommandOptions): Config {
  const next: Config = { ...config, output: { ...config.output } };

  if (options.workers !== undefined) {
    const workers = WorkerCountSchema.safeParse(Number(options.workers));
    if (!workers.success) {
      throw new Error(`Invalid worker count: ${options.workers} (expected a whole number from 1 to 64)`);
    }
    next.workers = workers.data;
  }
  if (options.repos) next.repo_list = options.repos;
  if (options.prefix) next.local_prefix = options.prefix;
  if (options.branch) next.default_branch = options.branch;
  if (options.verbose) next.output.verbose = true;

  return next;
}

/**
 * Enumerate jobs for the selected mode and drop duplicate keys
 */
async function enumerateJobs(config: Config, options: ScanCommandOptions): Promise<RepositoryJob[]> {
  let jobs: RepositoryJob[];
  if (options.local) {
    jobs = await enumerateLocalJobs(options.local, config.local_prefix);
  } else {
    const listed = await loadRepoList(path.resolve(config.repo_list), config.workspace_dir);
    for (const warning of listed.warnings) {
      printWarning(warning);
    }
    jobs = listed.jobs;
  }

  const { jobs: unique, duplicates } = dedupeJobs(jobs);
  for (const duplicate of duplicates) {
    printWarning(`Duplicate project key ${duplicate.projectKey} skipped (${duplicate.repoUrl ?? duplicate.checkoutPath})`);
  }
  return unique;
}

/**
 * Handler factory: one analysis-server client and registrar per worker
 */
function createHandlerFactory(
  server: ServerSettings,
  config: Config,
  stats: StatsAggregator,
  sink: LogSink
): (workerId: number) => JobHandler {
  const settings: PipelineSettings = {
    server,
    scanner: config.scanner,
    branch: config.default_branch,
    overrides: config.overrides,
  };

  return () => {
    const registrar = new ProjectRegistrar(createSonarClient(server, config.http));
    return (job) =>
      processJob(job, {
        registrar,
        stats,
        sync: syncRepository,
        run: runCommand,
        settings,
        logger: new JobLogger(job.projectKey, sink),
      });
  };
}

function printJobTable(jobs: RepositoryJob[]): void {
  printTable(
    ['Key', 'Name', 'Checkout', 'Source'],
    jobs.map((job) => [job.projectKey, job.displayName, job.checkoutPath, job.repoUrl ?? 'local'])
  );
}

/**
 * Run the scan command
 */
export async function runScan(options: ScanCommandOptions): Promise<void> {
  loadDotEnv();

  let server: ServerSettings | null = null;
  if (!options.dryRun) {
    server = loadServerSettings();
  }

  startSpinner('Loading configuration...');
  let config: Config;
  let jobs: RepositoryJob[];
  try {
    config = applyCliOptions(await loadConfig(), options);
    jobs = await enumerateJobs(config, options);
    succeedSpinner(`Loaded ${jobs.length} repositories`);
  } catch (error) {
    failSpinner('Failed to prepare jobs');
    throw error;
  }

  printHeader('Repository onboarding');
  printKeyValue('Config', getConfigPath() ?? 'defaults');
  printKeyValue('Mode', options.local ? `local (${path.resolve(options.local)})` : `list (${config.repo_list})`);
  printKeyValue('Workers', config.workers);
  printKeyValue('Branch', config.default_branch);
  if (server) printKeyValue('Server', server.host);

  if (options.dryRun) {
    printSection('Jobs');
    printJobTable(jobs);
    return;
  }
  if (!server) return;

  const stats = new StatsAggregator();
  const sink = createConsoleSink({ verbose: config.output.verbose, logFile: config.output.log_file });

  const result = await runJobs(jobs, {
    workers: config.workers,
    stats,
    createHandler: createHandlerFactory(server, config, stats, sink),
  });

  printRunSummary(result.stats, result.reports);
}

/**
 * Create the scan command
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Register, synchronise, classify and scan every repository')
    .option('-l, --local <dir>', 'Scan the subdirectories of a local directory instead of the repository list')
    .option('-r, --repos <file>', 'Repository list file (prefix,url per line)')
    .option('-w, --workers <count>', 'Number of repositories processed in parallel')
    .option('-p, --prefix <prefix>', 'Project key prefix for local mode')
    .option('-b, --branch <name>', 'Branch to bring each working copy to')
    .option('-v, --verbose', 'Print debug output from each job')
    .option('--dry-run', 'List the jobs without contacting the server')
    .action(async (options: ScanCommandOptions) => {
      try {
        await runScan(options);
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
