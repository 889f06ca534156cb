/**
 * Shared test fixtures: temporary repository trees, a recording command
 * runner and an in-memory analysis server
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { CommandResult, CommandRunner, CommandSpec } from '../../src/pipeline/command-runner.js';
import { formatCommand } from '../../src/pipeline/command-runner.js';
import type { AnalysisServerApi } from '../../src/registrar/sonar-client.js';
import { JobLogger, createMemorySink, type LogEntry } from '../../src/jobs/job-logger.js';
import type { RepositoryJob } from '../../src/types/job.js';
import type { ScannerSettings, ServerSettings } from '../../src/config/schema.js';

export function makeTempDir(label: string): string {
  return mkdtempSync(path.join(tmpdir(), `scanfleet-${label}-`));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files below root; keys are relative paths
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const abs = path.join(root, relative);
    mkdirSync(path.dirname(abs), { recursive: true });
    writeFileSync(abs, content);
  }
}

export interface RecordingRunner {
  run: CommandRunner;
  calls: CommandSpec[];
  /** Display strings of every call, in order */
  lines(): string[];
}

/**
 * Runner that records every call and fails those matching `failWhen`.
 * `onRun` may create files (e.g. coverage reports) as a side effect.
 */
export function recordingRunner(
  failWhen: (spec: CommandSpec) => boolean = () => false,
  onRun?: (spec: CommandSpec) => void
): RecordingRunner {
  const calls: CommandSpec[] = [];
  const run: CommandRunner = async (spec) => {
    calls.push(spec);
    onRun?.(spec);
    const failed = failWhen(spec);
    const result: CommandResult = {
      command: formatCommand(spec),
      status: failed ? 'fail' : 'pass',
      exitCode: failed ? 1 : 0,
      stderrTail: failed ? 'simulated failure' : undefined,
      durationMs: 1,
      timedOut: false,
    };
    return result;
  };
  return { run, calls, lines: () => calls.map((c) => formatCommand(c)) };
}

/**
 * In-memory analysis server
 */
export class FakeAnalysisServer implements AnalysisServerApi {
  readonly projects = new Map<string, { name: string; branch?: string; settings: Record<string, string> }>();
  createCalls = 0;
  failBranchRename = false;
  failSettings = false;

  async projectExists(key: string): Promise<boolean> {
    return this.projects.has(key);
  }

  async createProject(key: string, name: string): Promise<void> {
    this.createCalls += 1;
    if (this.projects.has(key)) {
      throw new Error(`Project ${key} already exists`);
    }
    this.projects.set(key, { name, settings: {} });
  }

  async renameMainBranch(key: string, branch: string): Promise<void> {
    if (this.failBranchRename) throw new Error('branch rename rejected');
    const project = this.projects.get(key);
    if (project) project.branch = branch;
  }

  async setProjectSetting(key: string, setting: string, value: string): Promise<void> {
    if (this.failSettings) throw new Error('settings rejected');
    const project = this.projects.get(key);
    if (project) project.settings[setting] = value;
  }
}

export function memoryLogger(jobKey = 'acme_widgets'): { logger: JobLogger; entries: LogEntry[] } {
  const sink = createMemorySink();
  return { logger: new JobLogger(jobKey, sink), entries: sink.entries };
}

export const TEST_SERVER: ServerSettings = {
  host: 'http://sonar.test',
  token: 'test-secret',
};

export const TEST_SCANNER: ScannerSettings = {
  binary: 'sonar-scanner',
  token_property: 'sonar.token',
  command_timeout_ms: 60_000,
};

export function makeJob(checkoutPath: string, overrides: Partial<RepositoryJob> = {}): RepositoryJob {
  return {
    prefix: 'acme',
    name: 'widgets',
    projectKey: 'acme_widgets',
    displayName: 'acme-widgets',
    checkoutPath,
    repoUrl: 'git@github.com:acme/widgets',
    source: 'remote',
    ...overrides,
  };
}
