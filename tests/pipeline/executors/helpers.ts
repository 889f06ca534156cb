/**
 * Executor context factory for the executor tests
 */

import { ProjectRegistrar } from '../../../src/registrar/registrar.js';
import type { ExecutorContext } from '../../../src/pipeline/executors/shared.js';
import type { CommandSpec } from '../../../src/pipeline/command-runner.js';
import type { LogEntry } from '../../../src/jobs/job-logger.js';
import {
  FakeAnalysisServer,
  TEST_SCANNER,
  TEST_SERVER,
  makeJob,
  memoryLogger,
  recordingRunner,
  type RecordingRunner,
} from '../../helpers/fixtures.js';

export interface ExecutorHarness {
  ctx: ExecutorContext;
  runner: RecordingRunner;
  entries: LogEntry[];
  server: FakeAnalysisServer;
}

export function executorHarness(
  scanPath: string,
  failWhen?: (spec: CommandSpec) => boolean,
  onRun?: (spec: CommandSpec) => void
): ExecutorHarness {
  const runner = recordingRunner(failWhen, onRun);
  const { logger, entries } = memoryLogger();
  const server = new FakeAnalysisServer();
  server.projects.set('acme_widgets', { name: 'acme-widgets', settings: {} });
  const ctx: ExecutorContext = {
    run: runner.run,
    logger,
    secrets: [TEST_SERVER.token],
    job: makeJob(scanPath),
    scanPath,
    server: TEST_SERVER,
    scanner: TEST_SCANNER,
    registrar: new ProjectRegistrar(server),
  };
  return { ctx, runner, entries, server };
}

export function hasArg(spec: CommandSpec | undefined, arg: string): boolean {
  return spec?.args?.includes(arg) ?? false;
}
