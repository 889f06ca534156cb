/**
 * Python and Go executor tests
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runPythonScan } from '../../../src/pipeline/executors/python.js';
import { runGoScan } from '../../../src/pipeline/executors/go.js';
import { PhaseError } from '../../../src/pipeline/phase.js';
import { makeTempDir, removeDir, writeTree } from '../../helpers/fixtures.js';
import { executorHarness, hasArg } from './helpers.js';

describe('runPythonScan', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('python');
    writeTree(root, { 'app.py': 'print(1)\n' });
  });

  afterEach(() => {
    removeDir(root);
  });

  it('should skip dependency installation without requirements.txt', async () => {
    const { ctx, runner } = executorHarness(root);

    await runPythonScan(ctx);

    expect(runner.lines()[0]).toBe('python3 -m pytest --cov=. --cov-report=xml:coverage.xml');
    expect(runner.calls).toHaveLength(2);
  });

  it('should install requirements and attach the coverage report', async () => {
    writeTree(root, { 'requirements.txt': 'requests\n' });
    const { ctx, runner } = executorHarness(root, undefined, (spec) => {
      if (spec.args?.[1] === 'pytest') writeTree(root, { 'coverage.xml': '<coverage/>' });
    });

    await runPythonScan(ctx);

    expect(runner.lines()[0]).toBe('python3 -m pip install -r requirements.txt');
    expect(hasArg(runner.calls[2], '-Dsonar.python.coverage.reportPaths=coverage.xml')).toBe(true);
  });

  it('should scan without coverage when the tests fail', async () => {
    const { ctx, runner, entries } = executorHarness(root, (spec) => spec.args?.[1] === 'pytest');

    await runPythonScan(ctx);

    const scan = runner.calls[1];
    expect(scan?.command).toBe('sonar-scanner');
    expect(scan?.args?.some((a) => a.startsWith('-Dsonar.python.coverage'))).toBe(false);
    expect(entries.some((e) => e.stage === 'coverage' && e.message === 'No coverage report at coverage.xml; scanning without coverage')).toBe(true);
  });

  it('should fail the job when the scan fails', async () => {
    const { ctx } = executorHarness(root, (spec) => spec.command === 'sonar-scanner');
    await expect(runPythonScan(ctx)).rejects.toBeInstanceOf(PhaseError);
  });

  it('should not attach a report left over from an earlier run', async () => {
    writeTree(root, { 'coverage.xml': '<coverage/>' });
    const { ctx, runner } = executorHarness(root, (spec) => spec.args?.[1] === 'pytest');

    await runPythonScan(ctx);

    expect(runner.calls[1]?.args?.some((a) => a.startsWith('-Dsonar.python.coverage'))).toBe(false);
    expect(existsSync(path.join(root, 'coverage.xml'))).toBe(false);
  });
});

describe('runGoScan', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('go');
    writeTree(root, { 'go.mod': 'module example.test/widgets\n', 'main.go': 'package main\n' });
  });

  afterEach(() => {
    removeDir(root);
  });

  it('should still scan when the tests fail, without a coverage argument', async () => {
    const { ctx, runner } = executorHarness(root, (spec) => spec.args?.[0] === 'test');

    await runGoScan(ctx);

    expect(runner.lines().slice(0, 2)).toEqual(['go build ./...', 'go test ./... -coverprofile=coverage.out']);
    const scan = runner.calls[2];
    expect(scan?.command).toBe('sonar-scanner');
    expect(scan?.args?.some((a) => a.startsWith('-Dsonar.go.coverage'))).toBe(false);
  });

  it('should not attach a coverage.out left over from an earlier run', async () => {
    writeTree(root, { 'coverage.out': 'mode: set\n' });
    const { ctx, runner } = executorHarness(root, (spec) => spec.args?.[0] === 'test');

    await runGoScan(ctx);

    expect(runner.calls[2]?.args?.some((a) => a.startsWith('-Dsonar.go.coverage'))).toBe(false);
  });

  it('should attach coverage.out and Go test settings', async () => {
    const { ctx, runner } = executorHarness(root, undefined, (spec) => {
      if (spec.args?.[0] === 'test') writeTree(root, { 'coverage.out': 'mode: set\n' });
    });

    await runGoScan(ctx);

    const scan = runner.calls[2];
    expect(hasArg(scan, '-Dsonar.go.coverage.reportPaths=coverage.out')).toBe(true);
    expect(hasArg(scan, '-Dsonar.test.inclusions=**/*_test.go')).toBe(true);
    expect(hasArg(scan, '-Dsonar.exclusions=**/*_test.go,**/vendor/**')).toBe(true);
  });
});
