/**
 * Run summary formatting tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatSummaryLines, printRunSummary } from '../../src/cli/output.js';
import { createRemoteJob } from '../../src/jobs/job.js';
import type { StatsSnapshot } from '../../src/jobs/stats.js';

const STATS: StatsSnapshot = { created: 2, exists: 1, scanned: 1, configOnly: 1, empty: 0, failed: 1 };

describe('formatSummaryLines', () => {
  it('should list every counter', () => {
    expect(formatSummaryLines(STATS)).toEqual([
      'Projects created: 2',
      'Projects already existed: 1',
      'Repos scanned successfully: 1',
      'Repos scanned as configuration only: 1',
      'Empty repos skipped: 0',
      'Failures: 1',
    ]);
  });
});

describe('printRunSummary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the counters and name the failed repositories', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const job = createRemoteJob('acme', 'https://github.com/acme/widgets', '/srv');

    printRunSummary(STATS, [{ job, outcome: 'failed', error: 'Go scan failed (exit code 1)', durationMs: 3 }]);

    const printed = log.mock.calls.map((call) => call.map(String).join(' '));
    expect(printed).toContain('  Failures: 1');
    expect(printed.some((line) => line.includes('acme_widgets: Go scan failed (exit code 1)'))).toBe(true);
    expect(printed.some((line) => line.includes('All repos processed.'))).toBe(true);
  });
});
