/**
 * Run statistics
 *
 * One aggregator per run, passed explicitly to every job. Workers share
 * the event loop, so each increment completes before another worker's
 * code runs; counters only ever grow.
 */

import type { RegistrationOutcome, ScanOutcome } from '../types/job.js';

export interface StatsSnapshot {
  created: number;
  exists: number;
  scanned: number;
  configOnly: number;
  empty: number;
  failed: number;
}

const OUTCOME_COUNTERS: Record<ScanOutcome, keyof StatsSnapshot> = {
  scanned: 'scanned',
  'config-only': 'configOnly',
  empty: 'empty',
  failed: 'failed',
};

const REGISTRATION_COUNTERS: Record<RegistrationOutcome, keyof StatsSnapshot> = {
  created: 'created',
  exists: 'exists',
};

export class StatsAggregator {
  private readonly counters: StatsSnapshot = {
    created: 0,
    exists: 0,
    scanned: 0,
    configOnly: 0,
    empty: 0,
    failed: 0,
  };

  recordRegistration(outcome: RegistrationOutcome): void {
    this.counters[REGISTRATION_COUNTERS[outcome]] += 1;
  }

  /** Exactly one call per job */
  recordOutcome(outcome: ScanOutcome): void {
    this.counters[OUTCOME_COUNTERS[outcome]] += 1;
  }

  snapshot(): StatsSnapshot {
    return { ...this.counters };
  }

  /** Jobs that reached a terminal state */
  terminalCount(): number {
    const { scanned, configOnly, empty, failed } = this.counters;
    return scanned + configOnly + empty + failed;
  }
}
