/**
 * Job logger
 * Tags every line with the project key and pipeline stage, so interleaved
 * output from concurrent workers stays attributable
 */

import { appendFileSync } from 'node:fs';
import { printDebug, printError, printInfo, printSuccess, printWarning } from '../cli/output.js';

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Pipeline stages for categorization
 */
export type JobStage =
  | 'register'
  | 'sync'
  | 'override'
  | 'classify'
  | 'detect'
  | 'build'
  | 'test'
  | 'coverage'
  | 'scan'
  | 'fallback'
  | 'job';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  jobKey: string;
  stage: JobStage;
  message: string;
  level: LogLevel;
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

export interface ConsoleSinkOptions {
  verbose?: boolean;
  /** Append each entry as a JSON line to this file */
  logFile?: string;
}

/**
 * Format an entry for the console
 */
export function formatEntry(entry: LogEntry): string {
  return `[${entry.jobKey}] [${entry.stage}] ${entry.message}`;
}

/**
 * Sink printing through the CLI output helpers, optionally mirrored to a
 * JSON-lines file
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  let logFile = options.logFile;

  return {
    write(entry: LogEntry): void {
      const line = formatEntry(entry);
      switch (entry.level) {
        case 'info':
          printInfo(line);
          break;
        case 'warn':
          printWarning(line);
          break;
        case 'error':
          printError(line);
          break;
        case 'success':
          printSuccess(line);
          break;
        case 'debug':
          if (options.verbose) printDebug(line);
          break;
      }

      if (logFile) {
        try {
          appendFileSync(logFile, JSON.stringify(entry) + '\n', 'utf-8');
        } catch (error) {
          // A log file problem never fails a job; mirroring stops after one warning
          const reason = error instanceof Error ? error.message : String(error);
          printWarning(`Cannot write log file ${logFile}: ${reason}; file logging disabled`);
          logFile = undefined;
        }
      }
    },
  };
}

/**
 * Sink that only keeps entries in memory
 */
export function createMemorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    write(entry: LogEntry): void {
      entries.push(entry);
    },
  };
}

/**
 * Per-job logger
 */
export class JobLogger {
  private readonly entries: LogEntry[] = [];

  constructor(
    readonly jobKey: string,
    private readonly sink: LogSink
  ) {}

  log(stage: JobStage, message: string, level: LogLevel = 'info'): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      jobKey: this.jobKey,
      stage,
      message,
      level,
    };
    this.entries.push(entry);
    this.sink.write(entry);
  }

  info(stage: JobStage, message: string): void {
    this.log(stage, message, 'info');
  }

  warn(stage: JobStage, message: string): void {
    this.log(stage, message, 'warn');
  }

  error(stage: JobStage, message: string): void {
    this.log(stage, message, 'error');
  }

  success(stage: JobStage, message: string): void {
    this.log(stage, message, 'success');
  }

  debug(stage: JobStage, message: string): void {
    this.log(stage, message, 'debug');
  }

  /**
   * Entries logged by this job so far
   */
  getEntries(): readonly LogEntry[] {
    return this.entries;
  }
}
