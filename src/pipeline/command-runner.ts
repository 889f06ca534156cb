/**
 * Command runner for build, test and scan tools and override commands
 *
 * Never rejects: a non-zero exit, a spawn failure and a timeout all come
 * back as a failed CommandResult. Output is kept as a bounded tail. Each
 * command leads its own process group, and a timeout terminates the group.
 */

import { spawn, type ChildProcess } from 'node:child_process';

// ─── Constants ───────────────────────────────────────────

/** Default timeout in milliseconds */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30 * 60 * 1000;

/** Characters of stdout/stderr kept per stream */
const MAX_TAIL = 4000;

/** Exit code reported when the process could not be started */
const SPAWN_FAILURE_EXIT_CODE = 127;

// ─── Types ───────────────────────────────────────────────

export interface CommandSpec {
  command: string;
  /** Argument vector; when omitted with shell, command is a shell line */
  args?: string[];
  cwd: string;
  shell?: boolean;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export interface CommandResult {
  command: string;
  status: 'pass' | 'fail';
  exitCode: number;
  stdoutTail?: string;
  stderrTail?: string;
  durationMs: number;
  timedOut: boolean;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

// ─── Formatting ──────────────────────────────────────────

/** Display form of a command line */
export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...(spec.args ?? [])].join(' ');
}

/** Replace every occurrence of each secret with asterisks */
export function maskSecrets(text: string, secrets: readonly string[]): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    masked = masked.split(secret).join('****');
  }
  return masked;
}

function appendTail(current: string, chunk: string): string {
  const combined = current + chunk;
  return combined.length > MAX_TAIL ? combined.slice(-MAX_TAIL) : combined;
}

// ─── Execution ───────────────────────────────────────────

/** Send SIGTERM to the process group led by proc, or to proc alone */
function killTree(proc: ChildProcess): void {
  if (proc.pid !== undefined) {
    try {
      process.kill(-proc.pid, 'SIGTERM');
      return;
    } catch {
      // Group already gone or not a group leader
    }
  }
  proc.kill('SIGTERM');
}

/** Execute a single command */
export const runCommand: CommandRunner = (spec) => {
  const startTime = Date.now();
  const timeout = spec.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const display = formatCommand(spec);

  return new Promise<CommandResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (exitCode: number): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        command: display,
        status: exitCode === 0 && !timedOut ? 'pass' : 'fail',
        exitCode,
        stdoutTail: stdout || undefined,
        stderrTail: stderr || undefined,
        durationMs: Date.now() - startTime,
        timedOut,
      });
    };

    const proc = spawn(spec.command, spec.args ?? [], {
      cwd: spec.cwd,
      shell: spec.shell ?? false,
      env: {
        ...process.env,
        CI: 'true',
        ...spec.env,
      },
      stdio: ['ignore', 'pipe', 'pipe'],
      // Own process group, so a timeout reaches every descendant
      detached: true,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      stderr = appendTail(stderr, `\nCommand timed out after ${timeout}ms`);
      killTree(proc);
    }, timeout);

    proc.stdout?.on('data', (data: Buffer) => {
      stdout = appendTail(stdout, data.toString());
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr = appendTail(stderr, data.toString());
    });

    proc.on('error', (err) => {
      stderr = appendTail(stderr, err.message);
      finish(SPAWN_FAILURE_EXIT_CODE);
    });

    // A descendant that ignores the signal can hold the pipes open; a timed-out
    // command is finished once its own process exits
    proc.on('exit', (code) => {
      if (timedOut) finish(code ?? 1);
    });

    proc.on('close', (code) => {
      finish(code ?? 1);
    });
  });
};
