/**
 * Process Runner
 *
 * Thin wrapper over execa that never rejects for process failures: exit codes,
 * signals, timeouts and spawn errors all come back as a StepOutcome together
 * with the combined stdout+stderr text.
 *
 * With a timeout the child leads its own process group, and expiry signals
 * the whole group so grandchildren holding the output pipes go too.
 */

import { StringDecoder } from 'string_decoder';
import { execa, ExecaError } from 'execa';
import type { StepOutcome } from '@perfsweep/core';

/** Grace period between SIGTERM and SIGKILL once a timeout fires */
const FORCE_KILL_AFTER_MS = 5_000;

/** Per-stream capture limit; perf + a booting guest stays far below this */
const MAX_OUTPUT_CHARS = 256 * 1024 * 1024;

export interface ProcessSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Extra environment variables, merged over the parent environment */
  env?: Record<string, string>;
  /**
   * 0 or absent means no timeout. A timed child runs detached from the
   * terminal, so a sudo that has to prompt for a password cannot.
   */
  timeoutMs?: number;
  /** 'inherit' lets an interactive workload read the terminal */
  stdin?: 'inherit' | 'ignore';
  /** Called with each chunk of combined output as it arrives */
  onOutput?: (chunk: string) => void;
}

export interface ProcessRun {
  outcome: StepOutcome;
  /** Combined stdout+stderr, interleaved as emitted */
  output: string;
}

export type ProcessRunner = (spec: ProcessSpec) => Promise<ProcessRun>;

// Detached groups still running; killed if the harness itself goes away
const activeGroups = new Set<number>();

function isUnsignalable(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ESRCH' || error.code === 'EPERM')
  );
}

/**
 * Signal a process group, falling back to the leader alone
 */
function signalGroup(pid: number, signal: NodeJS.Signals): void {
  for (const target of [-pid, pid]) {
    try {
      process.kill(target, signal);
      return;
    } catch (error) {
      if (!isUnsignalable(error)) throw error;
    }
  }
}

function killActiveGroups(): void {
  for (const pid of activeGroups) {
    signalGroup(pid, 'SIGKILL');
  }
  activeGroups.clear();
}

function onHarnessSignal(signal: NodeJS.Signals): void {
  killActiveGroups();
  process.exit(signal === 'SIGINT' ? 130 : 143);
}

function trackGroup(pid: number): void {
  if (activeGroups.size === 0) {
    process.on('exit', killActiveGroups);
    process.on('SIGINT', onHarnessSignal);
    process.on('SIGTERM', onHarnessSignal);
  }
  activeGroups.add(pid);
}

function untrackGroup(pid: number): void {
  if (!activeGroups.delete(pid) || activeGroups.size > 0) return;
  process.off('exit', killActiveGroups);
  process.off('SIGINT', onHarnessSignal);
  process.off('SIGTERM', onHarnessSignal);
}

/**
 * Run a command to completion and classify the result
 */
export async function runProcess(spec: ProcessSpec): Promise<ProcessRun> {
  const startedAt = Date.now();
  const timeout = spec.timeoutMs !== undefined && spec.timeoutMs > 0 ? spec.timeoutMs : undefined;

  const subprocess = execa(spec.command, spec.args, {
    cwd: spec.cwd,
    env: spec.env,
    stdin: spec.stdin ?? 'ignore',
    all: true,
    reject: false,
    detached: timeout !== undefined,
    maxBuffer: MAX_OUTPUT_CHARS,
    cleanup: true,
    encoding: 'utf8',
  });

  const onOutput = spec.onOutput;
  if (onOutput) {
    // Buffer chunks can end inside a multi-byte character
    const decoder = new StringDecoder('utf8');
    subprocess.all?.on('data', (chunk: unknown) => {
      const text =
        typeof chunk === 'string' ? chunk : chunk instanceof Uint8Array ? decoder.write(chunk) : '';
      if (text !== '') onOutput(text);
    });
    subprocess.all?.on('end', () => {
      const rest = decoder.end();
      if (rest !== '') onOutput(rest);
    });
  }

  const pid = subprocess.pid;
  let timedOut = false;
  let deadline: NodeJS.Timeout | undefined;
  let forceKill: NodeJS.Timeout | undefined;
  if (timeout !== undefined && pid !== undefined) {
    trackGroup(pid);
    deadline = setTimeout(() => {
      timedOut = true;
      signalGroup(pid, 'SIGTERM');
      forceKill = setTimeout(() => signalGroup(pid, 'SIGKILL'), FORCE_KILL_AFTER_MS);
    }, timeout);
  }

  const result = await subprocess.finally(() => {
    clearTimeout(deadline);
    clearTimeout(forceKill);
    if (pid !== undefined && activeGroups.has(pid)) {
      // Stragglers that ignored SIGTERM and closed their pipes
      if (timedOut) signalGroup(pid, 'SIGKILL');
      untrackGroup(pid);
    }
  });
  const durationMs = Date.now() - startedAt;
  const output = typeof result.all === 'string' ? result.all : '';

  if (timedOut) {
    return {
      outcome: {
        status: 'timed_out',
        signal: result.signal,
        durationMs,
        message: `Timed out after ${timeout ?? 0}ms`,
      },
      output,
    };
  }

  if (result.exitCode === undefined && result.signal === undefined && result.failed) {
    const message =
      result instanceof ExecaError ? result.shortMessage : `Failed to start ${spec.command}`;
    return {
      outcome: { status: 'spawn_error', durationMs, message },
      output,
    };
  }

  if (result.signal !== undefined) {
    return {
      outcome: {
        status: 'failed',
        signal: result.signal,
        durationMs,
        message: `Terminated by ${result.signal}`,
      },
      output,
    };
  }

  if (result.isMaxBuffer) {
    return {
      outcome: {
        status: 'failed',
        exitCode: result.exitCode,
        durationMs,
        message: 'Output exceeded capture limit',
      },
      output,
    };
  }

  if (result.exitCode !== 0) {
    return {
      outcome: {
        status: 'failed',
        exitCode: result.exitCode,
        durationMs,
        message: `Exited with code ${result.exitCode ?? 'unknown'}`,
      },
      output,
    };
  }

  return { outcome: { status: 'ok', exitCode: 0, durationMs }, output };
}

/**
 * Render an argv the way a shell user would type it
 */
export function formatCommandLine(argv: readonly string[]): string {
  return argv
    .map((arg) => (/^[A-Za-z0-9_./=,:@%+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Last lines of a captured output, for log lines
 */
export function tailLines(text: string, count: number): string {
  const lines = text.trimEnd().split('\n');
  return lines.slice(Math.max(0, lines.length - count)).join('\n');
}
