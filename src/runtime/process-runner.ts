/**
 * Process Runner
 *
 * Spawns one external command in its own process group, keeps bounded
 * tails of its output, and enforces a wall-clock timeout and cancellation
 * by signalling the whole group: SIGTERM first, SIGKILL after a grace
 * period. A non-zero exit is returned as data; only the caller decides
 * whether it is a failure.
 *
 * @module runtime/process-runner
 */

import { spawn } from 'node:child_process';
import { createWriteStream, type WriteStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { ContextActivations, ExecutionPlan } from './contexts.js';
import { LineFilter, TailBuffer } from './tail-buffer.js';
import { errorMessage } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export type OutputStream = 'stdout' | 'stderr';

export interface RunOptions {
  /** Wall-clock limit for the command */
  timeoutMs: number;

  /** Bytes of stdout/stderr kept for diagnostics */
  tailBytes: number;

  /** Delay between SIGTERM and SIGKILL (default 2000) */
  killGraceMs?: number;

  /** Aborting terminates the process group */
  signal?: AbortSignal;

  /** Redirect stdout into this file instead of the tail buffer */
  stdoutPath?: string;

  /** Stderr lines matching any of these are dropped */
  stderrNoise?: readonly RegExp[];

  /** Live output, after noise filtering */
  onOutput?: (stream: OutputStream, chunk: string) => void;
}

export interface ProcessOutcome {
  /** Printable command line */
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdoutTail: string;
  stderrTail: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;

  /** Spawn or stdout-redirect failure, null when the child ran normally */
  spawnError: string | null;
}

export interface ProcessRunner {
  run(plan: ExecutionPlan, args: readonly string[], options: RunOptions): Promise<ProcessOutcome>;
}

export const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Activation chatter printed by conda wrappers that says nothing about the
 * tool itself.
 */
export const CONDA_STDERR_NOISE: readonly RegExp[] = [
  /EnvironmentNameNotFound/,
  /terminal process group/,
  /no job control/,
  /shell\.bash hook/,
];

// ============================================================================
// Helpers
// ============================================================================

function quoteArg(arg: string): string {
  return /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command the way a user would type it into a shell.
 */
export function formatCommand(
  executable: string,
  args: readonly string[],
  stdoutPath?: string
): string {
  const parts = [executable, ...args].map(quoteArg).join(' ');
  return stdoutPath ? `${parts} > ${quoteArg(stdoutPath)}` : parts;
}

function signalGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (error) {
    // ESRCH: the group is already gone
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      throw error;
    }
  }
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.closed) {
      resolve();
      return;
    }
    stream.once('close', () => resolve());
  });
}

// ============================================================================
// Local Runner
// ============================================================================

/**
 * Runs commands on the local host with `child_process.spawn`.
 *
 * When constructed with an activation stack, each run happens inside the
 * plan's context bracket, so a conflicting context cannot be entered while
 * the command is alive.
 */
export class LocalProcessRunner implements ProcessRunner {
  constructor(private readonly activations?: ContextActivations) {}

  async run(
    plan: ExecutionPlan,
    args: readonly string[],
    options: RunOptions
  ): Promise<ProcessOutcome> {
    if (this.activations) {
      return this.activations.withContext(plan.contextId, () =>
        this.spawnAndWait(plan, args, options)
      );
    }
    return this.spawnAndWait(plan, args, options);
  }

  private async spawnAndWait(
    plan: ExecutionPlan,
    args: readonly string[],
    options: RunOptions
  ): Promise<ProcessOutcome> {
    const command = formatCommand(plan.executablePath, args, options.stdoutPath);
    const startTime = Date.now();

    if (options.signal?.aborted) {
      return {
        command,
        exitCode: null,
        signal: null,
        stdoutTail: '',
        stderrTail: '',
        durationMs: 0,
        timedOut: false,
        cancelled: true,
        spawnError: null,
      };
    }

    let stdoutFile: WriteStream | undefined;
    if (options.stdoutPath) {
      await fs.mkdir(path.dirname(options.stdoutPath), { recursive: true });
      stdoutFile = createWriteStream(options.stdoutPath);
    }

    const stdoutTail = new TailBuffer(options.tailBytes);
    const stderrTail = new TailBuffer(options.tailBytes);
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    const decoders: Record<OutputStream, StringDecoder> = {
      stdout: new StringDecoder('utf8'),
      stderr: new StringDecoder('utf8'),
    };
    const emit = (stream: OutputStream, chunk: Buffer): void => {
      if (options.onOutput) {
        const text = decoders[stream].write(chunk);
        if (text.length > 0) options.onOutput(stream, text);
      }
    };

    const stderrFilter = new LineFilter(
      options.stderrNoise ?? [],
      (chunk) => {
        stderrTail.push(chunk);
        emit('stderr', chunk);
      },
      options.tailBytes
    );

    return new Promise<ProcessOutcome>((resolve) => {
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let outputError: string | null = null;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(plan.executablePath, [...args], {
        cwd: plan.cwd,
        env: plan.env,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      // The whole process group is signalled even when the direct child has
      // exited: a descendant still holding the output pipes keeps `close`
      // from firing.
      const terminate = (): void => {
        if (child.pid === undefined || settled) {
          return;
        }
        const pid = child.pid;
        signalGroup(pid, 'SIGTERM');
        if (killTimer === undefined) {
          killTimer = setTimeout(() => {
            signalGroup(pid, 'SIGKILL');
            child.stdout.destroy();
            child.stderr.destroy();
            if (child.exitCode !== null || child.signalCode !== null) {
              void finish(child.exitCode, child.signalCode, null);
            }
          }, killGraceMs);
        }
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = async (
        exitCode: number | null,
        signal: NodeJS.Signals | null,
        spawnError: string | null
      ): Promise<void> => {
        if (settled) return;
        settled = true;

        clearTimeout(timeoutTimer);
        if (killTimer !== undefined) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
        stderrFilter.flush();
        for (const stream of ['stdout', 'stderr'] as const) {
          const rest = decoders[stream].end();
          if (rest.length > 0) options.onOutput?.(stream, rest);
        }

        if (stdoutFile) {
          stdoutFile.end();
          await closeStream(stdoutFile);
        }

        resolve({
          command,
          exitCode,
          signal,
          stdoutTail: stdoutTail.toString(),
          stderrTail: stderrTail.toString(),
          durationMs: Date.now() - startTime,
          timedOut,
          cancelled,
          spawnError: spawnError ?? outputError,
        });
      };

      if (stdoutFile) {
        stdoutFile.on('error', (error) => {
          outputError = `Cannot write ${options.stdoutPath ?? 'stdout'}: ${error.message}`;
          terminate();
        });
        child.stdout.pipe(stdoutFile, { end: false });
        child.stdout.on('data', (chunk: Buffer) => emit('stdout', chunk));
      } else {
        child.stdout.on('data', (chunk: Buffer) => {
          stdoutTail.push(chunk);
          emit('stdout', chunk);
        });
      }

      child.stderr.on('data', (chunk: Buffer) => stderrFilter.push(chunk));

      let startError: string | null = null;

      child.on('error', (error) => {
        if (child.pid === undefined) {
          startError = `Failed to start ${plan.executablePath}: ${errorMessage(error)}`;
          void finish(null, null, startError);
        } else {
          outputError = errorMessage(error);
        }
      });

      child.on('close', (code, signal) => {
        if (child.pid === undefined) {
          void finish(null, null, startError ?? `Failed to start ${plan.executablePath}`);
        } else {
          void finish(code, signal, null);
        }
      });
    });
  }
}
