/**
 * Process runner
 *
 * Thin seam around child_process so the bridge can be exercised with a
 * recording fake. Arguments are always passed as a vector, never through a
 * shell.
 */

import { spawn } from 'node:child_process';
import { pipeline } from 'node:stream/promises';
import type { Readable, Writable } from 'node:stream';
import type { ProcessInvocation } from '../core/types.js';

export interface SpawnRequest {
  readonly argv: ProcessInvocation;
  /** Streamed to the child's standard input; null closes it immediately */
  readonly stdin: Readable | null;
  /** Receives the child's standard output; ended by the runner */
  readonly stdout: Writable;
  /** 0 disables the timeout */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface SpawnResult {
  readonly exitCode: number | null;
  readonly stderr: string;
  /** Set when the process could not run to completion on its own */
  readonly failure?: string;
}

export interface ProcessRunner {
  run(request: SpawnRequest): Promise<SpawnResult>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The child may exit without draining stdin (a converter that rejects piped
 * input does exactly that); those write errors are expected.
 */
function isBrokenPipe(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'EPIPE' || error.code === 'ERR_STREAM_PREMATURE_CLOSE' || error.code === 'ECONNRESET';
}

/** Time a converter gets to exit after SIGTERM before it is killed outright */
export const DEFAULT_KILL_GRACE_MS = 2_000;

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly killGraceMs: number = DEFAULT_KILL_GRACE_MS) {}

  async run(request: SpawnRequest): Promise<SpawnResult> {
    if (request.argv.length === 0) {
      return { exitCode: null, stderr: '', failure: 'Empty command line' };
    }
    const [program, ...args] = request.argv;

    const child = spawn(program, args, { shell: false, windowsHide: true });

    const stderrChunks: Buffer[] = [];
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    let interruption: string | null = null;
    let killTimer: NodeJS.Timeout | null = null;
    const interrupt = (reason: string): void => {
      if (interruption !== null) return;
      interruption = reason;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
    };

    const timer =
      request.timeoutMs > 0
        ? setTimeout(
            () => interrupt(`${program} timed out after ${request.timeoutMs}ms`),
            request.timeoutMs
          )
        : null;
    const onAbort = (): void => interrupt(`${program} was aborted`);
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const exited = new Promise<{ code: number | null; spawnError?: Error }>((resolve) => {
      child.once('error', (spawnError) => resolve({ code: null, spawnError }));
      child.once('close', (code) => resolve({ code }));
    });

    const output = pipeline(child.stdout, request.stdout).then(
      () => null,
      (error: unknown) => error
    );

    let input: Promise<unknown>;
    if (request.stdin !== null) {
      input = pipeline(request.stdin, child.stdin).then(
        () => null,
        (error: unknown) => error
      );
    } else {
      input = new Promise<unknown>((resolve) => {
        child.stdin.once('error', resolve);
        child.stdin.end(() => resolve(null));
      });
    }

    if (request.signal?.aborted) {
      onAbort();
    }

    try {
      const { code, spawnError } = await exited;
      const [outputError, inputError] = await Promise.all([output, input]);
      const stderr = Buffer.concat(stderrChunks).toString('utf8');

      if (spawnError) {
        return {
          exitCode: null,
          stderr,
          failure: `Failed to spawn ${program}: ${spawnError.message}. Ensure GPSBabel is installed.`,
        };
      }
      if (interruption !== null) {
        return { exitCode: null, stderr, failure: interruption };
      }
      if (inputError !== null && !isBrokenPipe(inputError)) {
        return { exitCode: code, stderr, failure: `Cannot stream source: ${errorMessage(inputError)}` };
      }
      if (outputError !== null) {
        return {
          exitCode: code,
          stderr,
          failure: `Cannot write converted output: ${errorMessage(outputError)}`,
        };
      }
      return { exitCode: code, stderr };
    } finally {
      if (timer !== null) clearTimeout(timer);
      if (killTimer !== null) clearTimeout(killTimer);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
