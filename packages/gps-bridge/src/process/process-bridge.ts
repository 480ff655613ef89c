/**
 * Process Bridge
 *
 * Runs one converter invocation with standard output redirected into the
 * temp artifact and, in piped mode, standard input fed from the source.
 * The caller awaits the whole attempt; attempts never overlap.
 */

import type { Readable, Writable } from 'node:stream';
import type { ConversionOutcome, InvocationMode, ProcessInvocation } from '../core/types.js';
import type { FileStore } from '../storage/file-store.js';
import { createLogger } from '../core/utils/logger.js';
import { SpawnProcessRunner, type ProcessRunner, type SpawnResult } from './process-runner.js';

const log = createLogger({ module: 'process' });

export interface AttemptOptions {
  readonly mode: InvocationMode;
  /** Source stream for piped mode */
  readonly stdin?: Readable;
  /** Temp artifact receiving standard output */
  readonly outputPath: string;
  /** Keep converter diagnostics out of the warn channel; they are still captured */
  readonly quiet?: boolean;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

async function closeWritable(stream: Writable): Promise<void> {
  if (stream.writableFinished || stream.destroyed) {
    return;
  }
  await new Promise<void>((resolve) => {
    stream.once('error', (error) => {
      log.warn('Temp artifact stream failed to close', { error: error.message });
      resolve();
    });
    stream.end(() => resolve());
  });
}

function describeFailure(program: string, result: SpawnResult): string {
  const stderr = result.stderr.trim();
  if (result.failure !== undefined) {
    return stderr.length > 0 ? `${result.failure}\n${stderr}` : result.failure;
  }
  if (stderr.length > 0) {
    return stderr;
  }
  return `${program} exited with status ${result.exitCode ?? 'unknown'}`;
}

export class ProcessBridge {
  constructor(
    private readonly store: FileStore,
    private readonly runner: ProcessRunner = new SpawnProcessRunner(),
    private readonly defaultTimeoutMs: number = 0
  ) {}

  async run(invocation: ProcessInvocation, options: AttemptOptions): Promise<ConversionOutcome> {
    const started = Date.now();
    const program = invocation[0] ?? 'converter';

    log.debug('Starting converter', { mode: options.mode, argv: invocation });

    const output = await this.store.openWrite(options.outputPath);
    let result: SpawnResult;
    try {
      result = await this.runner.run({
        argv: invocation,
        stdin: options.stdin ?? null,
        stdout: output,
        timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
        signal: options.signal,
      });
    } finally {
      await closeWritable(output);
    }

    const success = result.failure === undefined && result.exitCode === 0;
    const outcome: ConversionOutcome = {
      success,
      exitCode: result.exitCode,
      diagnostic: success ? result.stderr.trim() : describeFailure(program, result),
      mode: options.mode,
      durationMs: Date.now() - started,
    };

    if (!success) {
      const meta = { mode: outcome.mode, exitCode: outcome.exitCode, diagnostic: outcome.diagnostic };
      if (options.quiet) {
        log.debug('Converter attempt failed', meta);
      } else {
        log.warn('Converter attempt failed', meta);
      }
    }

    return outcome;
  }
}
