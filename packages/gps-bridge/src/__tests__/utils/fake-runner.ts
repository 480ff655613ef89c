/**
 * Recording ProcessRunner for bridge tests
 *
 * Each call consumes the next scripted attempt: it records the argument
 * vector and whatever was streamed to stdin, writes the scripted stdout into
 * the artifact stream, and reports the scripted status.
 */

import { readFileSync } from 'node:fs';
import type { Readable, Writable } from 'node:stream';
import type { ProcessRunner, SpawnRequest, SpawnResult } from '../../process/process-runner.js';

export interface ScriptedAttempt {
  readonly exitCode: number | null;
  readonly stdout?: string;
  readonly stderr?: string;
  readonly failure?: string;
}

export interface RecordedCall {
  readonly argv: readonly string[];
  readonly stdin: string | null;
  readonly timeoutMs: number;
}

export async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function endWith(stream: Writable, text: string): Promise<void> {
  return new Promise((resolve) => {
    stream.end(text, () => resolve());
  });
}

export class RecordingRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: readonly ScriptedAttempt[]) {}

  async run(request: SpawnRequest): Promise<SpawnResult> {
    const stdin = request.stdin === null ? null : await readAll(request.stdin);
    this.calls.push({ argv: [...request.argv], stdin, timeoutMs: request.timeoutMs });

    const step = this.script[this.calls.length - 1];
    if (step === undefined) {
      throw new Error(`Unexpected converter call #${this.calls.length}: ${request.argv.join(' ')}`);
    }

    await endWith(request.stdout, step.stdout ?? '');
    return {
      exitCode: step.exitCode,
      stderr: step.stderr ?? '',
      ...(step.failure !== undefined ? { failure: step.failure } : {}),
    };
  }
}

export function fixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}
