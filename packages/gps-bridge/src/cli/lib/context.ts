/**
 * Shared CLI plumbing: exit codes, common options, bridge construction
 *
 * @module cli/lib/context
 */

import type { Command } from 'commander';
import { ConversionBridge, type BridgeOpenOptions } from '../../bridge/conversion-bridge.js';
import { loadConfigFromEnv, type BridgeConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  OPEN_FAILED: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Options every command that opens a datasource accepts
 */
export interface SourceOptions {
  readonly driver?: string;
  readonly filename?: string;
  readonly useTempfile?: boolean;
  readonly timeout?: string;
}

export interface CLIContext {
  readonly env: NodeJS.ProcessEnv;
  createBridge(config: BridgeConfig): ConversionBridge;
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: ExitCode): void;
}

export function defaultContext(): CLIContext {
  return {
    env: process.env,
    createBridge: (config) => new ConversionBridge({ config }),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

export function addSourceOptions(command: Command): Command {
  return command
    .option('-d, --driver <name>', 'Converter input driver (when not embedded in the datasource)')
    .option('-f, --filename <path>', 'Source path (overrides the one embedded in the datasource)')
    .option('--use-tempfile', 'Write the converted artifact to disk instead of memory')
    .option('-t, --timeout <ms>', 'Per-attempt converter timeout in milliseconds');
}

/**
 * Resolve configuration from the environment plus command-line overrides
 *
 * @returns null (after reporting) when configuration is invalid
 */
export function resolveConfig(options: SourceOptions, ctx: CLIContext): BridgeConfig | null {
  let timeoutMs: number | undefined;
  if (options.timeout !== undefined) {
    if (!/^\d+$/.test(options.timeout)) {
      ctx.stderr(`Error: --timeout must be a non-negative integer, got ${options.timeout}`);
      ctx.setExitCode(EXIT_CODES.CONFIG_ERROR);
      return null;
    }
    timeoutMs = parseInt(options.timeout, 10);
  }

  try {
    return loadConfigFromEnv(ctx.env, {
      converter: timeoutMs !== undefined ? { timeoutMs } : {},
      temp: options.useTempfile ? { useTempFile: true } : {},
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      ctx.stderr(`Error: ${error.message}`);
      ctx.setExitCode(EXIT_CODES.CONFIG_ERROR);
      return null;
    }
    throw error;
  }
}

export function toOpenOptions(options: SourceOptions): BridgeOpenOptions {
  return {
    ...(options.driver !== undefined ? { driver: options.driver } : {}),
    ...(options.filename !== undefined ? { filename: options.filename } : {}),
  };
}
