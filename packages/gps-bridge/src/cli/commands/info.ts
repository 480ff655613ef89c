/**
 * Info Command
 *
 * Open a datasource through the converter and list its layers.
 *
 * Usage:
 *   gps-bridge info <datasource> [options]
 *
 * Examples:
 *   gps-bridge info GPSBABEL:garmin:features=waypoints:/data/track.gdb
 *   gps-bridge info /data/track.gdb --driver garmin --format json
 *   gps-bridge info GPSBABEL:garmin:usb:
 */

import type { Command } from 'commander';
import { BridgeOpenError } from '../../core/errors.js';
import {
  addSourceOptions,
  EXIT_CODES,
  resolveConfig,
  toOpenOptions,
  type CLIContext,
  type SourceOptions,
} from '../lib/context.js';
import { formatOutput, LAYER_COLUMNS, summarizeLayers, type OutputFormat } from '../lib/output.js';

interface InfoOptions extends SourceOptions {
  readonly format: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json' || value === 'csv';
}

export function registerInfoCommand(program: Command, ctx: CLIContext): void {
  addSourceOptions(
    program
      .command('info <datasource>')
      .description('Convert a source and list the resulting layers')
      .option('--format <fmt>', 'Output format: table|json|csv', 'table')
  ).action(async (datasource: string, options: InfoOptions) => {
    await executeInfo(datasource, options, ctx);
  });
}

export async function executeInfo(
  datasource: string,
  options: InfoOptions,
  ctx: CLIContext
): Promise<void> {
  if (!isOutputFormat(options.format)) {
    ctx.stderr(`Error: Unknown format ${options.format}`);
    ctx.setExitCode(EXIT_CODES.CONFIG_ERROR);
    return;
  }

  const config = resolveConfig(options, ctx);
  if (config === null) return;

  const bridge = ctx.createBridge(config);
  try {
    const result = await bridge.open(datasource, toOpenOptions(options));
    if (!result.success) {
      ctx.stderr(new BridgeOpenError(result.error).getSummary());
      ctx.setExitCode(EXIT_CODES.OPEN_FAILED);
      return;
    }

    ctx.stdout(formatOutput(summarizeLayers(result.data), options.format, LAYER_COLUMNS));
    ctx.setExitCode(EXIT_CODES.SUCCESS);
  } finally {
    await bridge.close();
  }
}
