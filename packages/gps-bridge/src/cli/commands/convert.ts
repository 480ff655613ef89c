/**
 * Convert Command
 *
 * Open a datasource through the converter and write its layers as GeoJSON:
 *
 *   { "layers": { "<name>": FeatureCollection, ... } }
 *
 * Usage:
 *   gps-bridge convert <datasource> [-o <file>] [options]
 */

import { writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import type { LayerCollection, LayerSet } from '../../core/types.js';
import { BridgeOpenError } from '../../core/errors.js';
import {
  addSourceOptions,
  EXIT_CODES,
  resolveConfig,
  toOpenOptions,
  type CLIContext,
  type SourceOptions,
} from '../lib/context.js';

interface ConvertOptions extends SourceOptions {
  readonly output?: string;
}

export interface ConvertedDocument {
  readonly layers: Record<string, LayerCollection>;
}

export function toDocument(layers: LayerSet): ConvertedDocument {
  const document: Record<string, LayerCollection> = {};
  for (const layer of layers) {
    document[layer.name] = layer.features;
  }
  return { layers: document };
}

export function registerConvertCommand(program: Command, ctx: CLIContext): void {
  addSourceOptions(
    program
      .command('convert <datasource>')
      .description('Convert a source and write its layers as GeoJSON')
      .option('-o, --output <file>', 'Output file (default: stdout)')
  ).action(async (datasource: string, options: ConvertOptions) => {
    await executeConvert(datasource, options, ctx);
  });
}

export async function executeConvert(
  datasource: string,
  options: ConvertOptions,
  ctx: CLIContext
): Promise<void> {
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

    const json = JSON.stringify(toDocument(result.data), null, 2);
    if (options.output) {
      await writeFile(options.output, json);
      const total = result.data.reduce((sum, layer) => sum + layer.featureCount, 0);
      ctx.stderr(`Wrote ${result.data.length} layer(s), ${total} feature(s) to ${options.output}`);
    } else {
      ctx.stdout(json);
    }
    ctx.setExitCode(EXIT_CODES.SUCCESS);
  } finally {
    await bridge.close();
  }
}
