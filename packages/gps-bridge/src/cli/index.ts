/**
 * gps-bridge CLI
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerConvertCommand } from './commands/convert.js';
import { registerInfoCommand } from './commands/info.js';
import { defaultContext, type CLIContext } from './lib/context.js';

export const CLI_NAME = 'gps-bridge';
export const CLI_VERSION = '0.1.0';

export * from './lib/context.js';
export * from './lib/output.js';

export function createProgram(ctx: CLIContext = defaultContext()): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Convert GPS device and vendor formats to GeoJSON layers through GPSBabel')
    .version(CLI_VERSION);

  registerInfoCommand(program, ctx);
  registerConvertCommand(program, ctx);

  return program;
}
