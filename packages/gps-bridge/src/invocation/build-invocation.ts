/**
 * Converter command line construction
 *
 *   [program] [-w] [-r] [-t] -i <driver> -f <input> -o <format> -F -
 *
 * Pure: the same request and token always produce the same vector.
 */

import type { ConversionRequest, ProcessInvocation } from '../core/types.js';
import { DEFAULT_CONFIG } from '../core/config.js';

/** `-f -`: read the source from standard input */
export const STDIN_TOKEN = '-';

/** `-F -`: write the converted output to standard output */
export const STDOUT_TOKEN = '-';

export interface InvocationOptions {
  readonly program?: string;
  readonly outputFormat?: string;
}

export function buildInvocation(
  request: ConversionRequest,
  inputToken: string,
  options: InvocationOptions = {}
): ProcessInvocation {
  const argv: string[] = [options.program ?? DEFAULT_CONFIG.converter.program];

  if (request.explicitFeatures) {
    if (request.categories.waypoints) argv.push('-w');
    if (request.categories.routes) argv.push('-r');
    if (request.categories.tracks) argv.push('-t');
  }

  argv.push(
    '-i', request.driver,
    '-f', inputToken,
    '-o', options.outputFormat ?? DEFAULT_CONFIG.converter.outputFormat,
    '-F', STDOUT_TOKEN
  );

  return Object.freeze(argv);
}
