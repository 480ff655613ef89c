/**
 * Bridge Configuration
 *
 * Defaults plus a deep-merge helper, and a loader that resolves the
 * environment once so nothing downstream reads process.env ad hoc.
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export interface BridgeConfig {
  readonly converter: {
    /** Executable name or path */
    readonly program: string;
    /** Value of the `-o` argument */
    readonly outputFormat: string;
    /** Per-attempt timeout; 0 waits for the converter indefinitely */
    readonly timeoutMs: number;
  };

  readonly temp: {
    /** Write the converted artifact to persistent storage instead of memory */
    readonly useTempFile: boolean;
    readonly directory: string;
  };
}

export const DEFAULT_CONFIG: BridgeConfig = {
  converter: {
    program: 'gpsbabel',
    outputFormat: 'gpx,gpxver=1.1',
    timeoutMs: 0,
  },
  temp: {
    useTempFile: false,
    directory: tmpdir(),
  },
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export function createConfig(overrides: DeepPartial<BridgeConfig> = {}): BridgeConfig {
  return {
    converter: {
      ...DEFAULT_CONFIG.converter,
      ...overrides.converter,
    },
    temp: {
      ...DEFAULT_CONFIG.temp,
      ...overrides.temp,
    },
  };
}

// ============================================================================
// Environment
// ============================================================================

const FALSE_VALUES = new Set(['no', 'off', 'false', '0']);

/**
 * Boolean-like switch: unset is false; once set, only NO, OFF, FALSE and 0
 * (case-insensitive) are false
 */
export function parseBooleanLike(value: string | undefined): boolean {
  return value !== undefined && !FALSE_VALUES.has(value.trim().toLowerCase());
}

const EnvSchema = z.object({
  GPSBABEL_PATH: z.string().min(1, 'GPSBABEL_PATH must not be empty').optional(),
  GPSBABEL_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'GPSBABEL_TIMEOUT_MS must be a non-negative integer')
    .optional(),
  GPSBABEL_TMPDIR: z.string().min(1, 'GPSBABEL_TMPDIR must not be empty').optional(),
  USE_TEMPFILE: z.string().optional(),
});

/**
 * Resolve configuration from environment variables
 *
 * Environment variables:
 * - GPSBABEL_PATH: converter executable
 * - GPSBABEL_TIMEOUT_MS: per-attempt timeout
 * - GPSBABEL_TMPDIR: directory for durable temp artifacts
 * - USE_TEMPFILE: boolean-like durable temp artifact switch
 *
 * @throws ConfigurationError when a variable is present but malformed
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: DeepPartial<BridgeConfig> = {}
): BridgeConfig {
  const parsed = EnvSchema.safeParse({
    GPSBABEL_PATH: env.GPSBABEL_PATH,
    GPSBABEL_TIMEOUT_MS: env.GPSBABEL_TIMEOUT_MS,
    GPSBABEL_TMPDIR: env.GPSBABEL_TMPDIR,
    USE_TEMPFILE: env.USE_TEMPFILE,
  });

  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  const fromEnv: DeepPartial<BridgeConfig> = {
    converter: {
      ...(vars.GPSBABEL_PATH !== undefined ? { program: vars.GPSBABEL_PATH } : {}),
      ...(vars.GPSBABEL_TIMEOUT_MS !== undefined
        ? { timeoutMs: parseInt(vars.GPSBABEL_TIMEOUT_MS, 10) }
        : {}),
    },
    temp: {
      ...(vars.USE_TEMPFILE !== undefined
        ? { useTempFile: parseBooleanLike(vars.USE_TEMPFILE) }
        : {}),
      ...(vars.GPSBABEL_TMPDIR !== undefined ? { directory: vars.GPSBABEL_TMPDIR } : {}),
    },
  };

  return createConfig({
    converter: { ...fromEnv.converter, ...overrides.converter },
    temp: { ...fromEnv.temp, ...overrides.temp },
  });
}
