/**
 * Bridge Error Types
 *
 * Failures are returned as a tagged union so callers (and the retry policy)
 * can switch on `kind`. `BridgeOpenError` wraps one for code paths that
 * prefer exceptions: `openOrThrow()` and the CLI.
 */

export type BridgeErrorKind =
  | 'InvalidRequestSyntax'
  | 'InvalidDriverName'
  | 'SourceUnreadable'
  | 'ConversionFailed'
  | 'PipingUnsupportedRetryable'
  | 'PipingUnsupportedNonRetryable'
  | 'ArtifactUnreadable'
  | 'EmptyResult';

export interface BridgeError {
  readonly kind: BridgeErrorKind;
  readonly message: string;
  /** Converter standard-error text, when a process ran */
  readonly diagnostic?: string;
  /** Exit status of the last attempt, when a process ran */
  readonly exitCode?: number | null;
}

export function bridgeError(
  kind: BridgeErrorKind,
  message: string,
  details: { readonly diagnostic?: string; readonly exitCode?: number | null } = {}
): BridgeError {
  return { kind, message, ...details };
}

/**
 * Result union used by every bridge operation
 */
export type Result<T, E = BridgeError> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(data: T): { readonly success: true; readonly data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

/**
 * Error thrown when an Open fails and the caller asked for an exception
 *
 * RECOVERY:
 * - InvalidRequestSyntax / InvalidDriverName: fix the datasource string
 * - SourceUnreadable: check the path and permissions
 * - ConversionFailed: read `diagnostic`, it is the converter's own message
 * - PipingUnsupportedNonRetryable: copy the source to real storage first
 * - EmptyResult: widen the `features=` filter or check the input
 */
export class BridgeOpenError extends Error {
  constructor(public readonly error: BridgeError) {
    super(error.message);
    this.name = 'BridgeOpenError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BridgeOpenError);
    }
  }

  get kind(): BridgeErrorKind {
    return this.error.kind;
  }

  getSummary(): string {
    const lines = [`${this.error.kind}: ${this.error.message}`];
    if (this.error.exitCode !== undefined) {
      lines.push(`  exit status: ${this.error.exitCode ?? 'none'}`);
    }
    if (this.error.diagnostic && this.error.diagnostic !== this.error.message) {
      lines.push(`  converter said: ${this.error.diagnostic}`);
    }
    return lines.join('\n');
  }
}

/**
 * Error thrown when configuration values from the environment are invalid
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
