/**
 * Retry policy for piped conversions
 *
 * Some converter input formats refuse standard input. When the first (piped)
 * attempt fails with that marker and the source is a real file, exactly one
 * direct attempt is made against the source path. Nothing else is retried.
 *
 *   Initial ──ok──────────────────────────────▶ Terminal(success)
 *      │ ──other failure────────────────────────▶ Terminal(failure)
 *      │ ──marker, virtual or missing source───▶ Terminal(failure)
 *      └──marker, real source──▶ RetryingDirect ──▶ Terminal(success|failure)
 */

import type { ConversionOutcome, SourceKind } from '../core/types.js';
import { bridgeError, type BridgeError } from '../core/errors.js';

export const PIPING_UNSUPPORTED_MARKER = 'This format cannot be used in piped commands';

export type TerminalState =
  | { readonly state: 'Terminal'; readonly success: true; readonly outcome: ConversionOutcome }
  | { readonly state: 'Terminal'; readonly success: false; readonly error: BridgeError };

export type RetryState =
  | { readonly state: 'Initial' }
  | { readonly state: 'RetryingDirect'; readonly firstAttempt: ConversionOutcome }
  | TerminalState;

export interface FirstAttemptContext {
  readonly outcome: ConversionOutcome;
  readonly sourceKind: SourceKind;
  readonly driver: string;
  /** Whether the source path is a real (non-virtual) file another process can open */
  readonly sourceIsRealFile: boolean;
}

export function isPipingUnsupported(diagnostic: string): boolean {
  return diagnostic.includes(PIPING_UNSUPPORTED_MARKER);
}

function conversionFailed(outcome: ConversionOutcome): TerminalState {
  return {
    state: 'Terminal',
    success: false,
    error: bridgeError('ConversionFailed', outcome.diagnostic, {
      diagnostic: outcome.diagnostic,
      exitCode: outcome.exitCode,
    }),
  };
}

/**
 * Decide what follows the first attempt
 */
export function classifyAttempt(
  context: FirstAttemptContext
): TerminalState | Extract<RetryState, { state: 'RetryingDirect' }> {
  const { outcome } = context;

  if (outcome.success) {
    return { state: 'Terminal', success: true, outcome };
  }

  if (
    context.sourceKind !== 'regular' ||
    outcome.mode !== 'piped' ||
    !isPipingUnsupported(outcome.diagnostic)
  ) {
    return conversionFailed(outcome);
  }

  if (!context.sourceIsRealFile) {
    return {
      state: 'Terminal',
      success: false,
      error: bridgeError(
        'PipingUnsupportedNonRetryable',
        `Driver ${context.driver} only supports real (non virtual) files`,
        { diagnostic: outcome.diagnostic, exitCode: outcome.exitCode }
      ),
    };
  }

  return { state: 'RetryingDirect', firstAttempt: outcome };
}

/**
 * The direct retry is final whatever it returns
 */
export function afterRetry(retry: ConversionOutcome): TerminalState {
  if (retry.success) {
    return { state: 'Terminal', success: true, outcome: retry };
  }

  return {
    state: 'Terminal',
    success: false,
    error: bridgeError(
      'PipingUnsupportedRetryable',
      `Direct retry after piping was refused also failed: ${retry.diagnostic}`,
      { diagnostic: retry.diagnostic, exitCode: retry.exitCode }
    ),
  };
}
