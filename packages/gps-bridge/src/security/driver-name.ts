/**
 * Converter Driver Name Validation
 *
 * The driver identifier ends up in the converter's argument vector. Arguments
 * are passed without a shell, but the converter (or a wrapper script standing
 * in for it) may re-interpret them, so only a small charset is accepted.
 *
 * SECURITY PRINCIPLE: Fail-secure. Reject before any process is spawned.
 */

import { z } from 'zod';
/**
 * Letters, digits, `_`, `=`, `.` and `,` (driver options are `,key=value`)
 */
export const DRIVER_NAME_PATTERN = /^[A-Za-z0-9_=.,]+$/;

export const DriverNameSchema = z
  .string()
  .min(1, 'Driver name must not be empty')
  .regex(DRIVER_NAME_PATTERN, 'Invalid GPSBabel driver name');

export type ValidatedDriverName = z.infer<typeof DriverNameSchema>;

export function isValidDriverName(name: string): boolean {
  return DRIVER_NAME_PATTERN.test(name);
}

/**
 * Validate a driver identifier. Callers report the rejection.
 */
export function validateDriverName(
  name: string
): { success: true; data: ValidatedDriverName } | { success: false; error: string } {
  const result = DriverNameSchema.safeParse(name);

  if (!result.success) {
    const errorMsg = result.error.errors[0]?.message ?? 'Invalid GPSBabel driver name';
    return { success: false, error: errorMsg };
  }

  return { success: true, data: result.data };
}
