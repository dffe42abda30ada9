/**
 * Program options and their validation
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const positiveInt = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be positive');

export const ProgramOptionsSchema = z.object({
  /** Window title */
  title: z.string().trim().min(1, 'cannot be empty').default('gridloop'),
  /** Initial window width in pixels */
  initialWidth: positiveInt.default(800),
  /** Initial window height in pixels */
  initialHeight: positiveInt.default(600),
  fontFamily: z.string().trim().min(1, 'cannot be empty').default('Monospace'),
  /** Font size in points */
  fontSize: z.number({ invalid_type_error: 'must be a number' }).positive('must be positive').default(12),
  /** Frame-rate cap; 0 renders every tick */
  fps: z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .nonnegative('must be non-negative')
    .default(60),
  /** Capacity of the bounded message channel */
  channelCapacity: positiveInt.default(100)
});

export type ProgramOptions = z.output<typeof ProgramOptionsSchema>;
export type ProgramOptionsInput = z.input<typeof ProgramOptionsSchema>;

/**
 * Window parameters handed to the surface when it is opened
 */
export type WindowOptions = Pick<
  ProgramOptions,
  'title' | 'initialWidth' | 'initialHeight' | 'fontFamily' | 'fontSize'
>;

/**
 * Apply defaults and validate. Throws ConfigurationError listing every violation.
 */
export function resolveProgramOptions(input: ProgramOptionsInput = {}): ProgramOptions {
  const result = ProgramOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError(issues);
  }
  return result.data;
}
