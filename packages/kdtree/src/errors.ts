/**
 * Errors raised before any build or traversal work starts.
 */

import type { ZodError } from 'zod';

/** Malformed argument: bad query shape, thread count, k, or build option. */
export class InvalidInputError extends Error {
  readonly kind = 'InvalidInput' as const;

  constructor(
    message: string,
    public readonly field: string,
    public readonly row?: number,
  ) {
    super(row === undefined ? message : `${message} (row ${row})`);
    this.name = 'InvalidInputError';
  }
}

/** Convert the first zod issue into an InvalidInputError. */
export function fromZodError(error: ZodError, field: string, row?: number): InvalidInputError {
  const issue = error.issues[0];
  const path = issue && issue.path.length > 0 ? `${field}.${issue.path.join('.')}` : field;
  return new InvalidInputError(`${path}: ${issue?.message ?? error.message}`, field, row);
}
