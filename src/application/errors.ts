import type { ZodIssue } from 'zod';

/**
 * Raised by read-path operations when the caller supplies an invalid query
 * (bad filter values, negative depth). Never raised for problems in the log
 * data itself.
 */
export class InvalidQueryError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}
