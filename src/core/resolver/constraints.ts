/**
 * `validate:` constraints on str variables.
 */
import { z } from 'zod';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { Constraint } from '../blueprint/types.js';

const EmailSchema = z.email();
const SLUG_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

export function describeConstraint(constraint: Constraint): string {
  return constraint.kind === 'pattern' ? `pattern /${constraint.pattern}/` : constraint.kind;
}

export function satisfies(constraint: Constraint, value: string): boolean {
  switch (constraint.kind) {
    case 'non_empty':
      return value.trim() !== '';
    case 'email':
      return EmailSchema.safeParse(value).success;
    case 'slug':
      return SLUG_PATTERN.test(value);
    case 'pattern':
      return constraint.regex.test(value);
  }
}

/**
 * Throw ValidationError(CONSTRAINT_FAILED) unless `value` satisfies `constraint`.
 */
export function checkConstraint(variable: string, constraint: Constraint, value: string): void {
  if (satisfies(constraint, value)) {
    return;
  }
  const rule = describeConstraint(constraint);
  throw new ValidationError(
    ErrorCodes.CONSTRAINT_FAILED,
    `Variable '${variable}': ${JSON.stringify(value)} fails constraint ${rule}`,
    { variable, value, constraint: rule }
  );
}
