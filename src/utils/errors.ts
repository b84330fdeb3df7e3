/**
 * Error types and codes for blueprinter.
 * Every error raised by the resolver or its shell extends BlueprintError.
 */

/**
 * Base error class for all blueprinter errors.
 */
export class BlueprintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BlueprintError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A variable has no resolvable value, its value violates its declared
 * type or constraint, or the definitions themselves are inconsistent.
 * Error codes: V001-V008
 */
export class ValidationError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * A template or predicate is malformed or references an undeclared variable.
 * Error codes: T001-T007
 */
export class TemplateError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Output errors: files in the destination that generation would clobber.
 * Error codes: G001
 */
export class GenerationError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GenerationError';
  }
}

/**
 * Security errors (rendered output paths escaping the destination).
 */
export class SecurityError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

/**
 * Command-line configuration errors (bad --data pairs, unreadable data files).
 */
export class ConfigError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (manifest not found, parse errors, etc.).
 * Error codes: S001-S004
 */
export class SystemError extends BlueprintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Validation errors (V001-V008)
  MISSING_VALUE: 'V001',
  INVALID_TYPE: 'V002',
  INVALID_CHOICE: 'V003',
  CONSTRAINT_FAILED: 'V004',
  DEFAULT_CYCLE: 'V005',
  INVALID_DEFAULT: 'V006',
  UNKNOWN_LIST: 'V007',
  INVALID_DEFINITION: 'V008',

  // Template errors (T001-T007)
  UNDEFINED_VARIABLE: 'T001',
  TEMPLATE_SYNTAX: 'T002',
  PREDICATE_SYNTAX: 'T003',
  PREDICATE_TYPE_MISMATCH: 'T004',
  UNKNOWN_FILTER: 'T005',
  RULE_MATCHES_NOTHING: 'T006',
  DUPLICATE_PATH: 'T007',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  INVALID_MANIFEST: 'S002',
  BLUEPRINT_NOT_FOUND: 'S003',
  ANSWERS_NOT_FOUND: 'S004',

  // Generation errors
  OUTPUT_CONFLICT: 'G001',

  // Configuration errors
  INVALID_DATA: 'C001',

  // Security errors
  PATH_TRAVERSAL: 'SEC001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
