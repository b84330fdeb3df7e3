/**
 * Tests for error types.
 */
import { describe, it, expect } from 'vitest';
import {
  BlueprintError,
  ValidationError,
  TemplateError,
  GenerationError,
  SecurityError,
  ConfigError,
  SystemError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('BlueprintError', () => {
  it('should carry code, message and details', () => {
    const error = new BlueprintError('X001', 'something failed', { path: 'a' });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('X001');
    expect(error.message).toBe('something failed');
    expect(error.details).toEqual({ path: 'a' });
    expect(error.name).toBe('BlueprintError');
  });

  it('should serialize to JSON', () => {
    const error = new ValidationError(ErrorCodes.MISSING_VALUE, 'no value', { variable: 'name' });

    expect(error.toJSON()).toEqual({
      name: 'ValidationError',
      code: 'V001',
      message: 'no value',
      details: { variable: 'name' },
    });
  });

  it('should keep its class through subclassing', () => {
    const cases: Array<[BlueprintError, string]> = [
      [new ValidationError(ErrorCodes.INVALID_TYPE, 'm'), 'ValidationError'],
      [new TemplateError(ErrorCodes.TEMPLATE_SYNTAX, 'm'), 'TemplateError'],
      [new GenerationError(ErrorCodes.OUTPUT_CONFLICT, 'm'), 'GenerationError'],
      [new SecurityError(ErrorCodes.PATH_TRAVERSAL, 'm'), 'SecurityError'],
      [new ConfigError(ErrorCodes.INVALID_DATA, 'm'), 'ConfigError'],
      [new SystemError(ErrorCodes.PARSE_ERROR, 'm'), 'SystemError'],
    ];

    for (const [error, name] of cases) {
      expect(error).toBeInstanceOf(BlueprintError);
      expect(error.name).toBe(name);
    }
  });
});

describe('ErrorCodes', () => {
  it('should use unique codes', () => {
    const codes = Object.values(ErrorCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });
});
