/**
 * Tests for predicate evaluation.
 */
import { describe, it, expect } from 'vitest';
import { evaluatePredicate, predicateVariables } from '../../../../src/core/predicates/evaluator.js';
import { parsePredicate } from '../../../../src/core/predicates/parser.js';
import type { ValueLookup } from '../../../../src/core/values/types.js';

const values: ValueLookup = {
  project_type: { type: 'choice', value: 'Python', options: ['Python', 'PHP', 'Generic'] },
  use_git: { type: 'bool', value: true },
  include_testing: { type: 'bool', value: false },
  project_name: { type: 'str', value: 'demo' },
  empty: { type: 'str', value: '' },
};

const evaluate = (source: string): boolean => evaluatePredicate(parsePredicate(source), values);

describe('evaluatePredicate', () => {
  it('should compare choice values', () => {
    expect(evaluate('project_type == "Python"')).toBe(true);
    expect(evaluate('project_type == "PHP"')).toBe(false);
    expect(evaluate('project_type != "PHP"')).toBe(true);
  });

  it('should test membership', () => {
    expect(evaluate('project_type in ["PHP", "Python"]')).toBe(true);
    expect(evaluate('project_type not in ["PHP", "Python"]')).toBe(false);
  });

  it('should use truthiness for bare variables', () => {
    expect(evaluate('use_git')).toBe(true);
    expect(evaluate('include_testing')).toBe(false);
    expect(evaluate('project_name')).toBe(true);
    expect(evaluate('empty')).toBe(false);
    expect(evaluate('project_type')).toBe(true);
  });

  it('should combine with and, or and not', () => {
    expect(evaluate('use_git and not include_testing')).toBe(true);
    expect(evaluate('include_testing or project_type == "PHP"')).toBe(false);
  });

  it('should compare bools with boolean literals', () => {
    expect(evaluate('use_git == true')).toBe(true);
    expect(evaluate('include_testing != false')).toBe(false);
  });

  it('should treat absent variables as falsy and unequal without throwing', () => {
    expect(evaluate('missing')).toBe(false);
    expect(evaluate('missing == "x"')).toBe(false);
    expect(evaluate('missing != "x"')).toBe(true);
    expect(evaluate('missing in ["x"]')).toBe(false);
    expect(evaluate('missing not in ["x"]')).toBe(true);
  });
});

describe('predicateVariables', () => {
  it('should list variables in first-seen order without duplicates', () => {
    expect(predicateVariables(parsePredicate('b and (a or b == "x") and not c'))).toEqual(['b', 'a', 'c']);
  });

  it('should return nothing for constants', () => {
    expect(predicateVariables(parsePredicate('true'))).toEqual([]);
  });
});
