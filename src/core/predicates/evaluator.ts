/**
 * Evaluates predicates against resolved values.
 * Total: an absent variable is falsy and unequal to everything, and nothing throws.
 */
import type { ValueLookup, VariableValue } from '../values/types.js';
import type { Literal, Predicate } from './types.js';

export function evaluatePredicate(predicate: Predicate, values: ValueLookup): boolean {
  switch (predicate.kind) {
    case 'const':
      return predicate.value;
    case 'var':
      return isTruthy(values[predicate.name]);
    case 'eq':
      return equals(values[predicate.name], predicate.value);
    case 'ne':
      return !equals(values[predicate.name], predicate.value);
    case 'in': {
      const value = values[predicate.name];
      return predicate.values.some((candidate) => equals(value, candidate));
    }
    case 'not_in': {
      const value = values[predicate.name];
      return !predicate.values.some((candidate) => equals(value, candidate));
    }
    case 'not':
      return !evaluatePredicate(predicate.operand, values);
    case 'and':
      return predicate.operands.every((operand) => evaluatePredicate(operand, values));
    case 'or':
      return predicate.operands.some((operand) => evaluatePredicate(operand, values));
  }
}

function isTruthy(value: VariableValue | undefined): boolean {
  if (!value) return false;
  switch (value.type) {
    case 'bool':
      return value.value;
    case 'str':
      return value.value.length > 0;
    case 'choice':
      return true;
  }
}

function equals(value: VariableValue | undefined, literal: Literal): boolean {
  return value !== undefined && value.value === literal;
}

/**
 * Variable names a predicate reads, in first-seen order.
 */
export function predicateVariables(predicate: Predicate): string[] {
  const names = new Set<string>();
  const visit = (node: Predicate): void => {
    switch (node.kind) {
      case 'const':
        return;
      case 'not':
        visit(node.operand);
        return;
      case 'and':
      case 'or':
        node.operands.forEach(visit);
        return;
      default:
        names.add(node.name);
    }
  };
  visit(predicate);
  return [...names];
}
