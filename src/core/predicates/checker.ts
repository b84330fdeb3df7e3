/**
 * Load-time checks for predicates: every variable must be declared and every
 * comparison must be able to succeed for some value of that variable.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { SignatureLookup, VariableSignature } from '../values/types.js';
import type { Literal, Predicate } from './types.js';

/**
 * Throw a TemplateError if the predicate references an undeclared variable or
 * compares a variable with a literal it can never equal.
 */
export function checkPredicate(predicate: Predicate, lookup: SignatureLookup, origin: string): void {
  switch (predicate.kind) {
    case 'const':
      return;
    case 'not':
      checkPredicate(predicate.operand, lookup, origin);
      return;
    case 'and':
    case 'or':
      for (const operand of predicate.operands) {
        checkPredicate(operand, lookup, origin);
      }
      return;
    case 'var':
      requireSignature(predicate.name, lookup, origin);
      return;
    case 'eq':
    case 'ne': {
      const signature = requireSignature(predicate.name, lookup, origin);
      checkLiteral(predicate.name, signature, predicate.value, origin);
      return;
    }
    case 'in':
    case 'not_in': {
      const signature = requireSignature(predicate.name, lookup, origin);
      for (const value of predicate.values) {
        checkLiteral(predicate.name, signature, value, origin);
      }
      return;
    }
  }
}

function requireSignature(name: string, lookup: SignatureLookup, origin: string): VariableSignature {
  const signature = lookup(name);
  if (!signature) {
    throw new TemplateError(
      ErrorCodes.UNDEFINED_VARIABLE,
      `${origin} references undeclared variable '${name}'`,
      { variable: name, origin }
    );
  }
  return signature;
}

function checkLiteral(
  name: string,
  signature: VariableSignature,
  literal: Literal,
  origin: string
): void {
  const isBoolVariable = signature.type === 'bool';
  if (isBoolVariable !== (typeof literal === 'boolean')) {
    throw new TemplateError(
      ErrorCodes.PREDICATE_TYPE_MISMATCH,
      `${origin} compares ${signature.type} variable '${name}' with ${JSON.stringify(literal)}`,
      { variable: name, origin, literal }
    );
  }

  if (signature.type === 'choice' && typeof literal === 'string' && !signature.options.includes(literal)) {
    throw new TemplateError(
      ErrorCodes.PREDICATE_TYPE_MISMATCH,
      `${origin} compares '${name}' with "${literal}", which is not one of its choices (${signature.options.join(', ')})`,
      { variable: name, origin, literal, options: signature.options }
    );
  }
}
