/**
 * Predicate exports barrel file.
 */
export { parsePredicate, predicateFromSource } from './parser.js';
export { evaluatePredicate, predicateVariables } from './evaluator.js';
export { checkPredicate } from './checker.js';
export type { Predicate, Literal } from './types.js';
