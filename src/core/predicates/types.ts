/**
 * Predicate AST shared by file rules, `when` clauses and `{{#if}}` blocks.
 */

export type Literal = string | boolean;

export type Predicate =
  | { kind: 'const'; value: boolean }
  | { kind: 'var'; name: string }
  | { kind: 'eq' | 'ne'; name: string; value: Literal }
  | { kind: 'in' | 'not_in'; name: string; values: readonly Literal[] }
  | { kind: 'not'; operand: Predicate }
  | { kind: 'and' | 'or'; operands: readonly Predicate[] };
