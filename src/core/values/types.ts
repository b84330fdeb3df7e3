/**
 * Typed variable values.
 *
 * Answers arrive loosely typed (strings from the command line, scalars from
 * YAML); once resolved, every value carries its variable's type.
 */

export type VariableType = 'str' | 'bool' | 'choice';

export type VariableValue =
  | { type: 'str'; value: string }
  | { type: 'bool'; value: boolean }
  | { type: 'choice'; value: string; options: readonly string[] };

/** A raw answer as supplied by the user, a data file, or an answers file. */
export type AnswerValue = string | boolean;

/** Variable name → raw answer. */
export type AnswerSet = Readonly<Record<string, AnswerValue>>;

/**
 * Read-only view of resolved values. Lookups may miss: predicates and
 * templates can be evaluated against a partially resolved set.
 */
export type ValueLookup = Readonly<Partial<Record<string, VariableValue>>>;

/**
 * The part of a variable definition that predicates and templates are
 * checked against at load time.
 */
export interface VariableSignature {
  type: VariableType;
  /** Option values for choice variables, empty otherwise */
  options: readonly string[];
}

export type SignatureLookup = (name: string) => VariableSignature | undefined;

/**
 * The raw answer form of a resolved value, as recorded in answers files.
 */
export function toAnswer(value: VariableValue): AnswerValue {
  return value.value;
}

/**
 * Text form of a value as substituted into templates.
 */
export function formatValue(value: VariableValue): string {
  return value.type === 'bool' ? String(value.value) : value.value;
}
