/**
 * The scaffold resolver: answers in, resolved configuration, file
 * selection and rendered text out. Pure and synchronous.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { evaluatePredicate } from '../predicates/evaluator.js';
import { renderTemplate } from '../template/renderer.js';
import { createRandomSource, type RandomSource } from '../random/source.js';
import type { AnswerSet, AnswerValue, ValueLookup, VariableValue } from '../values/types.js';
import type { Blueprint, FileDescriptor, VariableDefinition } from '../blueprint/types.js';
import { coerceAnswer } from './coerce.js';
import { checkConstraint } from './constraints.js';

export interface ResolvedConfig {
  values: Readonly<Record<string, VariableValue>>;
  /** Resolution order */
  order: readonly string[];
  /** Answer keys with no matching variable, sorted */
  ignored: readonly string[];
  /** Seed of the random source the defaults were drawn from */
  seed: string;
  /** Unanswered variables whose `when` was false; they hold a default, not an answer */
  skipped: readonly string[];
}

export interface ResolveOptions {
  random?: RandomSource;
}

/**
 * Resolve every variable of `blueprint` in resolution order.
 */
export function resolve(
  blueprint: Blueprint,
  answers: AnswerSet,
  options: ResolveOptions = {}
): ResolvedConfig {
  const random = options.random ?? createRandomSource();
  const byName = new Map(blueprint.variables.map((definition) => [definition.name, definition]));
  const values: Record<string, VariableValue> = {};
  const skipped: string[] = [];

  for (const name of blueprint.order) {
    const definition = byName.get(name);
    if (!definition) continue;
    const answer = answerFor(answers, name);
    if (answer === undefined && !isAsked(definition, values)) {
      skipped.push(name);
    }
    values[name] = resolveVariable(definition, answer, values, random);
  }

  const ignored = Object.keys(answers)
    .filter((key) => !byName.has(key))
    .sort();

  return { values, order: [...blueprint.order], ignored, seed: random.seed, skipped };
}

/**
 * Resolve one variable against the values resolved before it.
 */
export function resolveVariable(
  definition: VariableDefinition,
  answer: AnswerValue | undefined,
  values: ValueLookup,
  random: RandomSource
): VariableValue {
  if (answer !== undefined) {
    return acceptAnswer(definition, answer);
  }

  if (!isAsked(definition, values)) {
    return computeDefault(definition, values, random) ?? emptyValue(definition);
  }

  const value = computeDefault(definition, values, random);
  if (value === undefined) {
    throw new ValidationError(
      ErrorCodes.MISSING_VALUE,
      `Variable '${definition.name}' has no answer and no default`,
      { variable: definition.name }
    );
  }
  validateValue(definition, value);
  return value;
}

/**
 * Coerce and validate a supplied answer.
 */
export function acceptAnswer(definition: VariableDefinition, answer: AnswerValue): VariableValue {
  const value = coerceAnswer(definition, answer);
  validateValue(definition, value);
  return value;
}

/**
 * Whether the variable's `when` holds for the values resolved so far.
 */
export function isAsked(definition: VariableDefinition, values: ValueLookup): boolean {
  return definition.when === undefined || evaluatePredicate(definition.when, values);
}

/**
 * The variable's default as a typed value, or undefined when it has none.
 * A bool with no default is false.
 */
export function computeDefault(
  definition: VariableDefinition,
  values: ValueLookup,
  random: RandomSource
): VariableValue | undefined {
  const spec = definition.default;
  if (spec === undefined) {
    return definition.type === 'bool' ? { type: 'bool', value: false } : undefined;
  }

  switch (spec.kind) {
    case 'literal':
      return coerceAnswer(definition, spec.value);
    case 'template':
      return coerceAnswer(definition, renderTemplate(spec.template, values));
    case 'random':
      return coerceAnswer(definition, random.pick(spec.items, definition.name));
  }
}

/**
 * Evaluate each file's rules against the config. Keeps corpus order.
 */
export function selectFiles(blueprint: Blueprint, config: ResolvedConfig): FileDescriptor[] {
  return blueprint.files.filter((file) =>
    file.rules.every((rule) => evaluatePredicate(rule.when, config.values))
  );
}

/**
 * Rendered body of a template file, or the content of a verbatim file.
 */
export function render(file: FileDescriptor, config: ResolvedConfig): string {
  return file.kind === 'template' ? renderTemplate(file.template, config.values) : file.content;
}

/**
 * Rendered output path of a file, relative to the destination.
 */
export function renderPath(file: FileDescriptor, config: ResolvedConfig): string {
  return renderTemplate(file.target, config.values);
}

/**
 * The resolver bound to one blueprint.
 */
export class ScaffoldResolver {
  constructor(readonly blueprint: Blueprint) {}

  resolve(answers: AnswerSet, options: ResolveOptions = {}): ResolvedConfig {
    return resolve(this.blueprint, answers, options);
  }

  selectFiles(config: ResolvedConfig): FileDescriptor[] {
    return selectFiles(this.blueprint, config);
  }

  render(file: FileDescriptor, config: ResolvedConfig): string {
    return render(file, config);
  }

  renderPath(file: FileDescriptor, config: ResolvedConfig): string {
    return renderPath(file, config);
  }
}

function validateValue(definition: VariableDefinition, value: VariableValue): void {
  if (definition.constraint && value.type === 'str') {
    checkConstraint(definition.name, definition.constraint, value.value);
  }
}

function emptyValue(definition: VariableDefinition): VariableValue {
  switch (definition.type) {
    case 'str':
      return { type: 'str', value: '' };
    case 'bool':
      return { type: 'bool', value: false };
    case 'choice': {
      const options = definition.choices.map((choice) => choice.value);
      return { type: 'choice', value: options[0] ?? '', options };
    }
  }
}

function answerFor(answers: AnswerSet, name: string): AnswerValue | undefined {
  return Object.hasOwn(answers, name) ? answers[name] : undefined;
}
