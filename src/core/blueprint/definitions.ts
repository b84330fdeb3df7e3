/**
 * Compiles manifest variable specs into checked VariableDefinitions.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { predicateFromSource } from '../predicates/parser.js';
import { checkPredicate } from '../predicates/checker.js';
import { compileTemplate } from '../template/parser.js';
import { checkTemplate } from '../template/checker.js';
import type { SignatureLookup, VariableType } from '../values/types.js';
import type { Manifest, VariableSpec } from './schema.js';
import type { ChoiceOption, Constraint, DefaultSpec, VariableDefinition } from './types.js';

/**
 * Compile every variable of a manifest, in declaration order.
 * References between variables are checked once all of them are known.
 */
export function compileVariables(manifest: Manifest): VariableDefinition[] {
  const definitions = Object.entries(manifest.variables).map(([name, spec]) =>
    compileVariable(name, spec, manifest.lists)
  );

  const lookup = createSignatureLookup(definitions);
  for (const definition of definitions) {
    if (definition.default?.kind === 'template') {
      checkTemplate(definition.default.template, lookup);
    }
    if (definition.when) {
      checkPredicate(definition.when, lookup, `'when' of variable '${definition.name}'`);
    }
  }

  return definitions;
}

export function createSignatureLookup(definitions: readonly VariableDefinition[]): SignatureLookup {
  const byName = new Map(definitions.map((definition) => [definition.name, definition]));
  return (name) => {
    const definition = byName.get(name);
    if (!definition) return undefined;
    return { type: definition.type, options: definition.choices.map((choice) => choice.value) };
  };
}

function compileVariable(
  name: string,
  spec: VariableSpec,
  lists: Readonly<Record<string, readonly string[]>>
): VariableDefinition {
  const choices = compileChoices(name, spec);
  return {
    name,
    type: spec.type,
    help: spec.help ?? name,
    choices,
    default: compileDefault(name, spec, choices, lists),
    when: spec.when === undefined ? undefined : predicateFromSource(spec.when, `'when' of variable '${name}'`),
    constraint: compileConstraint(name, spec),
    secret: spec.secret,
  };
}

function compileChoices(name: string, spec: VariableSpec): ChoiceOption[] {
  if (spec.type !== 'choice') {
    if (spec.choices !== undefined) {
      throw definitionError(name, `only choice variables take 'choices' (type is ${spec.type})`);
    }
    return [];
  }

  if (spec.choices === undefined) {
    throw definitionError(name, "choice variables need a non-empty 'choices' list");
  }

  const options: ChoiceOption[] = Array.isArray(spec.choices)
    ? spec.choices.map((value) => ({ label: value, value }))
    : Object.entries(spec.choices).map(([label, value]) => ({ label, value }));

  const seen = new Set<string>();
  for (const option of options) {
    if (seen.has(option.value)) {
      throw definitionError(name, `duplicate choice value "${option.value}"`);
    }
    seen.add(option.value);
  }

  return options;
}

function compileDefault(
  name: string,
  spec: VariableSpec,
  choices: readonly ChoiceOption[],
  lists: Readonly<Record<string, readonly string[]>>
): DefaultSpec | undefined {
  const raw = spec.default;
  if (raw === undefined) {
    return undefined;
  }

  if (typeof raw === 'string' || typeof raw === 'boolean') {
    checkLiteralDefault(name, spec.type, raw, choices);
    return { kind: 'literal', value: raw };
  }

  if ('template' in raw) {
    return { kind: 'template', template: compileTemplate(raw.template, `default of '${name}'`) };
  }

  if (spec.type === 'bool') {
    throw invalidDefault(name, 'bool variables cannot take a random default');
  }

  let list: string;
  let items: readonly string[];
  if (typeof raw.random === 'string') {
    const named = Object.prototype.hasOwnProperty.call(lists, raw.random) ? lists[raw.random] : undefined;
    if (!named) {
      throw new ValidationError(
        ErrorCodes.UNKNOWN_LIST,
        `Variable '${name}' draws its default from undeclared list '${raw.random}'`,
        { variable: name, list: raw.random, available: Object.keys(lists) }
      );
    }
    list = raw.random;
    items = named;
  } else {
    list = '(inline)';
    items = raw.random;
  }

  if (spec.type === 'choice') {
    const values = choices.map((choice) => choice.value);
    const stray = items.find((item) => !values.includes(item));
    if (stray !== undefined) {
      throw invalidDefault(name, `random default may draw "${stray}", which is not one of its choices`);
    }
  }

  return { kind: 'random', list, items };
}

function checkLiteralDefault(
  name: string,
  type: VariableType,
  value: string | boolean,
  choices: readonly ChoiceOption[]
): void {
  if (type === 'bool' && typeof value !== 'boolean') {
    throw invalidDefault(name, `bool variable has non-boolean default ${JSON.stringify(value)}`);
  }
  if (type !== 'bool' && typeof value !== 'string') {
    throw invalidDefault(name, `${type} variable has boolean default ${String(value)}`);
  }
  if (type === 'choice' && !choices.some((choice) => choice.value === value)) {
    throw invalidDefault(
      name,
      `default "${String(value)}" is not one of its choices (${choices.map((choice) => choice.value).join(', ')})`
    );
  }
}

function compileConstraint(name: string, spec: VariableSpec): Constraint | undefined {
  const raw = spec.validate;
  if (raw === undefined) {
    return undefined;
  }
  if (spec.type !== 'str') {
    throw definitionError(name, `'validate' applies to str variables only (type is ${spec.type})`);
  }
  if (typeof raw === 'string') {
    return { kind: raw };
  }

  try {
    return { kind: 'pattern', pattern: raw.pattern, regex: new RegExp(`^(?:${raw.pattern})$`) };
  } catch (error) {
    throw definitionError(
      name,
      `invalid pattern /${raw.pattern}/: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function invalidDefault(name: string, problem: string): ValidationError {
  return new ValidationError(ErrorCodes.INVALID_DEFAULT, `Variable '${name}': ${problem}`, {
    variable: name,
  });
}

function definitionError(name: string, problem: string): ValidationError {
  return new ValidationError(ErrorCodes.INVALID_DEFINITION, `Variable '${name}': ${problem}`, {
    variable: name,
  });
}
