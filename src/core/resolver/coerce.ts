/**
 * Coercion of raw answers into typed values.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { AnswerValue, VariableValue } from '../values/types.js';
import type { VariableDefinition } from '../blueprint/types.js';

const TRUE_WORDS = new Set(['true', 'yes', 'y', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'n', 'off', '0']);

/**
 * Coerce a raw answer to the variable's type.
 * Choice answers may name an option by value or by label.
 */
export function coerceAnswer(definition: VariableDefinition, raw: AnswerValue): VariableValue {
  switch (definition.type) {
    case 'bool':
      return { type: 'bool', value: coerceBool(definition.name, raw) };

    case 'str':
      if (typeof raw !== 'string') {
        throw typeError(definition.name, 'a string', raw);
      }
      return { type: 'str', value: raw };

    case 'choice': {
      if (typeof raw !== 'string') {
        throw typeError(definition.name, 'one of its choices', raw);
      }
      const options = definition.choices.map((choice) => choice.value);
      const match =
        definition.choices.find((choice) => choice.value === raw) ??
        definition.choices.find((choice) => choice.label === raw);
      if (!match) {
        throw new ValidationError(
          ErrorCodes.INVALID_CHOICE,
          `Variable '${definition.name}': "${raw}" is not one of ${options.map((o) => `"${o}"`).join(', ')}`,
          { variable: definition.name, value: raw, options }
        );
      }
      return { type: 'choice', value: match.value, options };
    }
  }
}

function coerceBool(name: string, raw: AnswerValue): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw typeError(name, 'a boolean (true/false, yes/no, on/off, 1/0)', raw);
}

function typeError(name: string, expected: string, raw: AnswerValue): ValidationError {
  return new ValidationError(
    ErrorCodes.INVALID_TYPE,
    `Variable '${name}' expects ${expected}, got ${JSON.stringify(raw)}`,
    { variable: name, value: raw }
  );
}
