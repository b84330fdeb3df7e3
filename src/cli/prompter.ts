/**
 * Interactive questions for variables the command line did not answer.
 */
import * as readline from 'node:readline';
import chalk from 'chalk';
import { ValidationError } from '../utils/errors.js';
import {
  acceptAnswer,
  computeDefault,
  isAsked,
  resolveVariable,
} from '../core/resolver/resolver.js';
import type { RandomSource } from '../core/random/source.js';
import type { Blueprint, VariableDefinition } from '../core/blueprint/types.js';
import {
  formatValue,
  toAnswer,
  type AnswerSet,
  type AnswerValue,
  type VariableValue,
} from '../core/values/types.js';

export interface PromptIO {
  ask(question: string): Promise<string>;
  write(line: string): void;
  close(): void;
}

export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): PromptIO {
  const rl = readline.createInterface({ input, output });
  return {
    ask: (question) => new Promise((resolve) => rl.question(question, resolve)),
    write: (line) => output.write(`${line}\n`),
    close: () => rl.close(),
  };
}

/**
 * Ask for every variable in resolution order that is neither answered in
 * `given` nor switched off by its `when`. Returns `given` plus the answers
 * collected, ready for `resolve` with the same random source.
 */
export async function promptAnswers(
  blueprint: Blueprint,
  given: AnswerSet,
  random: RandomSource,
  io: PromptIO
): Promise<Record<string, AnswerValue>> {
  const answers: Record<string, AnswerValue> = { ...given };
  const values: Record<string, VariableValue> = {};
  const byName = new Map(blueprint.variables.map((definition) => [definition.name, definition]));

  for (const name of blueprint.order) {
    const definition = byName.get(name);
    if (!definition) continue;

    const supplied = Object.hasOwn(given, name) ? given[name] : undefined;
    if (supplied !== undefined || !isAsked(definition, values)) {
      values[name] = resolveVariable(definition, supplied, values, random);
      continue;
    }

    const value = await ask(definition, computeDefault(definition, values, random), io);
    values[name] = value;
    answers[name] = toAnswer(value);
  }

  return answers;
}

async function ask(
  definition: VariableDefinition,
  fallback: VariableValue | undefined,
  io: PromptIO
): Promise<VariableValue> {
  if (definition.type === 'choice') {
    io.write(chalk.bold(definition.help));
    definition.choices.forEach((choice, index) => {
      io.write(`  ${index + 1}) ${choice.label}`);
    });
  }

  const question = formatQuestion(definition, fallback);

  for (;;) {
    const input = (await io.ask(question)).trim();
    const raw = input === '' ? fallbackAnswer(fallback) : fromChoiceNumber(definition, input);
    if (raw === undefined) {
      io.write(chalk.red('A value is required.'));
      continue;
    }

    try {
      return acceptAnswer(definition, raw);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      io.write(chalk.red(error.message));
    }
  }
}

function formatQuestion(definition: VariableDefinition, fallback: VariableValue | undefined): string {
  const label = definition.type === 'choice' ? 'Choice' : definition.help;
  const hint = definition.type === 'bool' ? ' (y/n)' : '';
  const shown = fallback === undefined ? '' : chalk.dim(` [${defaultLabel(definition, fallback)}]`);
  return `${chalk.bold(label)}${hint}${shown}: `;
}

function defaultLabel(definition: VariableDefinition, value: VariableValue): string {
  if (definition.secret) return '***';
  const choice = definition.choices.find((option) => option.value === value.value);
  return choice ? choice.label : formatValue(value);
}

function fallbackAnswer(fallback: VariableValue | undefined): AnswerValue | undefined {
  return fallback === undefined ? undefined : toAnswer(fallback);
}

/** A number selects the choice at that position; anything else passes through. */
function fromChoiceNumber(definition: VariableDefinition, input: string): string {
  if (definition.type !== 'choice' || !/^\d+$/.test(input)) {
    return input;
  }
  const option = definition.choices[Number(input) - 1];
  return option ? option.value : input;
}
