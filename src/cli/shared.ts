/**
 * Option handling shared by the CLI commands.
 */
import type { Command } from 'commander';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from '../utils/errors.js';
import { readFile } from '../utils/file-system.js';
import { parseYamlWithSchema } from '../utils/yaml.js';
import { logger as log } from '../utils/logger.js';
import { createRandomSource, type RandomSource } from '../core/random/source.js';
import type { AnswerValue } from '../core/values/types.js';

/** Options every command that resolves answers accepts. */
export interface AnswerOptions {
  data?: string[];
  dataFile?: string;
  defaults?: boolean;
  seed?: string;
}

const DataFileSchema = z.record(z.string(), z.union([z.string(), z.boolean(), z.number()]));

/**
 * Commander reducer for repeatable options.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parse `key=value` pairs. The value is everything after the first `=`.
 */
export function parseDataPairs(pairs: readonly string[]): Record<string, string> {
  const answers: Record<string, string> = {};
  for (const pair of pairs) {
    const at = pair.indexOf('=');
    const key = at > 0 ? pair.slice(0, at).trim() : '';
    if (key === '') {
      throw new ConfigError(
        ErrorCodes.INVALID_DATA,
        `Invalid --data '${pair}'. Expected key=value.`,
        { pair }
      );
    }
    answers[key] = pair.slice(at + 1);
  }
  return answers;
}

/**
 * Read a YAML mapping of answers. Numbers become strings, with a warning:
 * YAML has already turned `3.10` into 3.1 by then.
 */
export async function loadDataFile(filePath: string): Promise<Record<string, AnswerValue>> {
  const content = await readFile(filePath);
  const data = parseYamlWithSchema(content, DataFileSchema, filePath);

  const answers: Record<string, AnswerValue> = {};
  const numbers: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'number') {
      numbers.push(`${key} (${value})`);
      answers[key] = String(value);
    } else {
      answers[key] = value;
    }
  }

  if (numbers.length > 0) {
    log.warn(
      `${filePath}: read as numbers: ${numbers.join(', ')}. ` +
      'Quote values such as "3.10" to keep them as written.'
    );
  }
  return answers;
}

/**
 * Answers from `--data-file`, then `--data` pairs, which win.
 */
export async function gatherAnswers(options: AnswerOptions): Promise<Record<string, AnswerValue>> {
  const fromFile = options.dataFile ? await loadDataFile(options.dataFile) : {};
  return { ...fromFile, ...parseDataPairs(options.data ?? []) };
}

export function randomFromOptions(options: AnswerOptions): RandomSource {
  return createRandomSource(options.seed);
}

/**
 * Warn about answers given for variables the blueprint does not declare.
 */
export function reportIgnored(ignored: readonly string[]): void {
  if (ignored.length > 0) {
    log.warn(`Ignoring answers for undeclared variables: ${ignored.join(', ')}`);
  }
}

/**
 * Add the answer options: `-d/--data`, `--data-file` and `--seed`.
 */
export function withAnswerOptions(command: Command): Command {
  return command
    .option('-d, --data <key=value>', 'Answer a variable (repeatable)', collect, [])
    .option('--data-file <file>', 'YAML file of answers')
    .option('--seed <seed>', 'Seed for random defaults');
}
