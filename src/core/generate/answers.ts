/**
 * The answers file: the answer set, seed and output checksums of the last
 * generation, written into the destination for update mode.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { parseYamlWithSchema, stringifyYaml, formatZodError } from '../../utils/yaml.js';
import { globFiles, readFileIfExists, toPosixPath } from '../../utils/file-system.js';
import { toAnswer, type AnswerValue } from '../values/types.js';
import type { Blueprint } from '../blueprint/types.js';
import type { ResolvedConfig } from '../resolver/resolver.js';
import type { AnswersRecord } from './types.js';

export const DEFAULT_ANSWERS_FILE = '.blueprint-answers.yml';

const HEADER = '# Recorded by blueprinter. Edit answers here, then run `blueprinter update`.\n';

const MetaSchema = z.object({
  _blueprint: z.string().min(1),
  _seed: z.union([z.string().min(1), z.number().transform(String)]),
  _files: z.record(z.string(), z.string()).default({}),
});

/** Scalars a hand-edited answers file may hold. Numbers are read as strings. */
const AnswerValueSchema = z.union([z.string(), z.boolean(), z.number().transform(String)]);

const DocumentSchema = z.record(z.string(), z.unknown());

/**
 * Build the record for a generation. Secret answers are left out, and so are
 * variables skipped by their `when`.
 */
export function buildAnswersRecord(
  blueprint: Blueprint,
  config: ResolvedConfig,
  files: Readonly<Record<string, string>>,
  destination: string
): AnswersRecord {
  const secrets = new Set(blueprint.variables.filter((v) => v.secret).map((v) => v.name));
  const skipped = new Set(config.skipped);
  const answers: Record<string, AnswerValue> = {};
  for (const name of config.order) {
    const value = config.values[name];
    if (value !== undefined && !secrets.has(name) && !skipped.has(name)) {
      answers[name] = toAnswer(value);
    }
  }

  const sorted: Record<string, string> = {};
  for (const file of Object.keys(files).sort()) {
    sorted[file] = files[file];
  }

  return {
    blueprint: blueprintReference(blueprint, destination),
    seed: config.seed,
    files: sorted,
    answers,
  };
}

export function serializeAnswers(record: AnswersRecord): string {
  return HEADER + stringifyYaml({
    _blueprint: record.blueprint,
    _seed: record.seed,
    _files: record.files,
    ...record.answers,
  });
}

export function parseAnswers(content: string, source?: string): AnswersRecord {
  const document = parseYamlWithSchema(content, DocumentSchema, source);
  const where = source ? ` (file: ${source})` : '';

  const meta = MetaSchema.safeParse(document);
  if (!meta.success) {
    throw new SystemError(
      ErrorCodes.INVALID_MANIFEST,
      `Invalid answers file${where}: ${formatZodError(meta.error)}`,
      { source, errors: meta.error.issues }
    );
  }

  const answers: Record<string, AnswerValue> = {};
  for (const [key, raw] of Object.entries(document)) {
    if (key.startsWith('_')) continue;
    const value = AnswerValueSchema.safeParse(raw);
    if (!value.success) {
      throw new SystemError(
        ErrorCodes.INVALID_MANIFEST,
        `Invalid answers file${where}: '${key}' must be a string or boolean`,
        { source, key }
      );
    }
    answers[key] = value.data;
  }

  return {
    blueprint: meta.data._blueprint,
    seed: meta.data._seed,
    files: meta.data._files,
    answers,
  };
}

/**
 * Read the answers file left in `destination`.
 */
export async function readAnswersFile(
  destination: string,
  answersFile: string = DEFAULT_ANSWERS_FILE
): Promise<AnswersRecord> {
  const record = await readAnswersFileIfExists(destination, answersFile);
  if (record === null) {
    throw answersNotFound(destination, answersFile);
  }
  return record;
}

export function answersNotFound(destination: string, answersFile: string): SystemError {
  const filePath = path.join(destination, answersFile);
  return new SystemError(
    ErrorCodes.ANSWERS_NOT_FOUND,
    `No answers file at ${filePath}. Was this directory generated by blueprinter?`,
    { path: filePath }
  );
}

export async function readAnswersFileIfExists(
  destination: string,
  answersFile: string
): Promise<AnswersRecord | null> {
  const filePath = path.join(destination, answersFile);
  const content = await readFileIfExists(filePath);
  return content === null ? null : parseAnswers(content, filePath);
}

export interface FoundAnswers {
  /** Path relative to the destination, forward slashes */
  file: string;
  record: AnswersRecord;
}

/**
 * YAML files near the top of `destination` that hold answers-file metadata,
 * sorted by path. Used when a blueprint names its own `answers_file`.
 */
export async function findAnswersFiles(destination: string): Promise<FoundAnswers[]> {
  const candidates = await globFiles(['**/*.yml', '**/*.yaml'], {
    cwd: destination,
    ignore: ['**/node_modules/**', '**/.git/**'],
    deep: 3,
  });

  const found: FoundAnswers[] = [];
  for (const file of candidates) {
    const content = await readFileIfExists(path.join(destination, file));
    if (content === null || !isAnswersDocument(content)) continue;
    found.push({ file, record: parseAnswers(content, path.join(destination, file)) });
  }
  return found;
}

function isAnswersDocument(content: string): boolean {
  try {
    return MetaSchema.safeParse(parseYamlWithSchema(content, DocumentSchema)).success;
  } catch (error) {
    if (error instanceof SystemError) {
      return false;
    }
    throw error;
  }
}

function blueprintReference(blueprint: Blueprint, destination: string): string {
  if (blueprint.root === undefined) {
    return blueprint.name;
  }
  return toPosixPath(path.relative(path.resolve(destination), blueprint.root)) || '.';
}
