/**
 * Update mode: regenerate a destination from the answers it recorded.
 */
import * as path from 'node:path';
import { loadBlueprint } from '../blueprint/loader.js';
import { resolve, type ResolvedConfig } from '../resolver/resolver.js';
import { createRandomSource } from '../random/source.js';
import type { AnswerSet } from '../values/types.js';
import type { Blueprint } from '../blueprint/types.js';
import {
  readAnswersFile,
  readAnswersFileIfExists,
  findAnswersFiles,
  answersNotFound,
  DEFAULT_ANSWERS_FILE,
} from './answers.js';
import type { AnswersRecord } from './types.js';

export interface UpdateOptions {
  /** Blueprint directory; defaults to the one recorded in the answers file */
  blueprint?: string;
  /** Answers file inside the destination; defaults to the blueprint's `answers_file` */
  answersFile?: string;
  /** Answers that replace recorded ones */
  overrides?: AnswerSet;
}

export interface PreparedUpdate {
  blueprint: Blueprint;
  config: ResolvedConfig;
  previous: AnswersRecord;
}

interface Recorded {
  blueprint: Blueprint;
  previous: AnswersRecord;
}

/**
 * Load the recorded answers and blueprint and re-resolve with the recorded seed.
 * Variables added to the blueprint since take their defaults.
 */
export async function prepareUpdate(
  destination: string,
  options: UpdateOptions = {}
): Promise<PreparedUpdate> {
  const { blueprint, previous } = await loadRecorded(destination, options);

  const config = resolve(
    blueprint,
    { ...previous.answers, ...options.overrides },
    { random: createRandomSource(previous.seed) }
  );

  return { blueprint, config, previous };
}

/**
 * Find the answers file and its blueprint. Without an explicit file the
 * blueprint's `answers_file` decides; without an explicit blueprint, the
 * default file is tried first, then any answers file in the destination
 * whose recorded blueprint names it.
 */
async function loadRecorded(destination: string, options: UpdateOptions): Promise<Recorded> {
  if (options.answersFile !== undefined) {
    const previous = await readAnswersFile(destination, options.answersFile);
    const blueprint = await loadBlueprint(options.blueprint ?? recordedBlueprintDir(destination, previous));
    return { blueprint, previous };
  }

  if (options.blueprint !== undefined) {
    const blueprint = await loadBlueprint(options.blueprint);
    const previous = await readAnswersFile(destination, blueprint.settings.answers_file);
    return { blueprint, previous };
  }

  const recorded = await readAnswersFileIfExists(destination, DEFAULT_ANSWERS_FILE);
  if (recorded !== null) {
    return {
      blueprint: await loadBlueprint(recordedBlueprintDir(destination, recorded)),
      previous: recorded,
    };
  }

  for (const { file, record } of await findAnswersFiles(destination)) {
    const blueprint = await loadBlueprint(recordedBlueprintDir(destination, record));
    if (path.posix.normalize(blueprint.settings.answers_file) === file) {
      return { blueprint, previous: record };
    }
  }

  throw answersNotFound(destination, DEFAULT_ANSWERS_FILE);
}

function recordedBlueprintDir(destination: string, record: AnswersRecord): string {
  return path.resolve(destination, record.blueprint);
}
