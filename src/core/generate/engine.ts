/**
 * Generation engine: renders the selected files in memory, compares them
 * with the destination, then writes the tree and its answers file.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import {
  GenerationError,
  SecurityError,
  TemplateError,
  ErrorCodes,
} from '../../utils/errors.js';
import { readFileIfExists, writeFile, removeFile } from '../../utils/file-system.js';
import { computeChecksum, verifyChecksum } from '../../utils/checksum.js';
import { logger } from '../../utils/logger.js';
import { selectFiles, render, renderPath } from '../resolver/resolver.js';
import { buildAnswersRecord, serializeAnswers } from './answers.js';
import type {
  AnswersRecord,
  ApplyOptions,
  ApplyResult,
  GenerationPlan,
  PlanInput,
  PlannedFile,
} from './types.js';

interface RenderedFile {
  path: string;
  content: string;
}

/**
 * Plans and writes generated trees under one destination directory.
 */
export class GenerationEngine {
  private readonly destination: string;
  private readonly log = logger.child('generate');

  constructor(destination: string) {
    this.destination = path.resolve(destination);
  }

  /**
   * Render every selected file and classify it against what is on disk.
   * Nothing is written; a failure here leaves the destination untouched.
   */
  async plan(input: PlanInput): Promise<GenerationPlan> {
    const { blueprint, config, previous } = input;
    const answersFile = safeOutputPath(blueprint.settings.answers_file, 'settings.answers_file');
    const rendered = this.renderAll(input, answersFile);

    const files: PlannedFile[] = [];
    const checksums: Record<string, string> = {};

    for (const file of rendered) {
      const checksum = computeChecksum(file.content);
      checksums[file.path] = checksum;
      files.push(await this.classify(file, checksum, blueprint.settings.skip_if_exists, previous));
    }

    if (previous) {
      for (const stale of await this.findStale(previous, checksums, answersFile)) {
        checksums[stale.path] = stale.checksum;
        files.push(stale);
      }
    }

    this.log.debug(`Planned ${files.length} files in ${this.destination}`);

    return {
      destination: this.destination,
      files,
      answersFile,
      record: buildAnswersRecord(blueprint, config, checksums, this.destination),
    };
  }

  /**
   * Write a plan. Conflicts abort before anything is written unless
   * `onConflict` says otherwise.
   */
  async apply(plan: GenerationPlan, options: ApplyOptions = {}): Promise<ApplyResult> {
    const onConflict = options.onConflict ?? 'abort';
    const conflicts = plan.files.filter((file) => file.action === 'conflict').map((file) => file.path);

    if (conflicts.length > 0 && onConflict === 'abort') {
      throw new GenerationError(
        ErrorCodes.OUTPUT_CONFLICT,
        `${conflicts.length} file(s) already exist with different content: ${conflicts.join(', ')}. ` +
        'Use --force to overwrite them.',
        { paths: conflicts }
      );
    }

    const written: string[] = [];
    const kept: string[] = [];
    const removed: string[] = [];

    for (const file of plan.files) {
      switch (file.action) {
        case 'create':
        case 'update':
          await this.write(file.path, file.content);
          written.push(file.path);
          break;
        case 'conflict':
          if (onConflict === 'overwrite') {
            await this.write(file.path, file.content);
            written.push(file.path);
          } else {
            kept.push(file.path);
          }
          break;
        case 'stale':
          if (options.prune && !file.modified) {
            await removeFile(path.join(plan.destination, file.path));
            this.log.debug(`Removed ${file.path}`);
            removed.push(file.path);
          } else {
            kept.push(file.path);
          }
          break;
        case 'identical':
        case 'skip':
          break;
      }
    }

    const files: Record<string, string> = {};
    for (const [file, checksum] of Object.entries(plan.record.files)) {
      if (!removed.includes(file)) {
        files[file] = checksum;
      }
    }
    await this.write(plan.answersFile, serializeAnswers({ ...plan.record, files }));

    return { written, kept, removed, answersFile: plan.answersFile };
  }

  private renderAll(input: PlanInput, answersFile: string): RenderedFile[] {
    const { blueprint, config } = input;
    const rendered: RenderedFile[] = [];
    const sources = new Map<string, string>();

    for (const file of selectFiles(blueprint, config)) {
      const output = safeOutputPath(renderPath(file, config), file.sourcePath);

      const clash = output === answersFile ? 'the answers file' : sources.get(output);
      if (clash !== undefined) {
        throw new TemplateError(
          ErrorCodes.DUPLICATE_PATH,
          `'${file.sourcePath}' renders to '${output}', which is also produced by ${clash}`,
          { path: output, source: file.sourcePath }
        );
      }
      sources.set(output, `'${file.sourcePath}'`);

      rendered.push({ path: output, content: render(file, config) });
    }

    return rendered;
  }

  private async classify(
    file: RenderedFile,
    checksum: string,
    skipIfExists: readonly string[],
    previous: AnswersRecord | undefined
  ): Promise<PlannedFile> {
    const { path: output, content } = file;
    const existing = await readFileIfExists(path.join(this.destination, output));

    if (existing === null) {
      return { action: 'create', path: output, content, checksum };
    }
    if (skipIfExists.some((pattern) => minimatch(output, pattern, { dot: true }))) {
      return { action: 'skip', path: output, content, checksum, existing };
    }
    if (existing === content) {
      return { action: 'identical', path: output, content, checksum };
    }

    const recorded = previous ? recordedChecksum(previous, output) : undefined;
    if (recorded !== undefined && verifyChecksum(existing, recorded)) {
      return { action: 'update', path: output, content, checksum, existing };
    }
    return { action: 'conflict', path: output, content, checksum, existing };
  }

  private async findStale(
    previous: AnswersRecord,
    current: Readonly<Record<string, string>>,
    answersFile: string
  ): Promise<PlannedFile[]> {
    const stale: PlannedFile[] = [];
    const recordedPaths = Object.keys(previous.files)
      .filter((file) => !Object.hasOwn(current, file) && file !== answersFile)
      .sort();

    for (const file of recordedPaths) {
      const checksum = previous.files[file];
      const target = safeOutputPath(file, previous.blueprint);
      const existing = await readFileIfExists(path.join(this.destination, target));
      if (existing === null) continue;
      stale.push({
        action: 'stale',
        path: target,
        checksum,
        existing,
        modified: !verifyChecksum(existing, checksum),
      });
    }

    return stale;
  }

  private async write(relativePath: string, content: string): Promise<void> {
    await writeFile(path.join(this.destination, relativePath), content);
    this.log.debug(`Wrote ${relativePath}`);
  }
}

/**
 * Normalize a rendered output path. Absolute paths and paths leaving the
 * destination are rejected.
 */
export function safeOutputPath(rendered: string, origin: string): string {
  const normalized = path.posix.normalize(rendered.replace(/\\/g, '/'));
  const unsafe =
    rendered.trim() === '' ||
    normalized === '.' ||
    normalized.endsWith('/') ||
    path.posix.isAbsolute(normalized) ||
    path.win32.isAbsolute(rendered) ||
    normalized === '..' ||
    normalized.startsWith('../');

  if (unsafe) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Output path '${rendered}' (from ${origin}) is empty or escapes the destination`,
      { path: rendered, origin }
    );
  }
  return normalized;
}

function recordedChecksum(record: AnswersRecord, file: string): string | undefined {
  return Object.hasOwn(record.files, file) ? record.files[file] : undefined;
}
