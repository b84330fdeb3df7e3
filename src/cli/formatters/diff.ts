/**
 * Unified diffs of planned changes against the files on disk.
 */
import chalk from 'chalk';
import { createTwoFilesPatch } from 'diff';
import type { PlannedFile } from '../../core/generate/types.js';

/**
 * Unified diff from the file on disk to the generated content.
 * Only `update` and `conflict` entries have both sides.
 */
export function createFileDiff(file: PlannedFile): string | null {
  if (file.action !== 'update' && file.action !== 'conflict') {
    return null;
  }
  return createTwoFilesPatch(
    `a/${file.path}`,
    `b/${file.path}`,
    file.existing,
    file.content,
    undefined,
    undefined,
    { context: 3 }
  );
}

export function colorizeDiff(patch: string): string {
  return patch
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      return line;
    })
    .join('\n');
}
