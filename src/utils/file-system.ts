/**
 * File system operations - reading, writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a UTF-8 file.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Read a file if it exists. Any error other than a missing file propagates.
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(dirPath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Remove a file. A file that is already gone is not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Find files matching glob patterns, relative to `cwd`, sorted.
 * Dot files are included; blueprints routinely ship `.claude/` or `.gitignore`.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd: string;
    ignore?: string[];
    /** Directory levels to descend; unlimited by default */
    deep?: number;
  }
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd,
    ignore: options.ignore ?? [],
    deep: options.deep ?? Infinity,
    dot: true,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Convert a platform path to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
