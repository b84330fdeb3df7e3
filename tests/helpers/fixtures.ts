/**
 * Temporary directories and on-disk blueprints for tests.
 */
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

export function createTempDir(label: string): string {
  const dir = join(tmpdir(), `blueprinter-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Write `files` (relative path → content) under `root`.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [file, content] of Object.entries(files)) {
    const target = join(root, file);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
}

/** A small blueprint: two variables, a secret, one conditional file. */
export const DEMO_BLUEPRINT: Record<string, string> = {
  'blueprint.yaml': [
    'name: demo',
    'variables:',
    '  project_name:',
    '    help: Project name',
    '    default: demo',
    '  use_git:',
    '    type: bool',
    '    default: true',
    '  token:',
    '    secret: true',
    '    default: test-secret',
    'files:',
    '  - path: .gitignore',
    '    when: use_git',
    '',
  ].join('\n'),
  'template/README.md.tmpl': '# {{ project_name }}\n',
  'template/.gitignore': 'node_modules/\n',
};
