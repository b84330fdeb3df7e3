/**
 * Tests for the files command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { rmSync } from 'fs';

vi.mock('chalk', () => {
  const same = (s: string) => s;
  return {
    default: { bold: same, dim: same, red: same, green: same, cyan: same, yellow: same, magenta: same },
  };
});

vi.mock('../../../../src/utils/logger.js', () => {
  const log = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    fail: vi.fn(),
    debug: vi.fn(),
  };
  return { logger: { ...log, child: () => log } };
});

import { createFilesCommand } from '../../../../src/cli/commands/files.js';
import { logger as log } from '../../../../src/utils/logger.js';
import { createTempDir, writeTree, DEMO_BLUEPRINT } from '../../../helpers/fixtures.js';

describe('files command', () => {
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  const run = (...args: string[]) => createFilesCommand().parseAsync(['node', 'files', tempDir, ...args]);
  const lines = () => consoleLogSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = createTempDir('files-command');
    writeTree(tempDir, {
      ...DEMO_BLUEPRINT,
      'template/src/{{ project_name }}.py.tmpl': 'print("hi")\n',
    });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create a command with correct name', () => {
    expect(createFilesCommand().name()).toBe('files');
  });

  it('should list rendered paths of selected files', async () => {
    await run('-d', 'project_name=app');

    expect(lines()).toEqual(['.gitignore', 'README.md', 'src/app.py']);
  });

  it('should leave out files whose rules fail', async () => {
    await run('-d', 'use_git=no');

    expect(lines()).toEqual(['README.md', 'src/demo.py']);
  });

  it('should mark excluded files with --all', async () => {
    await run('-d', 'use_git=no', '--all');

    expect(lines()).toEqual(['.gitignore (excluded)', 'README.md', 'src/demo.py']);
  });

  it('should print JSON with --json', async () => {
    await run('--json', '--all', '-d', 'use_git=false');

    expect(JSON.parse(lines()[0])).toEqual([
      { path: '.gitignore', source: '.gitignore', included: false },
      { path: 'README.md', source: 'README.md.tmpl', included: true },
      { path: 'src/demo.py', source: 'src/{{ project_name }}.py.tmpl', included: true },
    ]);
  });

  it('should report errors and exit', async () => {
    await expect(run('-d', 'bad')).rejects.toThrow('process.exit called');

    expect(log.error).toHaveBeenCalledWith("Invalid --data 'bad'. Expected key=value.");
  });
});
