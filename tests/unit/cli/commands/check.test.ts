/**
 * Tests for the check command.
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

import { createCheckCommand } from '../../../../src/cli/commands/check.js';
import { logger as log } from '../../../../src/utils/logger.js';
import { createTempDir, writeTree, DEMO_BLUEPRINT } from '../../../helpers/fixtures.js';

describe('check command', () => {
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  const run = (...args: string[]) => createCheckCommand().parseAsync(['node', 'check', tempDir, ...args]);

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = createTempDir('check-command');
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
    expect(createCheckCommand().name()).toBe('check');
  });

  it('should summarize a valid blueprint', async () => {
    writeTree(tempDir, DEMO_BLUEPRINT);

    await run();

    expect(log.success).toHaveBeenCalledWith("Blueprint 'demo' is valid: 3 variables, 2 files, 1 rules");
    expect(vi.mocked(log.info).mock.calls.map((call) => call[0])).toEqual([
      'project_name (str)',
      'use_git (bool)',
      'token (str), secret',
    ]);
  });

  it('should print a JSON summary', async () => {
    writeTree(tempDir, DEMO_BLUEPRINT);

    await run('--json');

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      valid: true,
      name: 'demo',
      variables: ['project_name', 'use_git', 'token'],
      files: ['.gitignore', 'README.md'],
      rules: [{ path: '.gitignore', when: 'use_git' }],
    });
  });

  it('should report definition errors and exit', async () => {
    writeTree(tempDir, {
      ...DEMO_BLUEPRINT,
      'template/README.md.tmpl': '# {{ project_title }}\n',
    });

    await expect(run()).rejects.toThrow('process.exit called');

    expect(vi.mocked(log.fail).mock.calls[0][0]).toContain("'project_title'");
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should report errors as JSON with --json', async () => {
    await expect(run('--json')).rejects.toThrow('process.exit called');

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output.valid).toBe(false);
    expect(output.error.code).toBe('S003');
    expect(output.error.name).toBe('SystemError');
  });
});
