/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  parseYaml,
  parseYamlWithSchema,
  stringifyYaml,
  loadYamlWithSchema,
} from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

// Mock file-system for async loading
vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse mappings and lists', () => {
    expect(parseYaml('name: test\nitems:\n  - one\n  - two\n')).toEqual({
      name: 'test',
      items: ['one', 'two'],
    });
  });

  it('should throw SystemError with PARSE_ERROR on invalid YAML', () => {
    try {
      parseYaml('key: [unclosed', 'bad.yaml');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect((error as SystemError).code).toBe(ErrorCodes.PARSE_ERROR);
      expect((error as SystemError).message).toContain('(file: bad.yaml)');
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should validate and apply defaults', () => {
    expect(parseYamlWithSchema('name: demo', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should throw INVALID_MANIFEST naming the failing field', () => {
    try {
      parseYamlWithSchema('name: 42', Schema, 'blueprint.yaml');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect((error as SystemError).code).toBe(ErrorCodes.INVALID_MANIFEST);
      expect((error as SystemError).message).toContain('(file: blueprint.yaml)');
      expect((error as SystemError).message).toContain('name:');
    }
  });
});

describe('stringifyYaml', () => {
  it('should keep key order', () => {
    expect(stringifyYaml({ b: 1, a: 'x', flag: true })).toBe('b: 1\na: x\nflag: true\n');
  });

  it('should quote strings that would read back as other types', () => {
    expect(stringifyYaml({ version: '3.12', flag: 'true' })).toBe('version: "3.12"\nflag: "true"\n');
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read the file and validate it', async () => {
    mockReadFile.mockResolvedValue('name: loaded\ncount: 3\n');

    const result = await loadYamlWithSchema('/tmp/x.yaml', Schema);

    expect(mockReadFile).toHaveBeenCalledWith('/tmp/x.yaml');
    expect(result).toEqual({ name: 'loaded', count: 3 });
  });

  it('should surface read errors unchanged', async () => {
    const ioError = new Error('EACCES');
    mockReadFile.mockRejectedValue(ioError);

    await expect(loadYamlWithSchema('/tmp/x.yaml', Schema)).rejects.toBe(ioError);
  });
});
