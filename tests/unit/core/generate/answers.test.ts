/**
 * Tests for the answers file.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  buildAnswersRecord,
  serializeAnswers,
  parseAnswers,
  readAnswersFile,
  findAnswersFiles,
} from '../../../../src/core/generate/answers.js';
import { resolve } from '../../../../src/core/resolver/resolver.js';
import { createRandomSource } from '../../../../src/core/random/source.js';
import { SystemError, ErrorCodes } from '../../../../src/utils/errors.js';
import { makeBlueprint } from '../../../helpers/blueprint.js';

const blueprint = makeBlueprint({
  variables: {
    name: { default: 'demo' },
    private: { type: 'bool', default: true },
    token: { secret: true, default: 'test-secret' },
  },
});

describe('buildAnswersRecord', () => {
  const config = resolve(blueprint, {}, { random: createRandomSource('abc') });

  it('should record non-secret answers, the seed and sorted checksums', () => {
    const record = buildAnswersRecord(
      blueprint,
      config,
      { 'b.txt': '2cf24dba5fb0a30e', 'a.txt': 'e3b0c44298fc1c14' },
      '/tmp/out'
    );

    expect(record).toEqual({
      blueprint: 'test',
      seed: 'abc',
      files: { 'a.txt': 'e3b0c44298fc1c14', 'b.txt': '2cf24dba5fb0a30e' },
      answers: { name: 'demo', private: true },
    });
    expect(Object.keys(record.files)).toEqual(['a.txt', 'b.txt']);
  });

  it('should leave out variables skipped by their condition', () => {
    const gated = makeBlueprint({
      variables: {
        publish: { type: 'bool' },
        registry: { when: 'publish', validate: 'non_empty' },
      },
    });

    const skipped = resolve(gated, {}, { random: createRandomSource('abc') });
    const answered = resolve(gated, { registry: 'npm' }, { random: createRandomSource('abc') });

    expect(buildAnswersRecord(gated, skipped, {}, '/tmp/out').answers).toEqual({ publish: false });
    expect(buildAnswersRecord(gated, answered, {}, '/tmp/out').answers).toEqual({
      publish: false,
      registry: 'npm',
    });
  });

  it('should reference a loaded blueprint relative to the destination', () => {
    const loaded = { ...blueprint, root: '/work/blueprints/demo' };
    expect(buildAnswersRecord(loaded, config, {}, '/work/projects/app').blueprint).toBe(
      '../../blueprints/demo'
    );
    expect(buildAnswersRecord(loaded, config, {}, '/work/blueprints/demo').blueprint).toBe('.');
  });
});

describe('serializeAnswers', () => {
  it('should write a header then metadata before answers', () => {
    const text = serializeAnswers({
      blueprint: '../demo',
      seed: 'abc',
      files: { 'README.md': '2cf24dba5fb0a30e' },
      answers: { name: 'demo', private: false },
    });

    expect(text).toBe(
      '# Recorded by blueprinter. Edit answers here, then run `blueprinter update`.\n' +
      '_blueprint: ../demo\n' +
      '_seed: abc\n' +
      '_files:\n' +
      '  README.md: 2cf24dba5fb0a30e\n' +
      'name: demo\n' +
      'private: false\n'
    );
  });

  it('should read back what it writes', () => {
    const record = {
      blueprint: '.',
      seed: '0123456789abcdef',
      files: { '.gitignore': 'e3b0c44298fc1c14' },
      answers: { version: '3.12', enabled: 'yes', flag: true },
    };
    expect(parseAnswers(serializeAnswers(record))).toEqual(record);
  });
});

describe('parseAnswers', () => {
  it('should read numbers as strings', () => {
    const record = parseAnswers('_blueprint: demo\n_seed: 42\nversion: 3.12\n');
    expect(record).toEqual({ blueprint: 'demo', seed: '42', files: {}, answers: { version: '3.12' } });
  });

  it('should reject a file without metadata', () => {
    try {
      parseAnswers('name: demo\n', 'answers.yml');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect((error as SystemError).code).toBe(ErrorCodes.INVALID_MANIFEST);
      expect((error as SystemError).message).toContain('(file: answers.yml)');
    }
  });

  it('should reject nested answers', () => {
    expect(() => parseAnswers('_blueprint: demo\n_seed: abc\nlist:\n  - a\n')).toThrow(
      "Invalid answers file: 'list' must be a string or boolean"
    );
  });
});

describe('readAnswersFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `blueprinter-answers-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read the default answers file', async () => {
    writeFileSync(join(tempDir, '.blueprint-answers.yml'), '_blueprint: demo\n_seed: abc\nname: x\n');
    const record = await readAnswersFile(tempDir);
    expect(record.answers).toEqual({ name: 'x' });
  });

  it('should read a named answers file', async () => {
    writeFileSync(join(tempDir, 'answers.yml'), '_blueprint: demo\n_seed: abc\n');
    expect((await readAnswersFile(tempDir, 'answers.yml')).seed).toBe('abc');
  });

  it('should fail with ANSWERS_NOT_FOUND when there is none', async () => {
    await expect(readAnswersFile(tempDir)).rejects.toMatchObject({ code: ErrorCodes.ANSWERS_NOT_FOUND });
  });
});

describe('findAnswersFiles', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `blueprinter-find-answers-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(tempDir, 'config'), { recursive: true });
    mkdirSync(join(tempDir, 'node_modules', 'pkg'), { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should list YAML files holding answers metadata, sorted', async () => {
    writeFileSync(join(tempDir, '.my-answers.yml'), '_blueprint: ../demo\n_seed: abc\nname: x\n');
    writeFileSync(join(tempDir, 'config', 'answers.yaml'), '_blueprint: ../../demo\n_seed: def\n');
    writeFileSync(join(tempDir, 'config', 'settings.yml'), 'name: not-answers\n');
    writeFileSync(join(tempDir, 'broken.yml'), 'key: [unclosed\n');
    writeFileSync(join(tempDir, 'node_modules', 'pkg', 'a.yml'), '_blueprint: x\n_seed: y\n');

    const found = await findAnswersFiles(tempDir);

    expect(found.map((entry) => entry.file)).toEqual(['.my-answers.yml', 'config/answers.yaml']);
    expect(found[0]?.record.answers).toEqual({ name: 'x' });
    expect(found[1]?.record.seed).toBe('def');
  });
});
