/**
 * Tests for re-resolving a generated directory from its answers file.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { prepareUpdate, type UpdateOptions } from '../../../../src/core/generate/update.js';
import { GenerationEngine } from '../../../../src/core/generate/engine.js';
import { parseAnswers } from '../../../../src/core/generate/answers.js';
import type { GenerationPlan } from '../../../../src/core/generate/types.js';
import { loadBlueprint } from '../../../../src/core/blueprint/loader.js';
import { resolve } from '../../../../src/core/resolver/resolver.js';
import { createRandomSource } from '../../../../src/core/random/source.js';
import type { AnswerSet } from '../../../../src/core/values/types.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

const MANIFEST = [
  'name: demo',
  'lists:',
  '  animals: [otter, heron, lynx]',
  'variables:',
  '  name:',
  '    default: demo',
  '  mascot:',
  '    default:',
  '      random: animals',
  '',
].join('\n');

describe('prepareUpdate', () => {
  let tempDir: string;
  let blueprintDir: string;
  let destination: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `blueprinter-update-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    blueprintDir = join(tempDir, 'blueprint');
    destination = join(tempDir, 'out');
    mkdirSync(join(blueprintDir, 'template'), { recursive: true });
    mkdirSync(destination, { recursive: true });
    writeFileSync(join(blueprintDir, 'blueprint.yaml'), MANIFEST);
    writeFileSync(join(blueprintDir, 'template', 'README.md.tmpl'), '# {{ name }}\n');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeAnswers(body: string, file = '.blueprint-answers.yml'): void {
    writeFileSync(join(destination, file), `_blueprint: ../blueprint\n_seed: test-seed\n${body}`);
  }

  it('should load the recorded blueprint and answers', async () => {
    writeAnswers('name: kept\nmascot: heron\n');

    const { blueprint, config, previous } = await prepareUpdate(destination);

    expect(blueprint.name).toBe('demo');
    expect(previous.seed).toBe('test-seed');
    expect(config.seed).toBe('test-seed');
    expect(config.values.name?.value).toBe('kept');
    expect(config.values.mascot?.value).toBe('heron');
  });

  it('should let overrides replace recorded answers', async () => {
    writeAnswers('name: kept\nmascot: heron\n');

    const { config } = await prepareUpdate(destination, { overrides: { name: 'changed' } });

    expect(config.values.name?.value).toBe('changed');
    expect(config.values.mascot?.value).toBe('heron');
  });

  it('should draw variables missing from the record with the recorded seed', async () => {
    writeAnswers('name: kept\n');

    const first = await prepareUpdate(destination);
    const second = await prepareUpdate(destination);

    expect(['otter', 'heron', 'lynx']).toContain(first.config.values.mascot?.value);
    expect(second.config.values.mascot).toEqual(first.config.values.mascot);
  });

  it('should honour an explicit blueprint and answers file', async () => {
    writeFileSync(
      join(destination, 'answers.yml'),
      '_blueprint: somewhere/else\n_seed: abc\nname: other\n'
    );

    const { config } = await prepareUpdate(destination, {
      blueprint: blueprintDir,
      answersFile: 'answers.yml',
    });

    expect(config.values.name?.value).toBe('other');
  });

  it('should fail when the destination has no answers file', async () => {
    await expect(prepareUpdate(destination)).rejects.toMatchObject({
      code: ErrorCodes.ANSWERS_NOT_FOUND,
    });
  });

  it('should report recorded answers the blueprint no longer declares', async () => {
    writeAnswers('name: kept\nlicense: MIT\n');

    const { config } = await prepareUpdate(destination);

    expect(config.ignored).toEqual(['license']);
  });

  describe('round trip', () => {
    const writeManifest = (lines: string[]): void => {
      writeFileSync(join(blueprintDir, 'blueprint.yaml'), [...lines, ''].join('\n'));
    };

    async function generate(answers: AnswerSet = {}): Promise<void> {
      const blueprint = await loadBlueprint(blueprintDir);
      const config = resolve(blueprint, answers, { random: createRandomSource('test-seed') });
      const engine = new GenerationEngine(destination);
      await engine.apply(await engine.plan({ blueprint, config }));
    }

    async function planUpdate(options: UpdateOptions = {}): Promise<GenerationPlan> {
      const { blueprint, config, previous } = await prepareUpdate(destination, options);
      return new GenerationEngine(destination).plan({ blueprint, config, previous });
    }

    const actionsOf = (plan: GenerationPlan) => plan.files.map((file) => [file.action, file.path]);

    it('should replay answers that differ from the defaults', async () => {
      await generate({ name: 'custom' });

      const { config } = await prepareUpdate(destination);

      expect(config.values.name?.value).toBe('custom');
      expect(actionsOf(await planUpdate())).toEqual([['identical', 'README.md']]);
    });

    it('should update a project with a skipped, validated variable', async () => {
      writeManifest([
        'name: demo',
        'variables:',
        '  name:',
        '    default: demo',
        '  use_company:',
        '    type: bool',
        '  company:',
        '    when: use_company',
        '    validate: non_empty',
      ]);
      await generate();

      const recorded = parseAnswers(readFileSync(join(destination, '.blueprint-answers.yml'), 'utf-8'));
      expect(recorded.answers).toEqual({ name: 'demo', use_company: false });
      expect(actionsOf(await planUpdate())).toEqual([['identical', 'README.md']]);
      await expect(prepareUpdate(destination, { overrides: { use_company: true } })).rejects.toMatchObject({
        code: ErrorCodes.MISSING_VALUE,
      });
    });

    it('should find an answers file the blueprint renames', async () => {
      writeManifest([
        'name: demo',
        'settings:',
        '  answers_file: .my-answers.yml',
        'variables:',
        '  name:',
        '    default: demo',
      ]);
      await generate({ name: 'custom' });

      expect(existsSync(join(destination, '.blueprint-answers.yml'))).toBe(false);
      const { config, previous } = await prepareUpdate(destination);
      expect(config.values.name?.value).toBe('custom');
      expect(previous.seed).toBe('test-seed');
      expect(actionsOf(await planUpdate())).toEqual([['identical', 'README.md']]);
      expect(actionsOf(await planUpdate({ blueprint: blueprintDir }))).toEqual([['identical', 'README.md']]);
    });

    it('should find a renamed answers file in a subdirectory', async () => {
      writeManifest([
        'name: demo',
        'settings:',
        '  answers_file: config/answers.yml',
        'variables:',
        '  name:',
        '    default: demo',
      ]);
      await generate({ name: 'nested' });

      const { config } = await prepareUpdate(destination);
      expect(config.values.name?.value).toBe('nested');
    });

    it('should not take another YAML file for the answers file', async () => {
      writeFileSync(join(destination, 'config.yml'), 'name: not-answers\n');

      await expect(prepareUpdate(destination)).rejects.toMatchObject({
        code: ErrorCodes.ANSWERS_NOT_FOUND,
      });
    });
  });
});
