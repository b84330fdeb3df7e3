/**
 * `blueprinter update [destination]`
 */
import { Command } from 'commander';
import { prepareUpdate } from '../../core/generate/update.js';
import { GenerationEngine } from '../../core/generate/engine.js';
import { formatPlan } from '../formatters/plan.js';
import { colorizeDiff, createFileDiff } from '../formatters/diff.js';
import { collect, gatherAnswers, reportIgnored, type AnswerOptions } from '../shared.js';
import { logger as log } from '../../utils/logger.js';

interface UpdateCommandOptions extends AnswerOptions {
  blueprint?: string;
  answersFile?: string;
  dryRun?: boolean;
  force?: boolean;
  prune?: boolean;
  diff?: boolean;
}

/**
 * Create the update command.
 */
export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Regenerate a project from its recorded answers')
    .argument('[destination]', 'Previously generated directory', '.')
    .option('-d, --data <key=value>', 'Change a recorded answer (repeatable)', collect, [])
    .option('--data-file <file>', 'YAML file of answers to change')
    .option('--blueprint <dir>', 'Blueprint directory (default: the recorded one)')
    .option('--answers-file <file>', "Answers file inside the destination (default: the blueprint's answers_file)")
    .option('--dry-run', 'Show what would change without writing')
    .option('--diff', 'Print a unified diff of every changed file')
    .option('--force', 'Overwrite files modified since the last generation')
    .option('--prune', 'Delete unmodified files the blueprint no longer generates')
    .action(async (destination: string, options: UpdateCommandOptions) => {
      try {
        await runUpdate(destination, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runUpdate(destination: string, options: UpdateCommandOptions): Promise<void> {
  const overrides = await gatherAnswers(options);
  const { blueprint, config, previous } = await prepareUpdate(destination, {
    blueprint: options.blueprint,
    answersFile: options.answersFile,
    overrides,
  });
  reportIgnored(config.ignored);

  const engine = new GenerationEngine(destination);
  const plan = await engine.plan({ blueprint, config, previous });
  console.log(formatPlan(plan));

  if (options.diff) {
    for (const file of plan.files) {
      const patch = createFileDiff(file);
      if (patch !== null) {
        console.log(colorizeDiff(patch));
      }
    }
  }

  if (options.dryRun) {
    log.info('Dry run: nothing written.');
    return;
  }

  const result = await engine.apply(plan, {
    onConflict: options.force ? 'overwrite' : 'keep',
    prune: options.prune,
  });

  for (const file of result.kept) {
    log.warn(`Kept ${file}: modified since the last generation (use --force to replace it)`);
  }
  log.success(
    `Updated ${plan.destination}: ${result.written.length} written, ${result.removed.length} removed`
  );
}
