/**
 * `blueprinter new <blueprint> <destination>`
 */
import { Command } from 'commander';
import { loadBlueprint } from '../../core/blueprint/loader.js';
import { resolve } from '../../core/resolver/resolver.js';
import { GenerationEngine } from '../../core/generate/engine.js';
import { formatPlan } from '../formatters/plan.js';
import { createReadlineIO, promptAnswers } from '../prompter.js';
import {
  gatherAnswers,
  randomFromOptions,
  reportIgnored,
  withAnswerOptions,
  type AnswerOptions,
} from '../shared.js';
import { logger as log } from '../../utils/logger.js';

interface NewOptions extends AnswerOptions {
  dryRun?: boolean;
  force?: boolean;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return withAnswerOptions(
    new Command('new')
      .description('Generate a project from a blueprint')
      .argument('<blueprint>', 'Blueprint directory')
      .argument('<destination>', 'Directory to generate into')
  )
    .option('--defaults', 'Do not prompt; unanswered variables take their defaults')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--force', 'Overwrite existing files that differ')
    .action(async (blueprintDir: string, destination: string, options: NewOptions) => {
      try {
        await runNew(blueprintDir, destination, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runNew(blueprintDir: string, destination: string, options: NewOptions): Promise<void> {
  const blueprint = await loadBlueprint(blueprintDir);
  const random = randomFromOptions(options);
  let answers = await gatherAnswers(options);

  if (!options.defaults) {
    const io = createReadlineIO();
    try {
      answers = await promptAnswers(blueprint, answers, random, io);
    } finally {
      io.close();
    }
  }

  const config = resolve(blueprint, answers, { random });
  reportIgnored(config.ignored);

  const engine = new GenerationEngine(destination);
  const plan = await engine.plan({ blueprint, config });
  console.log(formatPlan(plan, { showIdentical: true }));

  if (options.dryRun) {
    log.info('Dry run: nothing written.');
    return;
  }

  const result = await engine.apply(plan, { onConflict: options.force ? 'overwrite' : 'abort' });
  log.success(`Generated ${result.written.length} files in ${plan.destination}`);
}
