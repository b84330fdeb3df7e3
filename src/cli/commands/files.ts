/**
 * `blueprinter files <blueprint>`
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadBlueprint } from '../../core/blueprint/loader.js';
import { ScaffoldResolver } from '../../core/resolver/resolver.js';
import {
  gatherAnswers,
  randomFromOptions,
  reportIgnored,
  withAnswerOptions,
  type AnswerOptions,
} from '../shared.js';
import { logger as log } from '../../utils/logger.js';

interface FilesOptions extends AnswerOptions {
  json?: boolean;
  all?: boolean;
}

/**
 * Create the files command.
 */
export function createFilesCommand(): Command {
  return withAnswerOptions(
    new Command('files')
      .description('List the files a blueprint would generate for the given answers')
      .argument('<blueprint>', 'Blueprint directory')
  )
    .option('--all', 'Also list files left out by their rules')
    .option('--json', 'Output in JSON format')
    .action(async (blueprintDir: string, options: FilesOptions) => {
      try {
        const resolver = new ScaffoldResolver(await loadBlueprint(blueprintDir));
        const config = resolver.resolve(await gatherAnswers(options), {
          random: randomFromOptions(options),
        });
        reportIgnored(config.ignored);

        const selected = new Set(resolver.selectFiles(config));
        const listing = resolver.blueprint.files
          .filter((file) => options.all || selected.has(file))
          .map((file) => ({
            path: resolver.renderPath(file, config),
            source: file.sourcePath,
            included: selected.has(file),
          }));

        if (options.json) {
          console.log(JSON.stringify(listing, null, 2));
          return;
        }
        for (const entry of listing) {
          console.log(entry.included ? entry.path : chalk.dim(`${entry.path} (excluded)`));
        }
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
