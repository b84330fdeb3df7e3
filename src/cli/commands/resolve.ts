/**
 * `blueprinter resolve <blueprint>`
 */
import { Command } from 'commander';
import { loadBlueprint } from '../../core/blueprint/loader.js';
import { resolve, type ResolvedConfig } from '../../core/resolver/resolver.js';
import { toAnswer, type AnswerValue } from '../../core/values/types.js';
import type { Blueprint } from '../../core/blueprint/types.js';
import {
  gatherAnswers,
  randomFromOptions,
  reportIgnored,
  withAnswerOptions,
  type AnswerOptions,
} from '../shared.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

interface ResolveOptions extends AnswerOptions {
  json?: boolean;
}

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return withAnswerOptions(
    new Command('resolve')
      .description('Print the resolved value of every variable, without prompting')
      .argument('<blueprint>', 'Blueprint directory')
  )
    .option('--json', 'Output in JSON format')
    .action(async (blueprintDir: string, options: ResolveOptions) => {
      try {
        const blueprint = await loadBlueprint(blueprintDir);
        const config = resolve(blueprint, await gatherAnswers(options), {
          random: randomFromOptions(options),
        });
        reportIgnored(config.ignored);

        const output = describeResolution(blueprint, config);
        console.log(options.json ? JSON.stringify(output, null, 2) : stringifyYaml(output).trimEnd());
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Resolved values in resolution order, secrets masked, with the seed first.
 */
export function describeResolution(
  blueprint: Blueprint,
  config: ResolvedConfig
): Record<string, AnswerValue> {
  const secrets = new Set(blueprint.variables.filter((v) => v.secret).map((v) => v.name));
  const output: Record<string, AnswerValue> = { _seed: config.seed };
  for (const name of config.order) {
    const value = config.values[name];
    if (value !== undefined) {
      output[name] = secrets.has(name) ? '***' : toAnswer(value);
    }
  }
  return output;
}
