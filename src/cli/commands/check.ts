/**
 * `blueprinter check <blueprint>`
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadBlueprint } from '../../core/blueprint/loader.js';
import type { Blueprint } from '../../core/blueprint/types.js';
import { BlueprintError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface CheckOptions {
  json?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Load a blueprint and report definition errors')
    .argument('<blueprint>', 'Blueprint directory')
    .option('--json', 'Output in JSON format')
    .action(async (blueprintDir: string, options: CheckOptions) => {
      try {
        const blueprint = await loadBlueprint(blueprintDir);
        if (options.json) {
          console.log(JSON.stringify({ valid: true, ...summarize(blueprint) }, null, 2));
          return;
        }
        log.success(
          `Blueprint '${blueprint.name}' is valid: ${blueprint.variables.length} variables, ` +
          `${blueprint.files.length} files, ${blueprint.rules.length} rules`
        );
        for (const line of describeVariables(blueprint)) {
          log.info(line);
        }
      } catch (error) {
        if (options.json && error instanceof BlueprintError) {
          console.log(JSON.stringify({ valid: false, error: error.toJSON() }, null, 2));
        } else {
          log.fail(error instanceof Error ? error.message : 'Unknown error');
        }
        process.exit(1);
      }
    });
}

function summarize(blueprint: Blueprint): Record<string, unknown> {
  return {
    name: blueprint.name,
    variables: blueprint.order,
    files: blueprint.files.map((file) => file.path),
    rules: blueprint.rules.map((rule) => ({ path: rule.glob, when: rule.condition })),
  };
}

/**
 * One line per variable, in resolution order: `name (type) default`.
 */
export function describeVariables(blueprint: Blueprint): string[] {
  const byName = new Map(blueprint.variables.map((v) => [v.name, v]));
  return blueprint.order.flatMap((name) => {
    const variable = byName.get(name);
    if (!variable) return [];
    const parts = [`${variable.name} ${chalk.dim(`(${variable.type})`)}`];
    if (variable.default?.kind === 'random') {
      parts.push(`random from ${variable.default.list}`);
    } else if (variable.default?.kind === 'template') {
      parts.push('computed');
    }
    if (variable.when) parts.push('conditional');
    if (variable.secret) parts.push('secret');
    return [parts.join(', ')];
  });
}
