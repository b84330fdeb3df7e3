/**
 * CLI program: commands plus the global logging flags.
 */
import { Command } from 'commander';
import { z } from 'zod';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createNewCommand } from './commands/new.js';
import { createUpdateCommand } from './commands/update.js';
import { createResolveCommand } from './commands/resolve.js';
import { createFilesCommand } from './commands/files.js';
import { createCheckCommand } from './commands/check.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageSchema = z.object({ version: z.string() });
const VERSION = PackageSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('blueprinter')
    .description('Generate projects from declarative blueprints')
    .version(VERSION)
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show warnings and errors')
    .hook('preAction', () => {
      const options = program.opts<GlobalOptions>();
      if (options.verbose) {
        logger.setLevel('debug');
      } else if (options.quiet) {
        logger.setLevel('warn');
      }
    });

  [createNewCommand, createUpdateCommand, createResolveCommand, createFilesCommand, createCheckCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
