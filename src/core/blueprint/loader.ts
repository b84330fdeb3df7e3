/**
 * Loads a blueprint directory from disk.
 */
import * as path from 'node:path';
import { ManifestSchema } from './schema.js';
import { compileBlueprint } from './compile.js';
import type { CorpusEntry } from './corpus.js';
import type { Blueprint } from './types.js';
import {
  loadYamlWithSchema,
  fileExists,
  directoryExists,
  globFiles,
  readFile,
} from '../../utils/index.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const MANIFEST_FILES = ['blueprint.yaml', 'blueprint.yml'];

const log = logger.child('blueprint');

/**
 * Find the manifest inside a blueprint directory.
 */
export async function findManifest(blueprintDir: string): Promise<string> {
  for (const name of MANIFEST_FILES) {
    const candidate = path.join(blueprintDir, name);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  throw new SystemError(
    ErrorCodes.BLUEPRINT_NOT_FOUND,
    `No blueprint found at ${blueprintDir}. Expected ${MANIFEST_FILES.join(' or ')}.`,
    { path: blueprintDir, searched: MANIFEST_FILES }
  );
}

/**
 * Load, compile and check the blueprint in `blueprintDir`.
 */
export async function loadBlueprint(blueprintDir: string): Promise<Blueprint> {
  const root = path.resolve(blueprintDir);
  const manifestPath = await findManifest(root);
  const manifest = await loadYamlWithSchema(manifestPath, ManifestSchema);

  const templateDir = path.resolve(root, manifest.settings.template_dir);
  if (!(await directoryExists(templateDir))) {
    throw new SystemError(
      ErrorCodes.BLUEPRINT_NOT_FOUND,
      `Template directory not found: ${templateDir}`,
      { path: templateDir, manifest: manifestPath }
    );
  }

  const entries = await readCorpus(templateDir);
  log.debug(`Loaded ${entries.length} template files from ${templateDir}`);

  const blueprint = compileBlueprint(manifest, entries, {
    fallbackName: path.basename(root),
    root,
  });
  log.debug(
    `Compiled blueprint '${blueprint.name}': ${blueprint.variables.length} variables, ` +
    `${blueprint.files.length} files, ${blueprint.rules.length} rules`
  );

  return blueprint;
}

async function readCorpus(templateDir: string): Promise<CorpusEntry[]> {
  const sourcePaths = await globFiles('**/*', { cwd: templateDir });
  const entries: CorpusEntry[] = [];
  for (const sourcePath of sourcePaths) {
    entries.push({ sourcePath, content: await readFile(path.join(templateDir, sourcePath)) });
  }
  return entries;
}
