/**
 * Turns a parsed manifest and its corpus into a checked Blueprint. No I/O.
 */
import { ManifestSchema, type Manifest } from './schema.js';
import { compileVariables, createSignatureLookup } from './definitions.js';
import { resolutionOrder } from './graph.js';
import { buildCorpus, compileRules, type CorpusEntry } from './corpus.js';
import type { Blueprint } from './types.js';

export interface CompileOptions {
  /** Used when the manifest has no `name` */
  fallbackName?: string;
  root?: string;
}

/**
 * Compile a blueprint. Every load-time check runs here:
 * definition errors, default cycles, undeclared references, template syntax,
 * and rules that match nothing.
 */
export function compileBlueprint(
  manifest: Manifest,
  entries: readonly CorpusEntry[],
  options: CompileOptions = {}
): Blueprint {
  const variables = compileVariables(manifest);
  const order = resolutionOrder(variables);
  const lookup = createSignatureLookup(variables);
  const rules = compileRules(manifest.files, lookup);
  const files = buildCorpus(entries, manifest.settings, rules, lookup);

  return {
    name: manifest.name ?? options.fallbackName ?? 'blueprint',
    description: manifest.description,
    root: options.root,
    settings: manifest.settings,
    lists: manifest.lists,
    variables,
    order,
    files,
    rules,
  };
}

/**
 * Parse a manifest object (e.g. from a test) through the schema, applying defaults.
 */
export function parseManifest(input: unknown): Manifest {
  return ManifestSchema.parse(input);
}
