/**
 * Builds blueprints in memory for tests.
 */
import { compileBlueprint, parseManifest } from '../../src/core/blueprint/compile.js';
import type { Blueprint } from '../../src/core/blueprint/types.js';

/**
 * Compile a manifest object and a map of template-directory paths to content.
 */
export function makeBlueprint(manifest: unknown, files: Record<string, string> = {}): Blueprint {
  const entries = Object.entries(files)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([sourcePath, content]) => ({ sourcePath, content }));
  return compileBlueprint(parseManifest(manifest), entries, { fallbackName: 'test' });
}
