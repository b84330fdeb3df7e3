/**
 * Blueprint exports barrel file.
 */
export { loadBlueprint, findManifest } from './loader.js';
export { compileBlueprint, parseManifest } from './compile.js';
export type { CompileOptions } from './compile.js';
export { compileVariables, createSignatureLookup } from './definitions.js';
export { resolutionOrder, dependenciesOf } from './graph.js';
export { buildCorpus, compileRules } from './corpus.js';
export type { CorpusEntry } from './corpus.js';
export { ManifestSchema, SettingsSchema, VariableSpecSchema } from './schema.js';
export type { Manifest, VariableSpec } from './schema.js';
export type {
  Blueprint,
  BlueprintSettings,
  ChoiceOption,
  Constraint,
  DefaultSpec,
  FileDescriptor,
  FileRule,
  VariableDefinition,
} from './types.js';
