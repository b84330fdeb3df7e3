/**
 * Compiled blueprint: variable definitions, conditional rules and the template corpus,
 * checked and ready for resolution.
 */
import type { Predicate } from '../predicates/types.js';
import type { CompiledTemplate } from '../template/types.js';
import type { VariableType } from '../values/types.js';
import type { BlueprintSettings } from './schema.js';

export type { BlueprintSettings } from './schema.js';

export interface ChoiceOption {
  /** Shown when prompting; equals `value` when choices are given as a list */
  label: string;
  value: string;
}

export type DefaultSpec =
  | { kind: 'literal'; value: string | boolean }
  | { kind: 'template'; template: CompiledTemplate }
  | { kind: 'random'; list: string; items: readonly string[] };

export type Constraint =
  | { kind: 'non_empty' }
  | { kind: 'email' }
  | { kind: 'slug' }
  | { kind: 'pattern'; pattern: string; regex: RegExp };

export interface VariableDefinition {
  name: string;
  type: VariableType;
  help: string;
  /** Empty unless type is 'choice' */
  choices: readonly ChoiceOption[];
  default?: DefaultSpec;
  when?: Predicate;
  constraint?: Constraint;
  /** Secret answers are never written to the answers file */
  secret: boolean;
}

export interface FileRule {
  /** Glob over corpus paths */
  glob: string;
  when: Predicate;
  /** The `when` value as written in the manifest */
  condition: string;
}

interface FileDescriptorBase {
  /** Corpus path with the template suffix removed, forward slashes */
  path: string;
  /** Path of the file inside the template directory */
  sourcePath: string;
  /** Output path template, e.g. `{{ project_slug }}/README.md` */
  target: CompiledTemplate;
  /** Rules whose glob matches `path`; the file is included iff all hold */
  rules: readonly FileRule[];
}

export type FileDescriptor =
  | (FileDescriptorBase & { kind: 'template'; template: CompiledTemplate })
  | (FileDescriptorBase & { kind: 'verbatim'; content: string });

export interface Blueprint {
  name: string;
  description?: string;
  /** Directory the blueprint was loaded from, when loaded from disk */
  root?: string;
  settings: BlueprintSettings;
  lists: Readonly<Record<string, readonly string[]>>;
  /** Declaration order */
  variables: readonly VariableDefinition[];
  /** Resolution order: declaration order with default dependencies first */
  order: readonly string[];
  /** Sorted by `path` */
  files: readonly FileDescriptor[];
  rules: readonly FileRule[];
}
