/**
 * Compiled template tree.
 */
import type { Predicate } from '../predicates/types.js';
import type { FilterName } from './filters.js';

export type TemplateNode =
  | { kind: 'text'; text: string }
  | {
      kind: 'placeholder';
      name: string;
      filters: readonly FilterName[];
      /** The tag as written, for error messages */
      token: string;
      line: number;
    }
  | {
      kind: 'if';
      predicate: Predicate;
      /** The predicate as written */
      condition: string;
      then: readonly TemplateNode[];
      otherwise: readonly TemplateNode[];
      line: number;
    };

export interface CompiledTemplate {
  /** Where the template came from (file name, "default of 'x'", ...) */
  origin: string;
  nodes: readonly TemplateNode[];
}
