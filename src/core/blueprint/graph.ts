/**
 * Default-dependency graph between variables.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { predicateVariables } from '../predicates/evaluator.js';
import { templateVariables } from '../template/checker.js';
import type { VariableDefinition } from './types.js';

/**
 * Variables that must be resolved before `definition`: those read by its
 * default template and by its `when` predicate.
 */
export function dependenciesOf(definition: VariableDefinition): string[] {
  const names = new Set<string>();
  if (definition.default?.kind === 'template') {
    templateVariables(definition.default.template).forEach((name) => names.add(name));
  }
  if (definition.when) {
    predicateVariables(definition.when).forEach((name) => names.add(name));
  }
  return [...names];
}

/**
 * Depth-first topological order that follows declaration order and places
 * each variable after everything its default depends on.
 * Throws ValidationError(DEFAULT_CYCLE) naming the cycle.
 */
export function resolutionOrder(definitions: readonly VariableDefinition[]): string[] {
  const byName = new Map(definitions.map((definition) => [definition.name, definition]));
  const order: string[] = [];
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): void => {
    if (done.has(name)) return;

    const at = path.indexOf(name);
    if (at >= 0) {
      const cycle = [...path.slice(at), name];
      throw new ValidationError(
        ErrorCodes.DEFAULT_CYCLE,
        `Circular default dependency: ${cycle.join(' → ')}`,
        { variable: name, cycle }
      );
    }

    const definition = byName.get(name);
    if (!definition) return;

    path.push(name);
    for (const dependency of dependenciesOf(definition)) {
      visit(dependency);
    }
    path.pop();

    done.add(name);
    order.push(name);
  };

  for (const definition of definitions) {
    visit(definition.name);
  }

  return order;
}
