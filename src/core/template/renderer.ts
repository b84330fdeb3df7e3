/**
 * Renders compiled templates against resolved values.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { evaluatePredicate } from '../predicates/evaluator.js';
import { formatValue, type ValueLookup } from '../values/types.js';
import { applyFilters } from './filters.js';
import type { CompiledTemplate, TemplateNode } from './types.js';

/**
 * Render a template. Throws TemplateError when a placeholder on the taken
 * path names a variable missing from `values`.
 */
export function renderTemplate(template: CompiledTemplate, values: ValueLookup): string {
  return renderNodes(template.nodes, values, template.origin);
}

function renderNodes(nodes: readonly TemplateNode[], values: ValueLookup, origin: string): string {
  let output = '';

  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        output += node.text;
        break;
      case 'placeholder': {
        const value = values[node.name];
        if (value === undefined) {
          throw new TemplateError(
            ErrorCodes.UNDEFINED_VARIABLE,
            `${origin}:${node.line}: '${node.token}' references '${node.name}', which has no resolved value`,
            { origin, line: node.line, token: node.token, variable: node.name }
          );
        }
        output += applyFilters(formatValue(value), node.filters);
        break;
      }
      case 'if': {
        const branch = evaluatePredicate(node.predicate, values) ? node.then : node.otherwise;
        output += renderNodes(branch, values, origin);
        break;
      }
    }
  }

  return output;
}
