/**
 * Load-time checks and reference collection for compiled templates.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { checkPredicate } from '../predicates/checker.js';
import { predicateVariables } from '../predicates/evaluator.js';
import type { SignatureLookup } from '../values/types.js';
import type { CompiledTemplate, TemplateNode } from './types.js';

/**
 * Throw a TemplateError for the first placeholder or condition that
 * references an undeclared variable or compares it with an impossible value.
 */
export function checkTemplate(template: CompiledTemplate, lookup: SignatureLookup): void {
  walk(template.nodes, (node) => {
    if (node.kind === 'placeholder' && !lookup(node.name)) {
      throw new TemplateError(
        ErrorCodes.UNDEFINED_VARIABLE,
        `${template.origin}:${node.line}: '${node.token}' references undeclared variable '${node.name}'`,
        { origin: template.origin, line: node.line, token: node.token, variable: node.name }
      );
    }
    if (node.kind === 'if') {
      checkPredicate(node.predicate, lookup, `${template.origin}:${node.line} condition "${node.condition}"`);
    }
  });
}

/**
 * Every variable a template may read, in first-seen order.
 */
export function templateVariables(template: CompiledTemplate): string[] {
  const names = new Set<string>();
  walk(template.nodes, (node) => {
    if (node.kind === 'placeholder') {
      names.add(node.name);
    } else if (node.kind === 'if') {
      predicateVariables(node.predicate).forEach((name) => names.add(name));
    }
  });
  return [...names];
}

function walk(nodes: readonly TemplateNode[], visit: (node: TemplateNode) => void): void {
  for (const node of nodes) {
    visit(node);
    if (node.kind === 'if') {
      walk(node.then, visit);
      walk(node.otherwise, visit);
    }
  }
}
