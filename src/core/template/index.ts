/**
 * Template exports barrel file.
 */
export { compileTemplate } from './parser.js';
export { renderTemplate } from './renderer.js';
export { checkTemplate, templateVariables } from './checker.js';
export { FILTERS, isFilterName, applyFilters } from './filters.js';
export type { FilterName } from './filters.js';
export type { CompiledTemplate, TemplateNode } from './types.js';
