/**
 * Filters applicable to placeholders: `{{ project_name | slug }}`.
 */
import { slugify, snakeCase, titleCase } from '../../utils/string.js';

export const FILTERS = {
  lower: (text: string) => text.toLowerCase(),
  upper: (text: string) => text.toUpperCase(),
  title: titleCase,
  slug: slugify,
  snake: snakeCase,
} as const satisfies Record<string, (text: string) => string>;

export type FilterName = keyof typeof FILTERS;

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(FILTERS, name);
}

export function applyFilters(text: string, filters: readonly FilterName[]): string {
  return filters.reduce((current, filter) => FILTERS[filter](current), text);
}
