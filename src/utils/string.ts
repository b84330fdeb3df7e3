/**
 * String case conversions used by template filters.
 */

/**
 * Split text into lowercase ASCII words, dropping accents and punctuation.
 */
function words(text: string): string[] {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
}

/**
 * Kebab-case slug: "My Project!" -> "my-project".
 */
export function slugify(text: string): string {
  return words(text).join('-');
}

/**
 * Snake case: "My Project" -> "my_project".
 */
export function snakeCase(text: string): string {
  return words(text).join('_');
}

/**
 * Upper-case the first letter of each space-separated word, leaving the rest as is.
 */
export function titleCase(text: string): string {
  return text
    .split(' ')
    .map((word) => (word.length > 0 ? word.charAt(0).toUpperCase() + word.slice(1) : word))
    .join(' ');
}
