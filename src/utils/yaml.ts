/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content. The result is untyped until a schema has checked it.
 */
export function parseYaml(content: string, source?: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    const where = source ? ` (file: ${source})` : '';
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML${where}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { source, error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T,
  source?: string
): z.infer<T> {
  const parsed = parseYaml(content, source);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    const where = source ? ` (file: ${source})` : '';
    throw new SystemError(
      ErrorCodes.INVALID_MANIFEST,
      `YAML validation failed${where}: ${formatZodError(result.error)}`,
      { source, errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 * I/O errors from reading the file are surfaced unchanged.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  const content = await readFile(filePath);
  return parseYamlWithSchema(content, schema, filePath);
}

/**
 * Stringify a value to YAML. Key order is preserved.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod issues into a single readable line.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
